import { CAREER_PRESETS } from '@careernav/schemas';
import { NavigatorForm } from './components/NavigatorForm';

export default function HomePage() {
  return (
    <div style={{ maxWidth: '720px', margin: '0 auto' }}>
      <section className="page-head">
        <h1>
          Find your path, <span style={{ color: 'var(--accent)' }}>one step at a time</span>
        </h1>
        <p style={{ color: 'var(--muted)', margin: 0, lineHeight: 1.65 }}>
          Upload your resume, add your LinkedIn profile if you like, and pick a direction. You get
          a skill-gap analysis, feedback on your profile, a learning roadmap and a resume tailored
          to the role.
        </p>
      </section>
      <NavigatorForm presets={[...CAREER_PRESETS]} />
    </div>
  );
}
