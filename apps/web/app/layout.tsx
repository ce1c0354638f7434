import type { Metadata } from 'next';
import './globals.css';

export const metadata: Metadata = {
  title: 'Career Navigator',
  description: 'Career plan, skill gaps and a tailored resume from your resume and LinkedIn',
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <head>
        <link rel="preconnect" href="https://fonts.googleapis.com" />
        <link rel="preconnect" href="https://fonts.gstatic.com" crossOrigin="anonymous" />
        <link
          href="https://fonts.googleapis.com/css2?family=Inter:wght@400;500;600;700&display=swap"
          rel="stylesheet"
        />
      </head>
      <body>
        <header
          style={{
            position: 'sticky',
            top: 0,
            zIndex: 50,
            backgroundColor: '#222529',
            borderBottom: '1px solid var(--border)',
            padding: '0.75rem 1.5rem',
          }}
        >
          <a
            href="/"
            style={{ color: 'var(--text)', fontWeight: 700, fontSize: '1.125rem' }}
          >
            <span style={{ color: 'var(--accent)' }}>Career</span> Navigator
          </a>
        </header>
        <main className="container" style={{ padding: '1.75rem 1.5rem' }}>
          {children}
        </main>
      </body>
    </html>
  );
}
