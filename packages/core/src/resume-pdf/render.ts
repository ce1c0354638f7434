/**
 * Resume PDF renderer (pdf-lib). Lays out tailored resume content on A4 pages:
 * optional photo, name and contact line, then Professional Summary, Work Experience,
 * Education and Skills sections.
 */

import {
  PDFDocument,
  PageSizes,
  StandardFonts,
  rgb,
  type PDFFont,
  type PDFImage,
  type PDFPage,
} from 'pdf-lib';
import type { JobExperience, TailoredResumeContent } from '@careernav/schemas';
import {
  ACCENT_COLOR,
  BOTTOM_MARGIN_MM,
  CONTENT_WIDTH_MM,
  HEADER_TEXT_X_WITH_PHOTO,
  HEADER_TOP_MM,
  MARGIN_MM,
  PAGE_HEIGHT_MM,
  PAGE_WIDTH_MM,
  PHOTO,
  PRIMARY_COLOR,
  SECONDARY_COLOR,
  SECTION_RULE_MM,
  mm,
  ptToMm,
  type Rgb,
} from './theme';
import { toWinAnsi, wrapText } from './text';

export interface RenderResumeOptions {
  /** PNG or JPEG bytes */
  photo?: Uint8Array | null;
  title?: string;
}

type FontStyle = 'regular' | 'bold' | 'italic';

function color([r, g, b]: Rgb) {
  return rgb(r / 255, g / 255, b / 255);
}

export function detectImageType(bytes: Uint8Array): 'png' | 'jpg' | null {
  const [b0, b1, b2, b3] = bytes;
  if (b0 === 0x89 && b1 === 0x50 && b2 === 0x4e && b3 === 0x47) return 'png';
  if (b0 === 0xff && b1 === 0xd8 && b2 === 0xff) return 'jpg';
  return null;
}

interface CellOptions {
  x: number;
  height: number;
  size: number;
  style: FontStyle;
  color: Rgb;
  align?: 'L' | 'R';
}

class ResumeLayout {
  private page: PDFPage;
  /** Cursor from the top of the page, in mm */
  private y = MARGIN_MM;

  private constructor(
    private readonly doc: PDFDocument,
    private readonly fonts: Record<FontStyle, PDFFont>,
  ) {
    this.page = doc.addPage(PageSizes.A4);
  }

  static async create(doc: PDFDocument): Promise<ResumeLayout> {
    const [regular, bold, italic] = await Promise.all([
      doc.embedFont(StandardFonts.Helvetica),
      doc.embedFont(StandardFonts.HelveticaBold),
      doc.embedFont(StandardFonts.HelveticaOblique),
    ]);
    return new ResumeLayout(doc, { regular, bold, italic });
  }

  moveTo(y: number): void {
    this.y = y;
  }

  private ensureSpace(height: number): void {
    if (this.y + height <= PAGE_HEIGHT_MM - BOTTOM_MARGIN_MM) return;
    this.page = this.doc.addPage(PageSizes.A4);
    this.y = MARGIN_MM;
  }

  private widthMm(text: string, style: FontStyle, size: number): number {
    return ptToMm(this.fonts[style].widthOfTextAtSize(text, size));
  }

  /** One line of text vertically centred in a row of `height` mm. */
  private cell(text: string, opts: CellOptions): void {
    const value = toWinAnsi(text);
    const textWidth = this.widthMm(value, opts.style, opts.size);
    const x = opts.align === 'R' ? opts.x + CONTENT_WIDTH_MM - textWidth : opts.x;
    const baseline = this.y + opts.height / 2 + ptToMm(opts.size) * 0.35;
    this.page.drawText(value, {
      x: mm(x),
      y: this.page.getHeight() - mm(baseline),
      size: opts.size,
      font: this.fonts[opts.style],
      color: color(opts.color),
    });
  }

  /** Wrapped text, `lineHeight` mm per line, breaking pages as needed. */
  private multiCell(text: string, lineHeight: number, size: number, style: FontStyle): void {
    const value = toWinAnsi(text);
    const lines = wrapText(value, (s) => this.widthMm(s, style, size), CONTENT_WIDTH_MM);
    for (const line of lines) {
      this.ensureSpace(lineHeight);
      this.cell(line, {
        x: MARGIN_MM,
        height: lineHeight,
        size,
        style,
        color: PRIMARY_COLOR,
      });
      this.y += lineHeight;
    }
  }

  drawPhoto(image: PDFImage): void {
    const { x, y, size } = PHOTO;
    const height = this.page.getHeight();
    this.page.drawImage(image, {
      x: mm(x),
      y: height - mm(y + size),
      width: mm(size),
      height: mm(size),
    });
    this.page.drawEllipse({
      x: mm(x + size / 2),
      y: height - mm(y + size / 2),
      xScale: mm(size / 2),
      yScale: mm(size / 2),
      borderColor: color(ACCENT_COLOR),
      borderWidth: mm(1),
    });
  }

  /** Name and contact line starting at `x`, wrapped before the right margin. */
  personalInfo(name: string, email: string, phone: string, x: number): void {
    this.y = HEADER_TOP_MM;
    const maxWidth = PAGE_WIDTH_MM - x - MARGIN_MM;
    const contact = [email && `Email: ${email}`, phone && `Phone: ${phone}`]
      .filter(Boolean)
      .join(' | ');
    const rows: Array<[string, CellOptions]> = [
      [name, { x, height: 10, size: 24, style: 'bold', color: PRIMARY_COLOR }],
      [contact, { x, height: 8, size: 11, style: 'regular', color: SECONDARY_COLOR }],
    ];
    for (const [text, opts] of rows) {
      const lines = wrapText(
        toWinAnsi(text),
        (s) => this.widthMm(s, opts.style, opts.size),
        maxWidth,
      );
      for (const line of lines) {
        this.cell(line, opts);
        this.y += opts.height;
      }
    }
  }

  get cursor(): number {
    return this.y;
  }

  sectionTitle(title: string): void {
    // keep a title together with at least two lines of its body
    this.ensureSpace(12 + 5 + 10);
    this.cell(title.toUpperCase(), {
      x: MARGIN_MM,
      height: 12,
      size: 14,
      style: 'bold',
      color: ACCENT_COLOR,
    });
    this.y += 12;
    const height = this.page.getHeight();
    this.page.drawLine({
      start: { x: mm(MARGIN_MM), y: height - mm(this.y) },
      end: { x: mm(MARGIN_MM + SECTION_RULE_MM), y: height - mm(this.y) },
      thickness: mm(0.5),
      color: color(ACCENT_COLOR),
    });
    this.y += 5;
  }

  job(job: JobExperience): void {
    this.ensureSpace(6 + 6 + 2 + 5);
    this.cell(job.title, {
      x: MARGIN_MM,
      height: 6,
      size: 11,
      style: 'bold',
      color: PRIMARY_COLOR,
    });
    this.cell(job.dates, {
      x: MARGIN_MM,
      height: 6,
      size: 11,
      style: 'regular',
      color: PRIMARY_COLOR,
      align: 'R',
    });
    this.y += 6;
    this.cell(job.company, {
      x: MARGIN_MM,
      height: 6,
      size: 11,
      style: 'italic',
      color: SECONDARY_COLOR,
    });
    this.y += 6 + 2;

    for (const point of job.description) {
      this.multiCell(`• ${point}`, 5, 10, 'regular');
    }
    this.y += 5;
  }

  textBlock(text: string): void {
    this.multiCell(text, 5, 10, 'regular');
    this.y += 5;
  }
}

/**
 * Render tailored resume content to PDF bytes.
 * Throws when a photo is given in a format other than PNG or JPEG.
 */
export async function renderResumePdf(
  content: TailoredResumeContent,
  options: RenderResumeOptions = {},
): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  doc.setTitle(options.title ?? `${content.full_name} - Resume`);
  doc.setCreator('Career Navigator');

  const layout = await ResumeLayout.create(doc);

  let headerX = MARGIN_MM;
  if (options.photo && options.photo.length > 0) {
    const type = detectImageType(options.photo);
    if (!type) {
      throw new Error('Unsupported photo format: expected PNG or JPEG');
    }
    const image =
      type === 'png' ? await doc.embedPng(options.photo) : await doc.embedJpg(options.photo);
    layout.drawPhoto(image);
    headerX = HEADER_TEXT_X_WITH_PHOTO;
  }

  layout.personalInfo(content.full_name, content.email, content.phone, headerX);
  // clear the photo when there is one
  const photoBottom = headerX === MARGIN_MM ? 0 : PHOTO.y + PHOTO.size + 3;
  layout.moveTo(Math.max(layout.cursor + 10, photoBottom));

  layout.sectionTitle('Professional Summary');
  layout.textBlock(content.summary);

  layout.sectionTitle('Work Experience');
  for (const job of content.experiences) {
    layout.job(job);
  }

  layout.sectionTitle('Education');
  layout.textBlock(content.education);

  layout.sectionTitle('Skills');
  layout.textBlock(content.skills.join(' | '));

  return doc.save();
}
