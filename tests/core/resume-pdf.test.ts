import { describe, it, expect, vi } from 'vitest';
import { PDFDocument, PDFPage, StandardFonts } from 'pdf-lib';
import type { TailoredResumeContent } from '@careernav/schemas';
import { detectImageType, mm, renderResumePdf, toWinAnsi, wrapText } from '@careernav/core';

// 1x1 transparent PNG
const TINY_PNG = Uint8Array.from(
  Buffer.from(
    'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==',
    'base64',
  ),
);

const makeResume = (overrides?: Partial<TailoredResumeContent>): TailoredResumeContent => ({
  full_name: 'Test Student',
  email: 'student@example.com',
  phone: '555-0100',
  summary: 'Final-year computer science student focused on data pipelines.',
  experiences: [
    {
      title: 'Data Intern',
      company: 'Example Analytics',
      dates: 'Jun 2025 - Aug 2025',
      description: ['Built weekly reporting in SQL', 'Cleaned survey data with Python'],
    },
  ],
  education: 'BSc Computer Science, Example University, 2026',
  skills: ['SQL', 'Python', 'Tableau'],
  ...overrides,
});

const byLength = (s: string) => s.length;

describe('wrapText', () => {
  it('wraps greedily on word boundaries', () => {
    expect(wrapText('aaa bbb ccc', byLength, 7)).toEqual(['aaa bbb', 'ccc']);
  });

  it('keeps blank paragraphs', () => {
    expect(wrapText('one\n\ntwo', byLength, 10)).toEqual(['one', '', 'two']);
  });

  it('splits words wider than the line', () => {
    expect(wrapText('abcdefghij', byLength, 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('continues after a split word', () => {
    expect(wrapText('ab abcdef cd', byLength, 4)).toEqual(['ab', 'abcd', 'ef', 'cd']);
  });
});

describe('toWinAnsi', () => {
  it('keeps Latin-1 text and maps arrows', () => {
    expect(toWinAnsi('Café → naïve')).toBe('Café -> naïve');
  });

  it('strips marks outside Latin-1 and replaces the rest', () => {
    expect(toWinAnsi('Dvořák')).toBe('Dvorák');
    expect(toWinAnsi('日本')).toBe('??');
  });

  it('composes decomposed accents before encoding', () => {
    expect(toWinAnsi('Jose\u0301 Garci\u0301a')).toBe('José García');
    expect(toWinAnsi('Dvor\u030ca\u0301k')).toBe('Dvorák');
  });

  it('drops combining marks that have no composed form', () => {
    expect(toWinAnsi('\u0301r\u0303')).toBe('r');
  });

  it('drops carriage returns and keeps newlines', () => {
    expect(toWinAnsi('a\r\nb\tc')).toBe('a\nb c');
  });

  it('normalises bullet glyphs', () => {
    expect(toWinAnsi('● item ✓')).toBe('• item -');
  });
});

describe('detectImageType', () => {
  it('recognises PNG and JPEG signatures', () => {
    expect(detectImageType(TINY_PNG)).toBe('png');
    expect(detectImageType(Uint8Array.from([0xff, 0xd8, 0xff, 0xe0]))).toBe('jpg');
    expect(detectImageType(Uint8Array.from([0x47, 0x49, 0x46, 0x38]))).toBeNull();
    expect(detectImageType(new Uint8Array(0))).toBeNull();
  });
});

describe('mm', () => {
  it('converts millimetres to points', () => {
    expect(mm(25.4)).toBeCloseTo(72);
  });
});

describe('renderResumePdf', () => {
  it('renders a one-page A4 document', async () => {
    const bytes = await renderResumePdf(makeResume());

    expect(Buffer.from(bytes.subarray(0, 5)).toString('latin1')).toBe('%PDF-');
    const doc = await PDFDocument.load(bytes);
    expect(doc.getPageCount()).toBe(1);
    expect(doc.getTitle()).toBe('Test Student - Resume');
    const { width, height } = doc.getPage(0).getSize();
    expect(width).toBeCloseTo(595.28, 1);
    expect(height).toBeCloseTo(841.89, 1);
  });

  it('starts new pages for long experience lists', async () => {
    const experiences = Array.from({ length: 12 }, (_, i) => ({
      title: `Role ${i + 1}`,
      company: 'Example Co',
      dates: '2024',
      description: ['Did one thing', 'Did another thing', 'And a third thing'],
    }));
    const doc = await PDFDocument.load(await renderResumePdf(makeResume({ experiences })));
    expect(doc.getPageCount()).toBeGreaterThan(1);
  });

  it('embeds a PNG photo', async () => {
    const doc = await PDFDocument.load(await renderResumePdf(makeResume(), { photo: TINY_PNG }));
    expect(doc.getPageCount()).toBe(1);
  });

  it('rejects photos that are not PNG or JPEG', async () => {
    await expect(
      renderResumePdf(makeResume(), { photo: Uint8Array.from([1, 2, 3, 4]) }),
    ).rejects.toThrow('Unsupported photo format: expected PNG or JPEG');
  });

  it('encodes characters the standard fonts lack', async () => {
    const bytes = await renderResumePdf(
      makeResume({ full_name: 'Łukasz Nowak', summary: 'Builds → ships ✓ 日本語' }),
    );
    expect((await PDFDocument.load(bytes)).getPageCount()).toBe(1);
  });

  it('wraps a long name beside the photo inside the right margin', async () => {
    const drawText = vi.spyOn(PDFPage.prototype, 'drawText');
    const fullName = 'Maximiliana Alexandrina Konstantina Papadopoulou Vandenberghe';
    try {
      await renderResumePdf(makeResume({ full_name: fullName }), { photo: TINY_PNG });

      const nameLines = drawText.mock.calls.filter(([, opts]) => opts?.size === 24);
      expect(nameLines.length).toBeGreaterThan(1);
      expect(nameLines.map(([text]) => text).join(' ')).toBe(fullName);

      const bold = await (await PDFDocument.create()).embedFont(StandardFonts.HelveticaBold);
      for (const [text, opts] of nameLines) {
        expect(opts?.x).toBeCloseTo(mm(65));
        expect(bold.widthOfTextAtSize(text, 24)).toBeLessThanOrEqual(mm(210 - 65 - 10));
      }
    } finally {
      drawText.mockRestore();
    }
  });
});
