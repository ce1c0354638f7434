/**
 * Resume text extraction using pdf-parse.
 * Code-only step - no LLM involvement.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

type PdfParseResult = {
  text: string;
  numpages: number;
};
type PdfParseFn = (buffer: Buffer) => Promise<PdfParseResult>;

let pdfParse: PdfParseFn | null = null;

// pdf-parse's index runs a debug harness when loaded as the main module; the lib entry does not
async function getPdfParser(): Promise<PdfParseFn> {
  if (!pdfParse) {
    const mod = await import('pdf-parse/lib/pdf-parse.js');
    pdfParse = mod.default;
  }
  return pdfParse;
}

export interface ExtractedText {
  text: string;
  numPages: number;
}

/**
 * Extract text from PDF bytes. Pages are concatenated in order.
 */
export async function extractTextFromPdfBuffer(buffer: Buffer): Promise<ExtractedText> {
  const parser = await getPdfParser();
  const data = await parser(buffer);
  return {
    text: data.text,
    numPages: data.numpages,
  };
}

/**
 * Extract text from a resume file based on extension (.pdf or .txt).
 */
export async function extractText(filePath: string): Promise<ExtractedText> {
  const absolutePath = path.resolve(filePath);

  try {
    await fs.access(absolutePath);
  } catch {
    throw new Error(`Resume file not found: ${absolutePath}`);
  }

  const ext = path.extname(absolutePath).toLowerCase();
  switch (ext) {
    case '.pdf':
      return extractTextFromPdfBuffer(await fs.readFile(absolutePath));
    case '.txt': {
      const text = await fs.readFile(absolutePath, 'utf-8');
      return { text, numPages: 1 };
    }
    default:
      throw new Error(`Unsupported file format: ${ext || '(none)'}`);
  }
}
