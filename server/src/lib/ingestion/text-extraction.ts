import { extname } from 'node:path';
import fs from 'fs-extra';
import { ActivityError } from '../errors';

const TEXT_EXTENSIONS = new Map<string, string>([
  ['.txt', 'text/plain'],
  ['.csv', 'text/csv'],
  ['.md', 'text/markdown'],
  ['.markdown', 'text/markdown'],
  ['.json', 'application/json'],
  ['.xml', 'application/xml'],
  ['.html', 'text/html'],
  ['.htm', 'text/html'],
]);

const PDF_CONTENT_TYPE = 'application/pdf';
const DOCX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export type ExtractedText = {
  contentType: string;
  pages: string[];
};

export function isSupportedExtractionExtension(filePath: string): boolean {
  const extension = extname(filePath).toLowerCase();
  return TEXT_EXTENSIONS.has(extension) || extension === '.pdf' || extension === '.docx';
}

async function extractPdfPages(filePath: string): Promise<string[]> {
  const { PDFParse } = await import('pdf-parse');
  const buffer = await fs.readFile(filePath);
  const parser = new PDFParse({ data: buffer });
  try {
    const result = await parser.getText();
    const pages = result.pages.map((page) => page.text);
    return pages.length > 0 ? pages : [result.text];
  } finally {
    await parser.destroy();
  }
}

async function extractDocxText(filePath: string): Promise<string> {
  const { default: mammoth } = await import('mammoth');
  const result = await mammoth.extractRawText({ path: filePath });
  return result.value;
}

/**
 * Reads a stored blob into page texts. Text formats are a single page.
 * Unsupported extensions and unreadable documents are permanent failures.
 */
export async function extractTextFromFile(filePath: string): Promise<ExtractedText> {
  const extension = extname(filePath).toLowerCase();

  const textContentType = TEXT_EXTENSIONS.get(extension);
  if (textContentType) {
    return { contentType: textContentType, pages: [await fs.readFile(filePath, 'utf8')] };
  }

  if (extension === '.pdf') {
    try {
      return { contentType: PDF_CONTENT_TYPE, pages: await extractPdfPages(filePath) };
    } catch (error) {
      throw ActivityError.permanent(`Unable to read PDF ${filePath}: ${String(error)}`);
    }
  }

  if (extension === '.docx') {
    try {
      return { contentType: DOCX_CONTENT_TYPE, pages: [await extractDocxText(filePath)] };
    } catch (error) {
      throw ActivityError.permanent(`Unable to read DOCX ${filePath}: ${String(error)}`);
    }
  }

  throw ActivityError.permanent(`Unsupported file extension for extraction: ${extension || '(none)'}`);
}
