import { promises as fs } from 'fs';
import * as mammoth from 'mammoth';
import * as pdfjsLib from 'pdfjs-dist';
import { StorageService } from './storage.service';
import { ExtractionError, errorMessage } from '../utils/errors';
import { CleanupWarning, DocumentFormat, ExtractionResult } from '../types/guide.types';

export const MIME_TYPES: Readonly<Record<DocumentFormat, string>> = Object.freeze({
  text: 'text/plain',
  pdf: 'application/pdf',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
});

const EXTENSIONS: Readonly<Record<DocumentFormat, string>> = Object.freeze({
  text: '.txt',
  pdf: '.pdf',
  docx: '.docx',
});

/**
 * Collapses a lone line break into a space, then every whitespace run
 * (blank lines included) into a single space. Paragraph structure is not kept.
 */
export function normalizeText(raw: string): string {
  return raw
    .replace(/(?<!\n)\n(?!\n)/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export async function readPdfPages(filePath: string): Promise<string> {
  const data = new Uint8Array(await fs.readFile(filePath));
  const pdf = await pdfjsLib.getDocument({
    data,
    isEvalSupported: false,
    disableFontFace: true,
    verbosity: 0,
  }).promise;

  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      const text = content.items
        .map((item) => ('str' in item ? `${item.str}${item.hasEOL ? '\n' : ''}` : ''))
        .join('');
      pages.push(text);
    }
    return pages.join('\n');
  } finally {
    await pdf.destroy();
  }
}

export async function readDocxParagraphs(filePath: string): Promise<string> {
  const result = await mammoth.extractRawText({ path: filePath });
  // raw text ends every paragraph with a blank line
  const paragraphs = result.value.split('\n\n');
  if (paragraphs[paragraphs.length - 1] === '') {
    paragraphs.pop();
  }
  return paragraphs.join('\n');
}

export class ExtractionService {
  private storage: StorageService;
  private decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(storage: StorageService = new StorageService()) {
    this.storage = storage;
  }

  detectFormat(mimetype: string, filename: string): DocumentFormat {
    const type =
      mimetype && mimetype !== 'application/octet-stream'
        ? mimetype
        : this.storage.getContentType(filename);

    if (type === MIME_TYPES.pdf) return 'pdf';
    if (type === MIME_TYPES.docx) return 'docx';
    return 'text';
  }

  async extractText(bytes: Buffer, format: DocumentFormat): Promise<ExtractionResult> {
    const warnings: CleanupWarning[] = [];

    try {
      const raw = await this.storage.withTempFile(
        bytes,
        EXTENSIONS[format],
        (filePath) => this.readRaw(filePath, format),
        (warning) => warnings.push(warning)
      );

      return { text: normalizeText(raw), format, warnings };
    } catch (error) {
      throw new ExtractionError(`Error reading file: ${errorMessage(error)}`);
    }
  }

  private async readRaw(filePath: string, format: DocumentFormat): Promise<string> {
    switch (format) {
      case 'pdf':
        return readPdfPages(filePath);
      case 'docx':
        return readDocxParagraphs(filePath);
      case 'text':
        return this.decoder.decode(await fs.readFile(filePath));
    }
  }
}
