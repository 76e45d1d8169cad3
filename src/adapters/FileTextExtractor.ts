import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import mammoth from 'mammoth';
import { TextExtractor } from '../ports/TextExtractor';
import { ExtractionFailure, describeError, errorProperty } from '../shared/errors';

type Reader = (buffer: Buffer) => Promise<string>;

const readPdf: Reader = async (buffer) => {
  // pdf-parse reads a bundled sample file when required without a parent module, so load it on demand.
  const { default: pdf } = await import('pdf-parse');
  const data = await pdf(buffer);
  return data.text;
};

const readDocx: Reader = async (buffer) => {
  const result = await mammoth.extractRawText({ buffer });
  return result.value;
};

const readPlain: Reader = async (buffer) => buffer.toString('utf8');

const READERS: Record<string, Reader> = {
  '.pdf': readPdf,
  '.docx': readDocx,
  '.txt': readPlain,
  '.md': readPlain,
};

export const SUPPORTED_EXTENSIONS = Object.keys(READERS);

export function sanitizeText(text: string): string {
  return text
    .replace(/\0/g, '') // Remove null bytes
    .replace(/[\x01-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove other control characters
    .replace(/\uFFFD/g, ''); // Remove replacement characters
}

function isMissingFile(error: unknown): boolean {
  const code = errorProperty(error, 'code');
  return code === 'ENOENT' || code === 'EISDIR';
}

export class FileTextExtractor implements TextExtractor {
  async extractText(filePath: string): Promise<string> {
    const extension = path.extname(filePath).toLowerCase();
    const reader = READERS[extension];
    if (!reader) {
      throw new ExtractionFailure(
        `Unsupported file format: ${extension || '(none)'}. Please use ${SUPPORTED_EXTENSIONS.join(', ')}.`,
        filePath,
      );
    }

    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      const message = isMissingFile(error)
        ? `The file was not found at: ${filePath}`
        : `Could not read ${filePath}: ${describeError(error)}`;
      throw new ExtractionFailure(message, filePath, error);
    }

    try {
      return sanitizeText(await reader(buffer));
    } catch (error) {
      throw new ExtractionFailure(`Could not extract text from ${path.basename(filePath)}: ${describeError(error)}`, filePath, error);
    }
  }
}
