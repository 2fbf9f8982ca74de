/**
 * Text extraction for uploaded syllabus and reference material.
 *
 * Best-effort: PDFs go through pdf-parse, anything else is decoded as UTF-8.
 * A document that cannot be read yields an empty string.
 */

import type { Logger } from './logger.js';
import { errorMessage } from './result.js';

const PDF_MAGIC = '%PDF-';

export function looksLikePdf(bytes: Uint8Array, mimeType?: string): boolean {
  if (mimeType === 'application/pdf') return true;
  return Buffer.from(bytes.subarray(0, PDF_MAGIC.length)).toString('latin1') === PDF_MAGIC;
}

export async function extractText(bytes: Uint8Array, mimeType?: string, logger?: Logger): Promise<string> {
  if (bytes.length === 0) return '';

  if (!looksLikePdf(bytes, mimeType)) {
    return new TextDecoder('utf-8').decode(bytes);
  }

  try {
    // Loaded on demand so plain-text callers never pull in the PDF stack
    const { default: pdfParse } = await import('pdf-parse');
    const pdfData = await pdfParse(Buffer.from(bytes));

    logger?.('info', 'PDF text extraction completed', {
      pageCount: pdfData.numpages,
      textLength: pdfData.text.length
    });

    if (!pdfData.text.trim()) {
      logger?.('warn', 'PDF contains no extractable text (possibly scanned)');
    }
    return pdfData.text;
  } catch (error) {
    logger?.('warn', 'Failed to extract text from PDF', { error: errorMessage(error) });
    return '';
  }
}
