/**
 * @fileoverview Book rendering
 *
 * Pure formatting; writing the result anywhere is the engine's job.
 */

import { ExportFormatUnsupportedError } from '../core/errors.js';
import type { Book } from './types.js';

export const EXPORT_FORMATS = ['text', 'json', 'metadata'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

const KNOWN_FORMATS = new Set<string>(EXPORT_FORMATS);

export function isExportFormat(value: string): value is ExportFormat {
  return KNOWN_FORMATS.has(value);
}

export interface PageSummary {
  address: string;
  coherenceScore: number;
  contentHash: string;
  length: number;
}

export interface BookSummary extends Omit<Book, 'pages'> {
  pages: PageSummary[];
}

export function summarizeBook(book: Book): BookSummary {
  return {
    id: book.id,
    title: book.title,
    method: book.method,
    coherenceScore: book.coherenceScore,
    integrityHash: book.integrityHash,
    provenance: book.provenance,
    metadata: book.metadata,
    pages: book.pages.map((page) => ({
      address: page.address,
      coherenceScore: page.coherenceScore,
      contentHash: page.contentHash,
      length: page.text.length,
    })),
  };
}

function renderText(book: Book): string {
  const lines = [
    `# ${book.title}`,
    `Book ID: ${book.id}`,
    `Pages: ${book.pages.length}`,
    `Coherence: ${book.coherenceScore.toFixed(2)}`,
    `Assembly Method: ${book.method}`,
    `Created: ${book.provenance.createdAt}`,
    `Integrity: ${book.integrityHash}`,
    '',
    '='.repeat(80),
    '',
  ];
  book.pages.forEach((page, index) => {
    lines.push(`--- Page ${index + 1} (Address: ${page.address}, Score: ${page.coherenceScore.toFixed(2)}) ---`);
    lines.push(page.text);
    lines.push('');
  });
  return lines.join('\n');
}

export function renderBook(book: Book, format: string): string {
  if (!isExportFormat(format)) {
    throw new ExportFormatUnsupportedError(format, EXPORT_FORMATS);
  }
  switch (format) {
    case 'text':
      return renderText(book);
    case 'json':
      return JSON.stringify(book, null, 2);
    case 'metadata':
      return JSON.stringify(summarizeBook(book), null, 2);
  }
}
