import type { PageRange } from '../types';

export type PageRangeValidation =
  | {
      valid: true;
      totalPages: number;
      actualStart: number;
      actualEnd: number;
      pagesToProcess: number;
      percentageOfDocument: number;
    }
  | { valid: false; totalPages: number; error: string };

export const isFullDocument = (range: PageRange): boolean =>
  range.startPage === undefined && range.endPage === undefined;

export const validatePageRange = (range: PageRange, totalPages: number): PageRangeValidation => {
  const fail = (error: string): PageRangeValidation => ({ valid: false, totalPages, error });

  if (totalPages <= 0) return fail('Could not determine PDF page count');

  const { startPage, endPage } = range;

  if (startPage !== undefined) {
    if (!Number.isInteger(startPage) || startPage < 1) return fail('Start page must be 1 or greater');
    if (startPage > totalPages) return fail(`Start page ${startPage} exceeds total pages (${totalPages})`);
  }

  if (endPage !== undefined) {
    if (!Number.isInteger(endPage) || endPage < 1) return fail('End page must be 1 or greater');
    if (endPage > totalPages) return fail(`End page ${endPage} exceeds total pages (${totalPages})`);
  }

  if (startPage !== undefined && endPage !== undefined && startPage > endPage) {
    return fail(`Start page (${startPage}) cannot be greater than end page (${endPage})`);
  }

  const actualStart = startPage ?? 1;
  const actualEnd = endPage ?? totalPages;
  const pagesToProcess = actualEnd - actualStart + 1;

  return {
    valid: true,
    totalPages,
    actualStart,
    actualEnd,
    pagesToProcess,
    percentageOfDocument: (pagesToProcess / totalPages) * 100,
  };
};
