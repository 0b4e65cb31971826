/**
 * Per-session page cursor over the last successful result set.
 */

import type { PageResult, Row } from './types.js';

export class PageCursor {
  private lastResults: Row[] = [];
  private currentPage = 0;

  constructor(readonly pageSize: number) {
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
    }
  }

  /**
   * Replace the held rows wholesale and rewind to the first page.
   */
  storeResult(rows: readonly Row[]): void {
    this.lastResults = [...rows];
    this.currentPage = 0;
  }

  /**
   * Serve the next slice; advances only when the slice is non-empty.
   */
  nextPage(): PageResult {
    const start = this.currentPage * this.pageSize;
    const rows = this.lastResults.slice(start, start + this.pageSize);

    if (rows.length === 0) {
      return { done: true, page: this.currentPage };
    }

    this.currentPage += 1;
    return { done: false, rows, page: this.currentPage };
  }

  currentPageIndex(): number {
    return this.currentPage;
  }
}
