import { IndexOutOfRangeError } from './errors.js';
import type { Entry } from './types.js';

export const MIN_PAGE_SIZE = 1;
export const MAX_PAGE_SIZE = 100;
export const DEFAULT_PAGE_SIZE = 20;

export interface Page {
  readonly items: readonly Entry[];
  readonly pageIndex: number;
  readonly pageSize: number;
  readonly pageCount: number;
  readonly totalCount: number;
  /** 1-based number of the first item on this page within the whole listing. */
  readonly firstOrdinal: number;
}

/** The addressable part of a session view. */
export interface PagedView {
  readonly entries: readonly Entry[];
  readonly pageIndex: number;
  readonly pageSize: number;
}

export function clampPageSize(size: number): number {
  if (!Number.isFinite(size)) return DEFAULT_PAGE_SIZE;
  return Math.min(MAX_PAGE_SIZE, Math.max(MIN_PAGE_SIZE, Math.floor(size)));
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Directories first, then case-insensitive name, ties broken by raw path. */
export function sortEntries(entries: readonly Entry[]): Entry[] {
  return [...entries].sort((a, b) => {
    if (a.kind !== b.kind) return a.kind === 'directory' ? -1 : 1;
    const byName = compareText(a.name.toLowerCase(), b.name.toLowerCase());
    return byName !== 0 ? byName : compareText(a.path, b.path);
  });
}

export function pageCountFor(totalCount: number, pageSize: number): number {
  return Math.max(1, Math.ceil(totalCount / clampPageSize(pageSize)));
}

/** Requests past either end land on the nearest valid page. */
export function paginate(entries: readonly Entry[], pageSize: number, pageIndex: number): Page {
  const size = clampPageSize(pageSize);
  const pageCount = pageCountFor(entries.length, size);
  const index = Math.min(pageCount - 1, Math.max(0, Math.floor(pageIndex)));
  const start = index * size;
  return {
    items: entries.slice(start, start + size),
    pageIndex: index,
    pageSize: size,
    pageCount,
    totalCount: entries.length,
    firstOrdinal: start + 1,
  };
}

export interface PageStep {
  readonly pageIndex: number;
  /** True when the step was a no-op because the view is already at that end. */
  readonly boundary: boolean;
}

export function stepPage(view: PagedView, delta: 1 | -1): PageStep {
  const pageCount = pageCountFor(view.entries.length, view.pageSize);
  const target = view.pageIndex + delta;
  if (target < 0 || target >= pageCount) {
    return { pageIndex: view.pageIndex, boundary: true };
  }
  return { pageIndex: target, boundary: false };
}

/** `n` is 1-based within the current page's rendered order. */
export function resolveIndex(view: PagedView, n: number): Entry {
  const page = paginate(view.entries, view.pageSize, view.pageIndex);
  if (!Number.isInteger(n) || n < 1 || n > page.items.length) {
    throw new IndexOutOfRangeError(n, page.items.length);
  }
  const entry = page.items[n - 1];
  if (!entry) {
    throw new IndexOutOfRangeError(n, page.items.length);
  }
  return entry;
}
