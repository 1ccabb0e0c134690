import { Request } from 'express';
import { NotFoundError } from '../utils/errors';

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export interface PageParams {
  page: number;
  pageSize: number;
  limit: number;
  offset: number;
}

export interface PaginatedEnvelope<T> {
  count: number;
  next: string | null;
  previous: string | null;
  pageSize: number;
  totalPages: number;
  currentPage: number;
  results: T[];
}

function positiveInt(raw: unknown): number | null {
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) {
    return null;
  }
  const value = parseInt(raw, 10);
  return value > 0 ? value : null;
}

/**
 * Read `page` and `pageSize` (or `page_size`). Invalid sizes fall back to the
 * default; sizes above the maximum are clamped. An invalid page number is a
 * not-found, as is any page past the last once the count is known.
 */
export function parsePageParams(query: Record<string, unknown>): PageParams {
  const rawPage = query.page;
  let page = 1;
  if (rawPage !== undefined) {
    const parsed = positiveInt(rawPage);
    if (parsed === null) {
      throw new NotFoundError('Invalid page.');
    }
    page = parsed;
  }

  const requestedSize = positiveInt(query.pageSize ?? query.page_size);
  const pageSize = requestedSize === null ? DEFAULT_PAGE_SIZE : Math.min(requestedSize, MAX_PAGE_SIZE);

  return { page, pageSize, limit: pageSize, offset: (page - 1) * pageSize };
}

export function totalPagesFor(count: number, pageSize: number): number {
  return Math.max(1, Math.ceil(count / pageSize));
}

/**
 * Absolute URL of another page of the same listing, keeping every other
 * query parameter.
 */
export function pageLink(baseUrl: string, query: Record<string, unknown>, page: number): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (key === 'page') continue;
    if (typeof value === 'string') {
      params.append(key, value);
    } else if (Array.isArray(value)) {
      for (const item of value) {
        if (typeof item === 'string') params.append(key, item);
      }
    }
  }
  params.set('page', String(page));
  return `${baseUrl}?${params.toString()}`;
}

export function buildEnvelope<T>(
  baseUrl: string,
  query: Record<string, unknown>,
  params: PageParams,
  count: number,
  results: T[]
): PaginatedEnvelope<T> {
  const totalPages = totalPagesFor(count, params.pageSize);
  if (params.page > totalPages) {
    throw new NotFoundError('Invalid page.');
  }

  return {
    count,
    next: params.page < totalPages ? pageLink(baseUrl, query, params.page + 1) : null,
    previous: params.page > 1 ? pageLink(baseUrl, query, params.page - 1) : null,
    pageSize: params.pageSize,
    totalPages,
    currentPage: params.page,
    results
  };
}

export function requestBaseUrl(req: Request): string {
  return `${req.protocol}://${req.get('host') ?? 'localhost'}${req.baseUrl}${req.path}`;
}

/**
 * Shorthand for route handlers: envelope a page of results for this request.
 */
export function paginate<T>(req: Request, params: PageParams, count: number, results: T[]): PaginatedEnvelope<T> {
  return buildEnvelope(requestBaseUrl(req), req.query, params, count, results);
}
