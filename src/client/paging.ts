/**
 * paging.ts: Lazily traversable result pages.
 *
 * Spotify returns collections in two envelopes:
 *   Page<T>        offset-based, with next and previous URLs
 *   CursorPage<T>  cursor-based, forward only
 *
 * A page is an immutable read-only list of its items. It is bound at
 * construction to the requester that fetches adjacent pages and to the decoder
 * of its item kind, so next/previous pages decode the same way.
 *
 * next/previous URLs are used exactly as the service returned them.
 * Every step of a walk is one GET; walks are sequential and stop at the first
 * URL or href already visited, so a self-referencing `next` on the last page
 * neither loops nor yields a duplicate.
 */

import type { Cursor } from './schemas/paging.js';
import type { CursorItemKind, OffsetItemKind } from './item-kinds.js';
import { UnsupportedDirectionError } from './types.js';

/** The capability a page needs to fetch its neighbours. */
export interface PagingRequester {
  get(url: string): Promise<unknown>;
}

export interface PageData<T> {
  href: string;
  items: readonly T[];
  limit: number;
  offset: number;
  total: number | null;
  next: string | null;
  previous: string | null;
}

export interface CursorPageData<T> {
  href: string;
  items: readonly T[];
  limit: number;
  next: string | null;
  cursor: Cursor;
  total: number | null;
}

export interface PageBinding<T> {
  readonly itemKind: OffsetItemKind;
  readonly requester: PagingRequester;
  readonly decode: (body: unknown) => PageData<T>;
}

export interface CursorPageBinding<T> {
  readonly itemKind: CursorItemKind;
  readonly requester: PagingRequester;
  readonly decode: (body: unknown) => CursorPageData<T>;
}

/** What the walk functions need from a page. */
export interface Traversable<P> {
  readonly paging: 'offset' | 'cursor';
  readonly href: string;
  readonly next: string | null;
  readonly previous: string | null;
  getNext(): Promise<P | null>;
  getPrevious(): Promise<P | null>;
}

// ---------------------------------------------------------------------------
// Walks
// ---------------------------------------------------------------------------

async function* walk<P extends Traversable<P>>(
  start: P,
  link: (page: P) => string | null,
  step: (page: P) => Promise<P | null>,
  seen: Set<string>,
): AsyncGenerator<P, void, undefined> {
  seen.add(start.href);
  let current = start;
  for (;;) {
    const url = link(current);
    if (url === null || seen.has(url)) return;
    const following = await step(current);
    if (following === null || seen.has(following.href)) return;
    seen.add(following.href);
    yield following;
    current = following;
  }
}

/** Pages after `start`, nearest first. `start` itself is not yielded. */
export function walkForward<P extends Traversable<P>>(
  start: P,
  seen: Set<string> = new Set(),
): AsyncGenerator<P, void, undefined> {
  return walk(start, (p) => p.next, (p) => p.getNext(), seen);
}

/**
 * Pages before `start`, nearest first. `start` itself is not yielded.
 * Fails with UnsupportedDirectionError on cursor-based pages.
 */
export function walkBackward<P extends Traversable<P>>(
  start: P,
  seen: Set<string> = new Set(),
): AsyncGenerator<P, void, undefined> {
  if (start.paging === 'cursor') {
    throw new UnsupportedDirectionError(start.href);
  }
  return walk(start, (p) => p.previous, (p) => p.getPrevious(), seen);
}

/**
 * collectForward: `page` followed by up to `maxCount - 1` following pages.
 *
 * Omitting maxCount walks to the end of the collection. Never requests more
 * than maxCount - 1 pages.
 */
export async function collectForward<P extends Traversable<P>>(page: P, maxCount?: number): Promise<P[]> {
  if (maxCount !== undefined && (!Number.isInteger(maxCount) || maxCount < 1)) {
    throw new RangeError(`maxCount must be a positive integer, got ${maxCount}`);
  }
  const pages: P[] = [page];
  if (maxCount !== undefined && pages.length >= maxCount) return pages;

  for await (const following of walkForward(page)) {
    pages.push(following);
    if (maxCount !== undefined && pages.length >= maxCount) break;
  }
  return pages;
}

/**
 * collectAll: every page of the collection in order: the pages before `page`
 * (offset paging only), `page`, then the pages after it.
 */
export async function collectAll<P extends Traversable<P>>(page: P): Promise<P[]> {
  const seen = new Set<string>([page.href]);

  const before: P[] = [];
  if (page.paging === 'offset') {
    for await (const previous of walkBackward(page, seen)) {
      before.push(previous);
    }
    before.reverse();
  }

  const after: P[] = [];
  for await (const following of walkForward(page, seen)) {
    after.push(following);
  }

  return [...before, page, ...after];
}

/** Items of every page, in page order. Items are not de-duplicated. */
export function flattenItems<T>(pages: Iterable<{ readonly items: readonly T[] }>): T[] {
  const items: T[] = [];
  for (const page of pages) {
    items.push(...page.items);
  }
  return items;
}

// ---------------------------------------------------------------------------
// List view shared by both page kinds
// ---------------------------------------------------------------------------

abstract class PageView<T> implements Iterable<T> {
  readonly items: readonly T[];

  protected constructor(items: readonly T[]) {
    this.items = Object.freeze([...items]);
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Item at `index`, or undefined when out of range. */
  get(index: number): T | undefined {
    return index >= 0 && index < this.items.length ? this.items[index] : undefined;
  }

  /**
   * Identity comparison, as Array.prototype.includes. Decoded items are fresh
   * objects, so a structurally equal copy is not contained; match on a field
   * such as `id` or `uri` to find one.
   */
  contains(item: T): boolean {
    return this.items.includes(item);
  }

  /** Identity comparison, like contains. -1 when absent. */
  indexOf(item: T): number {
    return this.items.indexOf(item);
  }

  slice(start?: number, end?: number): T[] {
    return this.items.slice(start, end);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}

// ---------------------------------------------------------------------------
// Page
// ---------------------------------------------------------------------------

export class Page<T> extends PageView<T> implements Traversable<Page<T>> {
  readonly paging = 'offset' as const;
  readonly href: string;
  readonly limit: number;
  readonly offset: number;
  readonly total: number | null;
  readonly next: string | null;
  readonly previous: string | null;
  private readonly binding: PageBinding<T>;

  constructor(data: PageData<T>, binding: PageBinding<T>) {
    super(data.items);
    this.href = data.href;
    this.limit = data.limit;
    this.offset = data.offset;
    this.total = data.total;
    this.next = data.next;
    this.previous = data.previous;
    this.binding = binding;
  }

  get itemKind(): OffsetItemKind {
    return this.binding.itemKind;
  }

  get requester(): PagingRequester {
    return this.binding.requester;
  }

  /** The following page, or null without a request when there is none. */
  getNext(): Promise<Page<T> | null> {
    return this.fetch(this.next);
  }

  /** The preceding page, or null without a request when there is none. */
  getPrevious(): Promise<Page<T> | null> {
    return this.fetch(this.previous);
  }

  forward(): AsyncGenerator<Page<T>, void, undefined> {
    return walkForward<Page<T>>(this);
  }

  backward(): AsyncGenerator<Page<T>, void, undefined> {
    return walkBackward<Page<T>>(this);
  }

  collectForward(maxCount?: number): Promise<Page<T>[]> {
    return collectForward<Page<T>>(this, maxCount);
  }

  collectAll(): Promise<Page<T>[]> {
    return collectAll<Page<T>>(this);
  }

  async collectAllItems(): Promise<T[]> {
    return flattenItems(await this.collectAll());
  }

  private async fetch(url: string | null): Promise<Page<T> | null> {
    if (url === null) return null;
    const body = await this.binding.requester.get(url);
    return new Page(this.binding.decode(body), this.binding);
  }
}

// ---------------------------------------------------------------------------
// CursorPage
// ---------------------------------------------------------------------------

export class CursorPage<T> extends PageView<T> implements Traversable<CursorPage<T>> {
  readonly paging = 'cursor' as const;
  readonly href: string;
  readonly limit: number;
  readonly next: string | null;
  readonly previous = null;
  readonly cursor: Cursor;
  readonly total: number | null;
  private readonly binding: CursorPageBinding<T>;

  constructor(data: CursorPageData<T>, binding: CursorPageBinding<T>) {
    super(data.items);
    this.href = data.href;
    this.limit = data.limit;
    this.next = data.next;
    this.cursor = { ...data.cursor };
    this.total = data.total;
    this.binding = binding;
  }

  get itemKind(): CursorItemKind {
    return this.binding.itemKind;
  }

  get requester(): PagingRequester {
    return this.binding.requester;
  }

  async getNext(): Promise<CursorPage<T> | null> {
    if (this.next === null) return null;
    const body = await this.binding.requester.get(this.next);
    return new CursorPage(this.binding.decode(body), this.binding);
  }

  /** Always rejects: cursor-based pages have no way back. */
  async getPrevious(): Promise<CursorPage<T> | null> {
    throw new UnsupportedDirectionError(this.href);
  }

  forward(): AsyncGenerator<CursorPage<T>, void, undefined> {
    return walkForward<CursorPage<T>>(this);
  }

  collectForward(maxCount?: number): Promise<CursorPage<T>[]> {
    return collectForward<CursorPage<T>>(this, maxCount);
  }

  collectAll(): Promise<CursorPage<T>[]> {
    return collectAll<CursorPage<T>>(this);
  }

  async collectAllItems(): Promise<T[]> {
    return flattenItems(await this.collectAll());
  }
}
