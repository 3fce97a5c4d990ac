/**
 * Source positions carried alongside every syntax node
 */

/**
 * Byte range in the source text
 */
export interface Span {
  start: number;
  end: number;
}

/**
 * A value paired with the span it was parsed from
 */
export interface Spanned<T> {
  readonly v: T;
  readonly span: Span;
}

export const ZERO_SPAN: Span = { start: 0, end: 0 };

export function spanned<T>(v: T, span: Span = ZERO_SPAN): Spanned<T> {
  return { v, span };
}

/**
 * Smallest span covering both inputs
 */
export function joinSpans(a: Span, b: Span): Span {
  return { start: Math.min(a.start, b.start), end: Math.max(a.end, b.end) };
}
