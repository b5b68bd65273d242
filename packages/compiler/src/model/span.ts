/** Half-open `[start, end)` offsets into a template source. */
export interface SourceSpan {
  readonly start: number;
  readonly end: number;
}

export function spanOf(start: number, end: number): SourceSpan {
  return end < start ? { start: end, end: start } : { start, end };
}

export function offsetSpan(span: SourceSpan, delta: number): SourceSpan {
  return { start: span.start + delta, end: span.end + delta };
}

export function coverSpans(first: SourceSpan, last: SourceSpan): SourceSpan {
  return { start: Math.min(first.start, last.start), end: Math.max(first.end, last.end) };
}
