import type { ParserContext } from './context.js';
import type { Span, Token } from '../types.js';

type SpanSource = Token | { span: Span };

function toSpan(source: SpanSource): Span {
  if ('span' in source) {
    return source.span;
  }
  return { start: source.start, end: source.end };
}

export function spanFromSources(...sources: SpanSource[]): Span {
  let start = Number.POSITIVE_INFINITY;
  let end = Number.NEGATIVE_INFINITY;
  for (const source of sources) {
    const span = toSpan(source);
    start = Math.min(start, span.start);
    end = Math.max(end, span.end);
  }
  if (start > end) return { start: 0, end: 0 };
  return { start, end };
}

export function lastConsumedToken(ctx: ParserContext): Token {
  return ctx.previous();
}

/** Span from `start` up to the last consumed token. */
export function spanSince(ctx: ParserContext, start: Token | number): Span {
  const from = typeof start === 'number' ? start : start.start;
  return { start: from, end: lastConsumedToken(ctx).end };
}

export function assignSpan<T extends { span: Span }>(node: T, span: Span): T {
  node.span = span;
  return node;
}
