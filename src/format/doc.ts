/**
 * @module format/doc
 *
 * 布局文档（Doc）：描述“输出包含什么”，与“按宽度如何换行”解耦。
 *
 * 基本变体：Text、Concat、Nest、Line（展平为空格或空串）、HardLine、Group。
 * 额外变体：
 * - `line-suffix`：延迟到下一次换行前输出的文本（行尾注释）
 * - `anchor`：标记某个语法节点生成的片段，供注释合并定位
 * - `dangling`：容器末尾的注释插槽
 */

import type { Span } from '../types.js';

export type Doc =
  | TextDoc
  | ConcatDoc
  | NestDoc
  | LineDoc
  | HardLineDoc
  | GroupDoc
  | LineSuffixDoc
  | AnchorDoc
  | DanglingDoc;

export interface TextDoc {
  readonly kind: 'text';
  readonly text: string;
}

export interface ConcatDoc {
  readonly kind: 'concat';
  readonly parts: readonly Doc[];
}

export interface NestDoc {
  readonly kind: 'nest';
  /** Extra indentation in columns */
  readonly indent: number;
  readonly contents: Doc;
}

export interface LineDoc {
  readonly kind: 'line';
  /** Text used when the enclosing group is flat: `' '` for a line, `''` for a softline */
  readonly flat: string;
}

export interface HardLineDoc {
  readonly kind: 'hardline';
}

export interface GroupDoc {
  readonly kind: 'group';
  readonly contents: Doc;
}

export interface LineSuffixDoc {
  readonly kind: 'line-suffix';
  readonly contents: Doc;
}

export interface AnchorDoc {
  readonly kind: 'anchor';
  readonly span: Span;
  readonly contents: Doc;
}

export interface DanglingDoc {
  readonly kind: 'dangling';
  /** Interior span of the container the slot closes */
  readonly span: Span;
  /** Whether the first comment starts on a new line */
  readonly leadingBreak: boolean;
}

export type DocKind = Doc['kind'];

const EMPTY: ConcatDoc = { kind: 'concat', parts: [] };
const HARDLINE: HardLineDoc = { kind: 'hardline' };
const LINE: LineDoc = { kind: 'line', flat: ' ' };
const SOFTLINE: LineDoc = { kind: 'line', flat: '' };

export type DocPart = Doc | string;

function toDoc(part: DocPart): Doc {
  return typeof part === 'string' ? text(part) : part;
}

export function text(value: string): TextDoc {
  return { kind: 'text', text: value };
}

export function concat(...parts: readonly DocPart[]): Doc {
  if (parts.length === 0) return EMPTY;
  if (parts.length === 1 && parts[0] !== undefined) return toDoc(parts[0]);
  return { kind: 'concat', parts: parts.map(toDoc) };
}

export function nest(indent: number, ...parts: readonly DocPart[]): NestDoc {
  return { kind: 'nest', indent, contents: concat(...parts) };
}

/** 展平时输出一个空格 */
export function line(): LineDoc {
  return LINE;
}

/** 展平时不输出任何内容 */
export function softline(): LineDoc {
  return SOFTLINE;
}

export function hardline(): HardLineDoc {
  return HARDLINE;
}

export function group(...parts: readonly DocPart[]): GroupDoc {
  return { kind: 'group', contents: concat(...parts) };
}

export function lineSuffix(...parts: readonly DocPart[]): LineSuffixDoc {
  return { kind: 'line-suffix', contents: concat(...parts) };
}

export function anchor(span: Span, ...parts: readonly DocPart[]): AnchorDoc {
  return { kind: 'anchor', span, contents: concat(...parts) };
}

export function dangling(span: Span, leadingBreak = true): DanglingDoc {
  return { kind: 'dangling', span, leadingBreak };
}

export function empty(): Doc {
  return EMPTY;
}

/**
 * 用分隔符连接多个 Doc
 */
export function join(separator: readonly DocPart[], docs: readonly DocPart[]): Doc {
  const parts: DocPart[] = [];
  docs.forEach((doc, index) => {
    if (index > 0) parts.push(...separator);
    parts.push(doc);
  });
  return concat(...parts);
}

export function spanKey(span: Span): string {
  return `${span.start}:${span.end}`;
}

const forcedBreakCache = new WeakMap<Doc, boolean>();

/**
 * 判断 Doc 是否必然换行（包含 HardLine 或行尾注释）。结果按节点缓存。
 */
export function hasForcedBreak(doc: Doc): boolean {
  const cached = forcedBreakCache.get(doc);
  if (cached !== undefined) return cached;
  let result: boolean;
  switch (doc.kind) {
    case 'hardline':
    case 'line-suffix':
      result = true;
      break;
    case 'concat':
      result = doc.parts.some(hasForcedBreak);
      break;
    case 'nest':
    case 'group':
    case 'anchor':
      result = hasForcedBreak(doc.contents);
      break;
    case 'text':
    case 'line':
    case 'dangling':
      result = false;
      break;
  }
  forcedBreakCache.set(doc, result);
  return result;
}
