/**
 * @module format/trivia
 *
 * 注释与空行提取：根据 token 流中的注释与语法树的 span 边界，恢复解析器丢弃的非语义内容，
 * 并把每一项分类为 leading / trailing / standalone。
 *
 * 语法树中的“容器”（程序、语句块、列表、记录、表格、签名参数、match 分支、多段管道、if/else 分支）
 * 各自持有一组有序的子项。注释归属于包含它的最内层容器：
 * - 位于某个子项内部，或与前一个子项结束于同一行：trailing
 * - 后面还有子项且中间无空行：leading（紧贴下一个子项）
 * - 后面还有子项但隔着空行：standalone，锚定在下一个子项之前
 * - 后面没有子项：standalone，放入容器末尾插槽
 *
 * 空行（BlankRun）只在语句容器中记录，渲染时按 margin 截断。
 */

import type { Block, Program, Span, SyntaxNode, Token } from '../types.js';
import { TokenKind } from '../frontend/tokens.js';
import { DefaultAstVisitor } from '../ast/ast_visitor.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';

export type TriviaKind = 'comment' | 'blank-run';
export type TriviaAttachment = 'leading' | 'trailing' | 'standalone';

/**
 * 注释或空行应放回的位置：
 * - `before`：锚定节点之前
 * - `after`：锚定节点所在行的行尾
 * - `end`：容器末尾插槽（span 为容器内部范围）
 */
export type TriviaTarget =
  | { readonly placement: 'before'; readonly span: Span }
  | { readonly placement: 'after'; readonly span: Span }
  | { readonly placement: 'end'; readonly span: Span };

export interface TriviaItem {
  readonly kind: TriviaKind;
  /** Comment text, `''` for blank runs */
  readonly text: string;
  /** Number of empty lines, `0` for comments */
  readonly lines: number;
  /** Start offset in the source */
  readonly position: number;
  readonly attachment: TriviaAttachment;
  readonly target: TriviaTarget;
}

export type ContainerKind = 'statements' | 'elements';

export interface Container {
  readonly kind: ContainerKind;
  /** Range between the delimiters; for a pipeline, the pipeline itself */
  readonly interior: Span;
  readonly items: readonly Span[];
}

/** Range strictly inside a delimited span such as `{ ... }` or `[ ... ]` */
export function interiorOf(span: Span): Span {
  return { start: span.start + 1, end: Math.max(span.start + 1, span.end - 1) };
}

function spansOf(nodes: readonly SyntaxNode[]): Span[] {
  return nodes.map(node => node.span);
}

class ContainerCollector extends DefaultAstVisitor<Container[]> {
  protected override visitNode(node: SyntaxNode, out: Container[]): void {
    switch (node.kind) {
      case 'Program':
        out.push({ kind: 'statements', interior: node.span, items: spansOf(node.statements) });
        break;
      case 'Block':
        out.push(blockContainer(node));
        break;
      case 'Pipeline':
        if (node.stages.length > 1) {
          out.push({ kind: 'elements', interior: node.span, items: spansOf(node.stages) });
        }
        break;
      case 'List':
        out.push({ kind: 'elements', interior: interiorOf(node.span), items: spansOf(node.items) });
        break;
      case 'Record':
        out.push({ kind: 'elements', interior: interiorOf(node.span), items: spansOf(node.entries) });
        break;
      case 'Table':
        out.push({
          kind: 'elements',
          interior: interiorOf(node.span),
          items: spansOf([node.header, ...node.rows]),
        });
        break;
      case 'Signature':
        out.push({ kind: 'elements', interior: interiorOf(node.paramsSpan), items: spansOf(node.params) });
        break;
      case 'Match':
        out.push({ kind: 'elements', interior: interiorOf(node.armsSpan), items: spansOf(node.arms) });
        break;
      case 'If':
        // then 块与 else 之间的注释跟随 then 块
        if (node.otherwise) {
          out.push({
            kind: 'elements',
            interior: { start: node.then.span.end, end: node.otherwise.span.end },
            items: [node.then.span, node.otherwise.span],
          });
        }
        break;
      case 'StringInterpolation':
        // 插值内容是单个 token，其中不会出现注释
        return;
      default:
        break;
    }
    super.visitNode(node, out);
  }
}

function blockContainer(block: Block): Container {
  return { kind: 'statements', interior: interiorOf(block.span), items: spansOf(block.statements) };
}

/**
 * 收集程序中的全部容器（文档顺序）。
 */
export function collectContainers(program: Program): Container[] {
  const out: Container[] = [];
  new ContainerCollector().visit(program, out);
  return out;
}

function contains(outer: Span, offset: number): boolean {
  return outer.start <= offset && offset < outer.end;
}

function innermostContainer(containers: readonly Container[], offset: number): Container | undefined {
  let best: Container | undefined;
  for (const container of containers) {
    if (!contains(container.interior, offset)) continue;
    if (!best || container.interior.end - container.interior.start <= best.interior.end - best.interior.start) {
      best = container;
    }
  }
  return best;
}

function hasNewline(source: string, from: number, to: number): boolean {
  for (let i = from; i < to; i++) {
    const code = source.charCodeAt(i);
    if (code === 10 || code === 13) return true;
  }
  return false;
}

/**
 * 统计 `[from, to)` 之间完全空白的整行数。
 */
export function countBlankLines(source: string, from: number, to: number): number {
  const lines = source.slice(from, to).split(/\r\n|\r|\n/);
  let blank = 0;
  // 首段属于前一项所在行，末段属于后一项所在行
  for (let i = 1; i < lines.length - 1; i++) {
    if ((lines[i] ?? '').trim() === '') blank++;
  }
  return blank;
}

interface CommentEntry {
  readonly text: string;
  readonly span: Span;
  readonly container: Container;
  readonly attachment: TriviaAttachment;
  readonly target: TriviaTarget;
}

function classifyComment(source: string, comment: Token, container: Container): CommentEntry {
  const span: Span = { start: comment.start, end: comment.end };
  const text = comment.value.replace(/\s+$/, '');
  const base = { text, span, container };

  let prev: Span | undefined;
  let next: Span | undefined;
  for (const item of container.items) {
    if (item.start < span.start && span.start < item.end) {
      return { ...base, attachment: 'trailing', target: { placement: 'after', span: item } };
    }
    if (item.end <= span.start) prev = item;
    if (item.start >= span.end && next === undefined) next = item;
  }

  if (prev && !hasNewline(source, prev.end, span.start)) {
    return { ...base, attachment: 'trailing', target: { placement: 'after', span: prev } };
  }
  if (next) {
    const attachment = countBlankLines(source, span.end, next.start) > 0 ? 'standalone' : 'leading';
    return { ...base, attachment, target: { placement: 'before', span: next } };
  }
  return { ...base, attachment: 'standalone', target: { placement: 'end', span: container.interior } };
}

/**
 * 从源代码与语法树提取 trivia 序列（按位置排序）。
 *
 * @param source - 源代码
 * @param program - 语法树
 * @param tokens - 词法分析得到的完整 token 流（含注释）
 */
export function extractTrivia(source: string, program: Program, tokens: readonly Token[]): TriviaItem[] {
  const containers = collectContainers(program);
  const comments: CommentEntry[] = [];
  for (const token of tokens) {
    if (token.kind !== TokenKind.COMMENT) continue;
    const container = innermostContainer(containers, token.start);
    if (!container) {
      return Diagnostics.triviaAttachment('comment', token.pos, { start: token.start, end: token.end }).throw();
    }
    comments.push(classifyComment(source, token, container));
  }

  const items: TriviaItem[] = comments.map((c): TriviaItem => ({
    kind: 'comment',
    text: c.text,
    lines: 0,
    position: c.span.start,
    attachment: c.attachment,
    target: c.target,
  }));

  for (const container of containers) {
    if (container.kind !== 'statements') continue;
    items.push(...blankRunsIn(source, container, comments));
  }

  return items.sort((a, b) => a.position - b.position || rank(a) - rank(b));
}

/** Blank runs sort ahead of a comment at the same offset */
function rank(item: TriviaItem): number {
  return item.kind === 'blank-run' ? 0 : 1;
}

/**
 * 语句容器中相邻两项（语句或注释）之间的空行。首项之前与末项之后的空行不保留。
 */
function blankRunsIn(source: string, container: Container, comments: readonly CommentEntry[]): TriviaItem[] {
  type Thing = { readonly span: Span; readonly target: TriviaTarget };
  const things: Thing[] = container.items.map((span): Thing => ({
    span,
    target: { placement: 'before', span },
  }));
  for (const comment of comments) {
    if (comment.container === container) things.push({ span: comment.span, target: comment.target });
  }
  things.sort((a, b) => a.span.start - b.span.start);

  const runs: TriviaItem[] = [];
  let lastEnd: number | null = null;
  for (const current of things) {
    if (lastEnd !== null && current.target.placement !== 'after' && lastEnd <= current.span.start) {
      const lines = countBlankLines(source, lastEnd, current.span.start);
      if (lines > 0) {
        runs.push({
          kind: 'blank-run',
          text: '',
          lines,
          position: lastEnd,
          attachment: 'standalone',
          target: current.target,
        });
      }
    }
    lastEnd = lastEnd === null ? current.span.end : Math.max(lastEnd, current.span.end);
  }
  return runs;
}
