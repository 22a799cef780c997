/**
 * @module format/comment_merger
 *
 * 把提取出的注释与空行放回 Doc 树：
 * - leading / standalone：插入到锚点之前，各占一行
 * - trailing：作为行尾内容追加到锚点所在行，`#` 前恰好两个空格
 * - 容器末尾的注释填入 dangling 插槽
 *
 * 每一项只能放置一次；合并结束后仍未放置的项视为缺陷，抛出 TriviaAttachmentError。
 */

import type { Doc, DocPart } from './doc.js';
import { anchor, concat, hardline, lineSuffix, spanKey } from './doc.js';
import type { TriviaItem } from './trivia.js';
import { Diagnostics, positionAt } from '../diagnostics/diagnostics.js';

export interface MergeOptions {
  /** Maximum consecutive blank lines kept */
  readonly margin: number;
}

type Bucket = Map<string, TriviaItem[]>;

function bucketPush(bucket: Bucket, key: string, item: TriviaItem): void {
  const list = bucket.get(key);
  if (list) list.push(item);
  else bucket.set(key, [item]);
}

function take(bucket: Bucket, key: string): TriviaItem[] {
  const list = bucket.get(key);
  if (!list) return [];
  bucket.delete(key);
  return list;
}

function blankLines(count: number, margin: number): Doc[] {
  return Array.from({ length: Math.min(count, margin) }, () => hardline());
}

/**
 * 将 trivia 合并进 Doc 树，返回新的 Doc。
 *
 * @throws {TriviaAttachmentError} 有注释找不到锚点时抛出
 */
export function mergeTrivia(doc: Doc, trivia: readonly TriviaItem[], source: string, options: MergeOptions): Doc {
  const before: Bucket = new Map();
  const after: Bucket = new Map();
  const end: Bucket = new Map();
  for (const item of trivia) {
    const key = spanKey(item.target.span);
    switch (item.target.placement) {
      case 'before':
        bucketPush(before, key, item);
        break;
      case 'after':
        bucketPush(after, key, item);
        break;
      case 'end':
        bucketPush(end, key, item);
        break;
    }
  }

  const leadingDocs = (items: readonly TriviaItem[]): DocPart[] => {
    const parts: DocPart[] = [];
    for (const item of items) {
      if (item.kind === 'blank-run') parts.push(...blankLines(item.lines, options.margin));
      else parts.push(item.text, hardline());
    }
    return parts;
  };

  const trailingDoc = (items: readonly TriviaItem[]): DocPart[] => {
    const comments = items.filter(item => item.kind === 'comment');
    if (comments.length === 0) return [];
    const parts: DocPart[] = [];
    comments.forEach((item, index) => {
      if (index > 0) parts.push(hardline());
      parts.push(index === 0 ? `  ${item.text}` : item.text);
    });
    return [lineSuffix(...parts)];
  };

  const danglingDocs = (items: readonly TriviaItem[], leadingBreak: boolean): DocPart[] => {
    const parts: DocPart[] = [];
    let first = true;
    for (const item of items) {
      if (item.kind === 'blank-run') {
        parts.push(...blankLines(item.lines, options.margin));
        continue;
      }
      if (!first || leadingBreak) parts.push(hardline());
      parts.push(item.text);
      first = false;
    }
    return parts;
  };

  const walk = (node: Doc): Doc => {
    switch (node.kind) {
      case 'text':
      case 'line':
      case 'hardline':
        return node;
      case 'concat':
        return concat(...node.parts.map(walk));
      case 'nest':
        return { kind: 'nest', indent: node.indent, contents: walk(node.contents) };
      case 'group':
        return { kind: 'group', contents: walk(node.contents) };
      case 'line-suffix':
        return { kind: 'line-suffix', contents: walk(node.contents) };
      case 'anchor': {
        const key = spanKey(node.span);
        const leading = take(before, key);
        const trailing = take(after, key);
        const contents = walk(node.contents);
        if (leading.length === 0 && trailing.length === 0) return anchor(node.span, contents);
        return anchor(node.span, ...leadingDocs(leading), contents, ...trailingDoc(trailing));
      }
      case 'dangling': {
        const items = take(end, spanKey(node.span));
        return concat(...danglingDocs(items, node.leadingBreak));
      }
    }
  };

  const merged = walk(doc);

  for (const bucket of [before, after, end]) {
    for (const items of bucket.values()) {
      const [first] = items;
      if (!first) continue;
      const what = first.kind === 'comment' ? `comment '${first.text}'` : 'blank line';
      return Diagnostics.triviaAttachment(what, positionAt(source, first.position), {
        start: first.position,
        end: first.position + first.text.length,
      }).throw();
    }
  }
  return merged;
}
