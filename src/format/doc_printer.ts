/**
 * @module format/doc_printer
 *
 * 布局解析器：把 Doc 树按宽度预算渲染为文本。
 *
 * 对每个 Group 只做一次判定：不含强制换行，且展平宽度加上其后直到下一个
 * 换行点的内容能放进当前行剩余宽度时展平，否则该组内的 Line 全部换行。
 * 判定后不回溯。
 */

import type { Doc } from './doc.js';
import { hasForcedBreak } from './doc.js';

export interface PrintOptions {
  /** Target maximum line width */
  readonly lineLength: number;
}

type Mode = 'flat' | 'break';

interface Command {
  readonly indent: number;
  readonly mode: Mode;
  readonly doc: Doc;
}

/** Display width of `text`, counted in code points */
export function textWidth(value: string): number {
  return Array.from(value).length;
}

/**
 * 判断 `next` 以展平方式输出后，连同 `rest` 中直到下一个换行点的内容，是否不超过 `width`。
 */
function fits(next: Command, rest: readonly Command[], width: number): boolean {
  let remaining = width;
  let restIndex = rest.length;
  const cmds: Command[] = [next];
  while (remaining >= 0) {
    const cmd = cmds.pop();
    if (cmd === undefined) {
      if (restIndex === 0) return true;
      restIndex--;
      const restCmd = rest[restIndex];
      if (restCmd === undefined) return true;
      cmds.push(restCmd);
      continue;
    }
    const { doc, mode, indent } = cmd;
    switch (doc.kind) {
      case 'text':
        remaining -= textWidth(doc.text);
        break;
      case 'concat':
        for (let i = doc.parts.length - 1; i >= 0; i--) {
          const part = doc.parts[i];
          if (part !== undefined) cmds.push({ indent, mode, doc: part });
        }
        break;
      case 'nest':
        cmds.push({ indent: indent + doc.indent, mode, doc: doc.contents });
        break;
      case 'anchor':
        cmds.push({ indent, mode, doc: doc.contents });
        break;
      case 'group':
        cmds.push({ indent, mode: hasForcedBreak(doc) ? 'break' : mode, doc: doc.contents });
        break;
      case 'line':
        if (mode === 'break') return true;
        remaining -= textWidth(doc.flat);
        break;
      case 'hardline':
        return true;
      case 'line-suffix':
      case 'dangling':
        break;
    }
  }
  return false;
}

/**
 * 渲染 Doc 为文本。
 *
 * - 行尾空白在换行时被裁掉
 * - `line-suffix` 在下一次换行（或输出结束）前追加
 */
export function printDoc(doc: Doc, options: PrintOptions): string {
  const out: string[] = [];
  let column = 0;
  let suffixes: Command[] = [];
  const stack: Command[] = [{ indent: 0, mode: 'break', doc }];

  const trimTrailing = (): void => {
    while (out.length > 0) {
      const last = out[out.length - 1] ?? '';
      const trimmed = last.replace(/[ \t]+$/, '');
      if (trimmed.length > 0) {
        out[out.length - 1] = trimmed;
        return;
      }
      out.pop();
    }
  };

  /** 把待输出的行尾内容压回栈中，排在 `cmd` 之前；无待输出内容时返回 false */
  const flushSuffixes = (cmd: Command): boolean => {
    if (suffixes.length === 0) return false;
    stack.push(cmd);
    for (let i = suffixes.length - 1; i >= 0; i--) {
      const suffix = suffixes[i];
      if (suffix !== undefined) stack.push(suffix);
    }
    suffixes = [];
    return true;
  };

  const newline = (indent: number): void => {
    trimTrailing();
    out.push('\n' + ' '.repeat(indent));
    column = indent;
  };

  for (;;) {
    if (stack.length === 0) {
      // 输出结束前补上剩余的行尾内容
      if (suffixes.length === 0) break;
      stack.push(...suffixes.reverse());
      suffixes = [];
    }
    const cmd = stack.pop();
    if (cmd === undefined) break;
    const { doc: current, mode, indent } = cmd;
    switch (current.kind) {
      case 'text':
        out.push(current.text);
        column += textWidth(current.text);
        break;
      case 'concat':
        for (let i = current.parts.length - 1; i >= 0; i--) {
          const part = current.parts[i];
          if (part !== undefined) stack.push({ indent, mode, doc: part });
        }
        break;
      case 'nest':
        stack.push({ indent: indent + current.indent, mode, doc: current.contents });
        break;
      case 'anchor':
        stack.push({ indent, mode, doc: current.contents });
        break;
      case 'group': {
        if (mode === 'flat') {
          stack.push({ indent, mode: 'flat', doc: current.contents });
          break;
        }
        const flat: Command = { indent, mode: 'flat', doc: current.contents };
        const flatten = !hasForcedBreak(current) && fits(flat, stack, options.lineLength - column);
        stack.push(flatten ? flat : { indent, mode: 'break', doc: current.contents });
        break;
      }
      case 'line':
        if (mode === 'flat') {
          out.push(current.flat);
          column += textWidth(current.flat);
        } else if (!flushSuffixes(cmd)) {
          newline(indent);
        }
        break;
      case 'hardline':
        if (!flushSuffixes(cmd)) newline(indent);
        break;
      case 'line-suffix':
        suffixes.push({ indent, mode, doc: current.contents });
        break;
      case 'dangling':
        break;
    }
  }
  trimTrailing();
  return out.join('');
}
