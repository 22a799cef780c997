/**
 * @module lexer
 *
 * 词法分析器：将脚本源代码转换为 Token 流。
 *
 * **功能**：
 * - 识别变量、字面量、flag、运算符和标点符号；关键字统一作为 WORD 输出
 * - 字符串、原始字符串与字符串插值各自作为单个 token，内部的 `#` 不会被当作注释
 * - 注释以 `trivia` 通道输出，语法分析阶段自动跳过
 * - 换行与 `;` 作为语句分隔符单独输出
 * - 记录每个 token 的偏移量、行列位置以及前面是否有空白
 */

import { TokenKind } from './tokens.js';
import type { Position, Token } from '../types.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { REDIRECTIONS } from '../config/semantic.js';

const WORD_TERMINATORS = new Set([' ', '\t', '\n', '\r', '|', ';', '(', ')', '[', ']', '{', '}', ',', '=']);

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return /\p{L}/u.test(ch);
}

function isIdentifierPart(ch: string): boolean {
  return ch !== '' && (isDigit(ch) || ch === '_' || isLetter(ch));
}

function isLineBreak(ch: string): boolean {
  return ch === '\n' || ch === '\r';
}

function isBlank(ch: string): boolean {
  return ch === '' || ch === ' ' || ch === '\t' || isLineBreak(ch);
}

/** Tokens after which a `-1` or `-f` is read as a value rather than an infix minus. */
const OPERAND_ENDINGS = new Set<TokenKind>([
  TokenKind.RPAREN,
  TokenKind.RBRACKET,
  TokenKind.RBRACE,
  TokenKind.INT,
  TokenKind.FLOAT,
  TokenKind.NUMBER_UNIT,
  TokenKind.DATETIME,
  TokenKind.STRING,
  TokenKind.INTERPOLATION,
  TokenKind.VARIABLE,
  TokenKind.CELL_SUFFIX,
  TokenKind.WORD,
]);

const DATETIME_RE = /\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?)?/y;
const RADIX_RE = /0(?:x[0-9a-fA-F_]+|b[01_]+|o[0-7_]+)/y;
const NUMBER_RE = /\d[\d_]*(?:\.\d[\d_]*)?(?:[eE][+-]?\d+)?/y;
const UNIT_RE = /[a-zA-Zµ]+/y;

/**
 * 对源代码进行词法分析，生成 Token 数组（以 EOF 结尾）。
 *
 * @param input - 源代码
 * @param baseOffset - 所有偏移量的起点；解析字符串插值内部表达式时使用
 * @returns Token 数组，每个 token 包含类型、原文、偏移量与位置信息
 *
 * @throws {ParseError} 当遇到未闭合的字符串或非法控制字符时抛出
 *
 * @example
 * ```typescript
 * const tokens = lex('let x = 1  # note');
 * // WORD(let) WORD(x) EQUALS INT(1) COMMENT(# note) EOF
 * ```
 */
export function lex(input: string, baseOffset = 0, basePos: Position = { line: 1, col: 1 }): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  let line = basePos.line;
  let lineStart = -(basePos.col - 1);
  let spaced = true;

  const position = (offset: number): Position => ({ line, col: offset - lineStart + 1 });

  const push = (kind: TokenKind, start: number, startPos: Position, channel?: Token['channel']): void => {
    const tokenBase = {
      kind,
      value: input.slice(start, i),
      start: baseOffset + start,
      end: baseOffset + i,
      pos: startPos,
      spaced,
    } as const;
    tokens.push(channel ? { ...tokenBase, channel } : tokenBase);
    spaced = false;
  };

  const peek = (): string => input[i] ?? '';
  const peekAt = (offset: number): string => input[i + offset] ?? '';

  const next = (): string => {
    const ch = input[i++] ?? '';
    if (ch === '\n' || (ch === '\r' && input[i] !== '\n')) {
      line++;
      lineStart = i;
    }
    return ch;
  };

  const advance = (count: number): void => {
    for (let k = 0; k < count; k++) next();
  };

  const prevSignificant = (): Token | undefined => {
    for (let idx = tokens.length - 1; idx >= 0; idx--) {
      const token = tokens[idx];
      if (token && token.channel !== 'trivia') return token;
    }
    return undefined;
  };

  /** True when the current position reads as the start of a value, not an infix operator. */
  const atValueStart = (): boolean => {
    if (spaced) return true;
    const prev = prevSignificant();
    return prev === undefined || !OPERAND_ENDINGS.has(prev.kind);
  };

  const matchSticky = (re: RegExp): string | null => {
    re.lastIndex = i;
    const m = re.exec(input);
    return m ? m[0] : null;
  };

  const scanQuoted = (quote: string, escapes: boolean, startPos: Position): void => {
    next();
    while (i < input.length) {
      const ch = peek();
      if (escapes && ch === '\\') {
        advance(2);
        continue;
      }
      if (ch === quote) {
        next();
        return;
      }
      next();
    }
    Diagnostics.unterminatedString(startPos).withOffsets({ start: baseOffset + i, end: baseOffset + i }).throw();
  };

  /** Consumes a balanced `( ... )` inside an interpolation, skipping nested strings. */
  const scanInterpolationExpr = (startPos: Position): void => {
    let depth = 0;
    while (i < input.length) {
      const ch = peek();
      if (ch === '"' || ch === "'" || ch === '`') {
        scanQuoted(ch, ch === '"', position(i));
        continue;
      }
      if (ch === '(') depth++;
      if (ch === ')') {
        depth--;
        if (depth === 0) {
          next();
          return;
        }
      }
      next();
    }
    Diagnostics.unterminatedInterpolation(startPos)
      .withOffsets({ start: baseOffset + i, end: baseOffset + i })
      .throw();
  };

  const scanInterpolation = (startPos: Position): void => {
    const quote = peekAt(1);
    advance(2);
    while (i < input.length) {
      const ch = peek();
      if (quote === '"' && ch === '\\') {
        advance(2);
        continue;
      }
      if (ch === quote) {
        next();
        return;
      }
      if (ch === '(') {
        scanInterpolationExpr(startPos);
        continue;
      }
      next();
    }
    Diagnostics.unterminatedInterpolation(startPos)
      .withOffsets({ start: baseOffset + i, end: baseOffset + i })
      .throw();
  };

  /** `.member` chains after a variable or a closing bracket: `.a.0?."quoted key"` */
  const scanMembers = (): void => {
    while (peek() === '.') {
      const after = peekAt(1);
      if (after === '"' || after === "'" || after === '`') {
        next();
        scanQuoted(after, after === '"', position(i));
      } else if (isIdentifierPart(after) || after === '-') {
        next();
        while (isIdentifierPart(peek()) || (peek() === '-' && isIdentifierPart(peekAt(1)))) next();
      } else {
        return;
      }
      if (peek() === '?' || peek() === '!') next();
    }
  };

  const scanWord = (): void => {
    const start = i;
    while (i < input.length) {
      const ch = peek();
      if (WORD_TERMINATORS.has(ch)) break;
      if (ch === ':') {
        const after = peekAt(1);
        if (after !== '/' && after !== '\\') break;
      }
      if (ch === '<' || ch === '>') {
        const sofar = input.slice(start, i);
        const redirect = readRedirection(sofar);
        if (redirect > 0) {
          advance(redirect);
          break;
        }
        if (/^[A-Za-z_][\w-]*$/.test(sofar)) break;
      }
      next();
    }
  };

  /** Length of the redirection operator tail (`>`, `>>`, `>|`) when `word` starts one. */
  const readRedirection = (word: string): number => {
    for (const tail of ['>>', '>|', '>']) {
      if (input.startsWith(tail, i) && REDIRECTIONS.has(word + tail) && isBlank(input[i + tail.length] ?? '')) {
        return tail.length;
      }
    }
    return 0;
  };

  const pushSymbol = (kind: TokenKind, length: number): void => {
    const start = i;
    const startPos = position(i);
    advance(length);
    push(kind, start, startPos);
  };

  // Skip UTF-8 BOM if present
  if (input.charCodeAt(0) === 0xfeff) {
    i++;
    lineStart++;
  }

  while (i < input.length) {
    const ch = peek();
    const start = i;
    const startPos = position(i);

    if (ch === ' ' || ch === '\t') {
      next();
      spaced = true;
      continue;
    }

    if (isLineBreak(ch)) {
      if (ch === '\r' && peekAt(1) === '\n') next();
      next();
      push(TokenKind.NEWLINE, start, startPos);
      spaced = true;
      continue;
    }

    // Line comments
    if (ch === '#') {
      while (i < input.length && !isLineBreak(peek())) next();
      push(TokenKind.COMMENT, start, startPos, 'trivia');
      spaced = true;
      continue;
    }

    if (ch.charCodeAt(0) < 0x20) {
      Diagnostics.unexpectedCharacter(`\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`, startPos)
        .withOffsets({ start: baseOffset + i, end: baseOffset + i + 1 })
        .throw();
    }

    switch (ch) {
      case '|':
        pushSymbol(TokenKind.PIPE, 1);
        continue;
      case ';':
        pushSymbol(TokenKind.SEMICOLON, 1);
        continue;
      case '(':
        pushSymbol(TokenKind.LPAREN, 1);
        continue;
      case '[':
        pushSymbol(TokenKind.LBRACKET, 1);
        continue;
      case '{':
        pushSymbol(TokenKind.LBRACE, 1);
        continue;
      case ',':
        pushSymbol(TokenKind.COMMA, 1);
        continue;
      case ':':
        pushSymbol(TokenKind.COLON, 1);
        continue;
      case ')':
      case ']':
      case '}': {
        const kind = ch === ')' ? TokenKind.RPAREN : ch === ']' ? TokenKind.RBRACKET : TokenKind.RBRACE;
        pushSymbol(kind, 1);
        if (peek() === '.' && (isIdentifierPart(peekAt(1)) || peekAt(1) === '"' || peekAt(1) === "'")) {
          const suffixStart = i;
          const suffixPos = position(i);
          scanMembers();
          push(TokenKind.CELL_SUFFIX, suffixStart, suffixPos);
        }
        continue;
      }
      case '=':
        if (peekAt(1) === '=' || peekAt(1) === '~') pushSymbol(TokenKind.OPERATOR, 2);
        else if (peekAt(1) === '>') pushSymbol(TokenKind.FAT_ARROW, 2);
        else pushSymbol(TokenKind.EQUALS, 1);
        continue;
      case '<':
        if (peekAt(1) === '=') pushSymbol(TokenKind.OPERATOR, 2);
        else pushSymbol(TokenKind.LT, 1);
        continue;
      case '>':
        if (peekAt(1) === '=') pushSymbol(TokenKind.OPERATOR, 2);
        else pushSymbol(TokenKind.GT, 1);
        continue;
      case '!':
        if (peekAt(1) === '=' || peekAt(1) === '~') {
          pushSymbol(TokenKind.OPERATOR, 2);
          continue;
        }
        break;
      case '+':
        if (input.startsWith('++=', i)) pushSymbol(TokenKind.ASSIGN_OP, 3);
        else if (peekAt(1) === '+') pushSymbol(TokenKind.OPERATOR, 2);
        else if (peekAt(1) === '=') pushSymbol(TokenKind.ASSIGN_OP, 2);
        else pushSymbol(TokenKind.OPERATOR, 1);
        continue;
      case '-': {
        const after = peekAt(1);
        if (after === '>') {
          pushSymbol(TokenKind.THIN_ARROW, 2);
          continue;
        }
        if (after === '=') {
          pushSymbol(TokenKind.ASSIGN_OP, 2);
          continue;
        }
        if (atValueStart() && (isLetter(after) || (after === '-' && isLetter(peekAt(2))))) {
          next();
          if (peek() === '-') next();
          while (isIdentifierPart(peek()) || peek() === '-') next();
          push(TokenKind.FLAG, start, startPos);
          continue;
        }
        if (atValueStart() && isDigit(after)) {
          next();
          lexNumber(start, startPos);
          continue;
        }
        if (after === '-' && isBlank(peekAt(2))) {
          advance(2);
          push(TokenKind.WORD, start, startPos);
          continue;
        }
        pushSymbol(TokenKind.OPERATOR, 1);
        continue;
      }
      case '*': {
        let run = 0;
        while (peekAt(run) === '*') run++;
        const after = peekAt(run);
        if (!spaced || isBlank(after) || after === '$' || after === '(' || after === '=' || isDigit(after)) {
          if (run === 1 && after === '=') pushSymbol(TokenKind.ASSIGN_OP, 2);
          else pushSymbol(TokenKind.OPERATOR, Math.min(run, 2));
          continue;
        }
        break;
      }
      case '/': {
        const after = peekAt(1);
        if (after === '=') {
          pushSymbol(TokenKind.ASSIGN_OP, 2);
          continue;
        }
        if (!spaced || isBlank(after) || after === '/' || after === '$' || after === '(' || isDigit(after)) {
          pushSymbol(TokenKind.OPERATOR, after === '/' ? 2 : 1);
          continue;
        }
        break;
      }
      case '.':
        if (input.startsWith('...', i) && !isBlank(peekAt(3))) {
          pushSymbol(TokenKind.SPREAD, 3);
          continue;
        }
        if (peekAt(1) === '.' && peekAt(2) !== '/' && peekAt(2) !== '.') {
          const op = peekAt(2) === '<' || peekAt(2) === '=' ? 3 : 2;
          pushSymbol(TokenKind.RANGE, op);
          continue;
        }
        break;
      case '"':
      case "'":
      case '`':
        scanQuoted(ch, ch === '"', startPos);
        push(TokenKind.STRING, start, startPos);
        continue;
      case '$':
        if (peekAt(1) === '"' || peekAt(1) === "'") {
          scanInterpolation(startPos);
          push(TokenKind.INTERPOLATION, start, startPos);
          continue;
        }
        if (isIdentifierPart(peekAt(1))) {
          next();
          while (isIdentifierPart(peek()) || (peek() === '-' && isLetter(peekAt(1)))) next();
          scanMembers();
          push(TokenKind.VARIABLE, start, startPos);
          continue;
        }
        break;
      case '^':
        next();
        if (peek() === '"' || peek() === "'" || peek() === '`') scanQuoted(peek(), peek() === '"', startPos);
        else scanWord();
        push(TokenKind.EXTERNAL, start, startPos);
        continue;
      default:
        break;
    }

    // Raw strings: r#'...'#
    if (ch === 'r' && peekAt(1) === '#') {
      let hashes = 0;
      while (peekAt(1 + hashes) === '#') hashes++;
      if (peekAt(1 + hashes) === "'") {
        const closing = "'" + '#'.repeat(hashes);
        const end = input.indexOf(closing, i + 2 + hashes);
        if (end < 0) {
          Diagnostics.unterminatedString(startPos).withOffsets({ start: baseOffset + i, end: baseOffset + i }).throw();
        }
        advance(end + closing.length - i);
        push(TokenKind.STRING, start, startPos);
        continue;
      }
    }

    if (isDigit(ch)) {
      lexNumber(start, startPos);
      continue;
    }

    scanWord();
    if (i === start) {
      Diagnostics.unexpectedCharacter(ch, startPos)
        .withOffsets({ start: baseOffset + i, end: baseOffset + i + 1 })
        .throw();
    }
    push(TokenKind.WORD, start, startPos);
  }

  function lexNumber(start: number, startPos: Position): void {
    const datetime = matchSticky(DATETIME_RE);
    if (datetime !== null) {
      advance(datetime.length);
      push(TokenKind.DATETIME, start, startPos);
      return;
    }
    const radix = matchSticky(RADIX_RE);
    if (radix !== null) {
      advance(radix.length);
      push(TokenKind.INT, start, startPos);
      return;
    }
    const num = matchSticky(NUMBER_RE) ?? '';
    advance(num.length);
    const unit = matchSticky(UNIT_RE);
    if (unit !== null) {
      advance(unit.length);
      // Trailing word characters such as `3rd-party` stay part of the token
      scanWord();
      push(TokenKind.NUMBER_UNIT, start, startPos);
      return;
    }
    push(/[.eE]/.test(num) ? TokenKind.FLOAT : TokenKind.INT, start, startPos);
  }

  const eofPos = position(i);
  tokens.push({
    kind: TokenKind.EOF,
    value: '',
    start: baseOffset + i,
    end: baseOffset + i,
    pos: eofPos,
    spaced: true,
  });
  return tokens;
}
