// Structured diagnostics with error codes, spans, and the error taxonomy

import type { Location, Position, Span } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
  Hint = 'hint',
}

export enum DiagnosticCode {
  // Lexer errors (L001-L099)
  L001_UnexpectedCharacter = 'L001',
  L002_UnterminatedString = 'L002',
  L003_UnterminatedInterpolation = 'L003',

  // Parser errors (P001-P099)
  P001_ExpectedIdentifier = 'P001',
  P003_ExpectedToken = 'P003',
  P005_UnexpectedToken = 'P005',
  P007_ExpectedExpression = 'P007',
  P008_ExpectedType = 'P008',
  P012_IncompleteConstruction = 'P012',

  // Formatter defects (F001-F099)
  F001_UnsupportedConstruct = 'F001',
  F002_TriviaAttachment = 'F002',

  // Configuration errors (C001-C099)
  C001_ConfigReadFailed = 'C001',
  C002_ConfigInvalidFormat = 'C002',
  C003_ConfigUnknownOption = 'C003',
  C004_ConfigInvalidOptionType = 'C004',
  C005_ConfigInvalidOptionValue = 'C005',
  C006_ConfigInvalidExcludePattern = 'C006',
  C007_ConfigFileNotFound = 'C007',

  // File system errors (I001-I099)
  I001_PathNotFound = 'I001',
  I002_FileAccessFailed = 'I002',
  I003_NotAFileOrDirectory = 'I003',

  // CLI usage errors (U001-U099)
  U001_InvalidArguments = 'U001',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Location;
  /** Offset range in the source, when the diagnostic points into one */
  readonly offsets?: Span;
  /** File the diagnostic belongs to, filled in by the batch runner */
  readonly file?: string;
}

export type ErrorKind = 'parse' | 'unsupported' | 'trivia' | 'config' | 'io' | 'usage';

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;
  public readonly kind: ErrorKind;

  constructor(diagnostic: Diagnostic, kind: ErrorKind) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.kind = kind;
    this.name = 'DiagnosticError';
  }

  get pos(): Position {
    return this.diagnostic.span.start;
  }
}

/** 源代码语法错误：仅对当前文件致命 */
export class ParseError extends DiagnosticError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic, 'parse');
    this.name = 'ParseError';
  }
}

/** 构建器遇到没有布局规则的节点 */
export class UnsupportedConstructError extends DiagnosticError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic, 'unsupported');
    this.name = 'UnsupportedConstructError';
  }
}

/** 注释或空行无法放回文档 */
export class TriviaAttachmentError extends DiagnosticError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic, 'trivia');
    this.name = 'TriviaAttachmentError';
  }
}

/** Invalid configuration: aborts the whole run before any file is touched. */
export class ConfigError extends DiagnosticError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic, 'config');
    this.name = 'ConfigError';
  }
}

export class FileIOError extends DiagnosticError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic, 'io');
    this.name = 'FileIOError';
  }
}

export class UsageError extends DiagnosticError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic, 'usage');
    this.name = 'UsageError';
  }
}

function errorClassFor(code: DiagnosticCode): new (diagnostic: Diagnostic) => DiagnosticError {
  switch (code[0]) {
    case 'L':
    case 'P':
      return ParseError;
    case 'C':
      return ConfigError;
    case 'I':
      return FileIOError;
    case 'U':
      return UsageError;
    default:
      return code === DiagnosticCode.F002_TriviaAttachment
        ? TriviaAttachmentError
        : UnsupportedConstructError;
  }
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Location;
  private offsets?: Span;
  private file?: string;

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  static warning(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Warning).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withSpan(span: Location): DiagnosticBuilder {
    this.span = span;
    return this;
  }

  withPosition(pos: Position): DiagnosticBuilder {
    this.span = { start: pos, end: pos };
    return this;
  }

  withOffsets(offsets: Span): DiagnosticBuilder {
    this.offsets = offsets;
    return this;
  }

  withFile(file: string): DiagnosticBuilder {
    this.file = file;
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      span: this.span,
      ...(this.offsets ? { offsets: this.offsets } : {}),
      ...(this.file !== undefined ? { file: this.file } : {}),
    };
  }

  toError(): DiagnosticError {
    const diagnostic = this.build();
    const ErrorClass = errorClassFor(diagnostic.code);
    return new ErrorClass(diagnostic);
  }

  throw(): never {
    throw this.toError();
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  unexpectedCharacter: (char: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L001_UnexpectedCharacter)
      .withMessage(`Unexpected character '${char}'`)
      .withPosition(pos),

  unterminatedString: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L002_UnterminatedString)
      .withMessage('Unterminated string literal')
      .withPosition(pos),

  unterminatedInterpolation: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L003_UnterminatedInterpolation)
      .withMessage('Unterminated string interpolation')
      .withPosition(pos),

  expectedIdentifier: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P001_ExpectedIdentifier)
      .withMessage('Expected identifier')
      .withPosition(pos),

  expectedToken: (expected: string, actual: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P003_ExpectedToken)
      .withMessage(`Expected '${expected}', got '${actual}'`)
      .withPosition(pos),

  unexpectedToken: (token: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P005_UnexpectedToken)
      .withMessage(`Unexpected token '${token}'`)
      .withPosition(pos),

  expectedExpression: (actual: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P007_ExpectedExpression)
      .withMessage(`Expected expression, got '${actual}'`)
      .withPosition(pos),

  expectedType: (actual: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P008_ExpectedType)
      .withMessage(`Expected type, got '${actual}'`)
      .withPosition(pos),

  incompleteConstruction: (what: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P012_IncompleteConstruction)
      .withMessage(`Incomplete ${what}`)
      .withPosition(pos),

  unsupportedConstruct: (kind: string, span: Location, offsets: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.F001_UnsupportedConstruct)
      .withMessage(`No layout rule for syntax node '${kind}'`)
      .withSpan(span)
      .withOffsets(offsets),

  triviaAttachment: (what: string, pos: Position, offsets: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.F002_TriviaAttachment)
      .withMessage(`Could not place ${what} back into the output`)
      .withPosition(pos)
      .withOffsets(offsets),

  config: (code: DiagnosticCode, message: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(code).withMessage(message).withPosition(dummyPosition()),

  io: (code: DiagnosticCode, message: string, file: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(code).withMessage(message).withPosition(dummyPosition()).withFile(file),

  usage: (message: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.U001_InvalidArguments)
      .withMessage(message)
      .withPosition(dummyPosition()),
};

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const { severity, code, message, span } = diagnostic;
  const where = diagnostic.file ? `${diagnostic.file}:` : '';
  const pos = `${span.start.line}:${span.start.col}`;

  // Config, IO and usage diagnostics carry no source position
  let result = diagnostic.offsets
    ? `${severity} ${code}: ${message} at ${where}${pos}`
    : `${severity} ${code}: ${message}`;

  if (source && diagnostic.offsets) {
    const lines = source.split(/\r?\n/);
    const line = lines[span.start.line - 1];
    if (line) {
      result += `\n> ${span.start.line}| ${line}`;
      result += `\n> ${' '.repeat(String(span.start.line).length)}  ${' '.repeat(span.start.col - 1)}^`;
    }
  }

  return result;
}

// Utility to create a dummy position for diagnostics without source location
export function dummyPosition(): Position {
  return { line: 1, col: 1 };
}

/**
 * Maps an offset to a 1-based line/column position.
 */
export function positionAt(source: string, offset: number): Position {
  let line = 1;
  let lineStart = 0;
  const limit = Math.min(offset, source.length);
  for (let i = 0; i < limit; i++) {
    if (source.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, col: limit - lineStart + 1 };
}

export function locationOf(source: string, span: Span): Location {
  return { start: positionAt(source, span.start), end: positionAt(source, span.end) };
}
