import { SourceLocation, formatLocation } from '../types';

/**
 * Base class for every diagnostic the compiler stages raise or collect.
 * `message` carries the location prefix; `detail` is the bare message.
 */
export abstract class CompileError extends Error {
  abstract readonly errorType: string;
  readonly detail: string;
  readonly location?: SourceLocation;

  constructor(detail: string, location?: SourceLocation) {
    super(location ? `${formatLocation(location)}: ${detail}` : detail);
    this.detail = detail;
    this.location = location;
  }

  format(): string {
    return `${this.errorType}: ${this.message}`;
  }
}

export class LexError extends CompileError {
  readonly errorType = 'Lexical error';
  declare readonly location: SourceLocation;

  constructor(detail: string, location: SourceLocation) {
    super(detail, location);
    this.name = 'LexError';
  }
}

export class ParseError extends CompileError {
  readonly errorType = 'Parse error';
  declare readonly location: SourceLocation;

  constructor(detail: string, location: SourceLocation) {
    super(detail, location);
    this.name = 'ParseError';
  }
}

export class TypeCheckError extends CompileError {
  readonly errorType = 'Type error';
  declare readonly location: SourceLocation;

  constructor(detail: string, location: SourceLocation) {
    super(detail, location);
    this.name = 'TypeCheckError';
  }
}

export class GenerationError extends CompileError {
  readonly errorType = 'Code generation error';

  constructor(detail: string, location?: SourceLocation) {
    super(detail, location);
    this.name = 'GenerationError';
  }
}

/** Raised by the driver when the checker reports diagnostics. */
export class CompilationError extends Error {
  readonly diagnostics: CompileError[];

  constructor(message: string, diagnostics: CompileError[] = []) {
    super(message);
    this.name = 'CompilationError';
    this.diagnostics = diagnostics;
  }
}
