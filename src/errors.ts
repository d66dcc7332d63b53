export type JniweaveErrorKind = 'PARSE_ERROR' | 'CORRELATION_ERROR';

export type ErrorLocation = {
  file?: string;
  line?: number;
};

function formatLocation(loc: ErrorLocation): string {
  if (loc.file && loc.line != null) return `${loc.file}:${loc.line}`;
  if (loc.file) return loc.file;
  if (loc.line != null) return `line ${loc.line}`;
  return '';
}

/**
 * Base class for every failure of the generation pipeline. The message is
 * prefixed with `file:line` when the location is known.
 */
export class JniweaveError extends Error {
  readonly kind: JniweaveErrorKind;
  readonly file?: string;
  readonly line?: number;
  readonly hints: string[];

  constructor(
    kind: JniweaveErrorKind,
    message: string,
    location: ErrorLocation = {},
    hints: string[] = [],
  ) {
    const where = formatLocation(location);
    super(where ? `${where} ${message}` : message);
    this.name = 'JniweaveError';
    this.kind = kind;
    this.file = location.file;
    this.line = location.line;
    this.hints = hints;
  }

  override toString(): string {
    const head = `[${this.kind}] ${this.message}`;
    if (!this.hints.length) return head;
    return `${head}\n${this.hints.map((h) => `  hint: ${h}`).join('\n')}`;
  }
}

/** Malformed Java declaration syntax or an unparseable JNI header. */
export class ParseError extends JniweaveError {
  constructor(message: string, location: ErrorLocation = {}, hints: string[] = []) {
    super('PARSE_ERROR', message, location, hints);
    this.name = 'ParseError';
  }
}

/** No JNI signature satisfies a declaration. */
export class CorrelationError extends JniweaveError {
  readonly className: string;
  readonly methodName: string;

  constructor(
    className: string,
    methodName: string,
    message: string,
    location: ErrorLocation = {},
    hints: string[] = [],
  ) {
    super('CORRELATION_ERROR', message, location, hints);
    this.name = 'CorrelationError';
    this.className = className;
    this.methodName = methodName;
  }
}
