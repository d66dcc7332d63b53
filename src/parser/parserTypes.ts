import type { ArgumentType } from '../classifier/classifierTypes.js';

export type Argument = {
  /** Identifier exactly as written in the Java source (may contain `$`). */
  readonly name: string;
  /** Java type text with whitespace removed; C-style and varargs dimensions folded in. */
  readonly declaredType: string;
  readonly type: ArgumentType;
};

export type Declaration = {
  readonly kind: 'declaration';
  /** Binary name of the enclosing type relative to the file, e.g. `Outer$Inner`. */
  readonly className: string;
  readonly methodName: string;
  readonly isStatic: boolean;
  readonly arguments: readonly Argument[];
  /** Text between `/*` and `*\/` of the attached block comment. */
  readonly embeddedCode: string;
  /** 1-based line the attached comment starts on. */
  readonly startLine: number;
  /** 1-based line the attached comment ends on. */
  readonly endLine: number;
};

export type RawBlock = {
  readonly kind: 'raw';
  /** Text between `/*JNI` and `*\/`. */
  readonly nativeCode: string;
  readonly startLine: number;
};

/** Source order is preserved: the emitter reproduces segments in this order. */
export type Segment = RawBlock | Declaration;
