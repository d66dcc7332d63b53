import type {
  ArgumentType,
  BufferKind,
  MarshalledType,
  PrimitiveKind,
} from './classifierTypes.js';

const arrayPointerTypes: Record<PrimitiveKind, string> = {
  boolean: 'bool*',
  byte: 'char*',
  char: 'unsigned short*',
  short: 'short*',
  int: 'int*',
  long: 'long long*',
  float: 'float*',
  double: 'double*',
};

const bufferPointerTypes: Record<BufferKind, string> = {
  generic: 'unsigned char*',
  byte: 'char*',
  char: 'unsigned short*',
  short: 'short*',
  int: 'int*',
  long: 'long long*',
  float: 'float*',
  double: 'double*',
};

const bufferNames: Record<string, BufferKind> = {
  Buffer: 'generic',
  ByteBuffer: 'byte',
  CharBuffer: 'char',
  ShortBuffer: 'short',
  IntBuffer: 'int',
  LongBuffer: 'long',
  FloatBuffer: 'float',
  DoubleBuffer: 'double',
};

function isPrimitive(t: string): t is PrimitiveKind {
  return Object.hasOwn(arrayPointerTypes, t);
}

function bufferKindOf(t: string): BufferKind | undefined {
  const simple = t.startsWith('java.nio.') ? t.slice('java.nio.'.length) : t;
  return Object.hasOwn(bufferNames, simple) ? bufferNames[simple] : undefined;
}

/**
 * Maps a declared Java parameter type to its marshalling category.
 *
 * Only one-dimensional primitive arrays, `String` and the direct NIO buffer
 * family get marshalled; every other type is passed through as a `jobject`.
 */
export function classifyType(declaredType: string): ArgumentType {
  const t = declaredType.replace(/\s+/g, '');

  if (isPrimitive(t)) return { kind: 'pod', primitive: t };
  if (t === 'String' || t === 'java.lang.String') {
    return { kind: 'string', pointerType: 'char*' };
  }

  if (t.endsWith('[]')) {
    const element = t.slice(0, -2);
    if (isPrimitive(element)) {
      return { kind: 'array', element, pointerType: arrayPointerTypes[element] };
    }
    return { kind: 'object', declaredType: t };
  }

  const buffer = bufferKindOf(t);
  if (buffer) {
    return { kind: 'buffer', element: buffer, pointerType: bufferPointerTypes[buffer] };
  }

  return { kind: 'object', declaredType: t };
}

export function requiresMarshalling(type: ArgumentType): type is MarshalledType {
  return type.kind === 'string' || type.kind === 'array' || type.kind === 'buffer';
}

/** Buffer addresses are computed, not acquired, so they have nothing to release. */
export function requiresRelease(type: ArgumentType): boolean {
  return type.kind === 'string' || type.kind === 'array';
}

export function pointerTypeOf(type: ArgumentType): string | undefined {
  return requiresMarshalling(type) ? type.pointerType : undefined;
}
