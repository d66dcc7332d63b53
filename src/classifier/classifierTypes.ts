export type PrimitiveKind =
  | 'boolean'
  | 'byte'
  | 'char'
  | 'short'
  | 'int'
  | 'long'
  | 'float'
  | 'double';

/** `generic` is plain `java.nio.Buffer`. */
export type BufferKind = 'generic' | Exclude<PrimitiveKind, 'boolean'>;

export type ArgumentType =
  | { kind: 'pod'; primitive: PrimitiveKind }
  | { kind: 'object'; declaredType: string }
  | { kind: 'string'; pointerType: 'char*' }
  | { kind: 'array'; element: PrimitiveKind; pointerType: string }
  | { kind: 'buffer'; element: BufferKind; pointerType: string };

export type ArgumentKind = ArgumentType['kind'];

/** Argument types that are turned into a native pointer before the body runs. */
export type MarshalledType = Extract<ArgumentType, { kind: 'string' | 'array' | 'buffer' }>;
