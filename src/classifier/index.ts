export { classifyType, pointerTypeOf, requiresMarshalling, requiresRelease } from './typeClassifier.js';
export type {
  ArgumentKind,
  ArgumentType,
  BufferKind,
  MarshalledType,
  PrimitiveKind,
} from './classifierTypes.js';
