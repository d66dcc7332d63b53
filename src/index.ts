export { generateNativeUnit } from './generate.js';
export type { GenerateRequest, GenerateResult } from './generate.js';

export { classifyType, pointerTypeOf, requiresMarshalling, requiresRelease } from './classifier/index.js';
export type { ArgumentKind, ArgumentType, BufferKind, MarshalledType, PrimitiveKind } from './classifier/index.js';

export { parseSegments } from './parser/index.js';
export type { Argument, Declaration, RawBlock, Segment } from './parser/index.js';

export { parseJniHeader } from './header/index.js';
export type { LowLevelSignature } from './header/index.js';

export { correlate, correlateSegments, findSignature, jniToken, mangleJniIdentifier } from './correlate/index.js';
export type { MatchedDeclaration, MatchedSegment } from './correlate/index.js';

export {
  DEFAULT_EMIT_OPTIONS,
  buildLineMap,
  emitMethod,
  emitRawBlock,
  emitUnit,
  mapGeneratedLine,
  needsDecomposition,
  planMarshalling,
} from './emitter/index.js';
export type { EmitOptions, LineMap, LineMapEntry, MarshallingPlan } from './emitter/index.js';

export { CorrelationError, JniweaveError, ParseError } from './errors.js';
export type { JniweaveErrorKind } from './errors.js';

export { loadOptionalConfig } from './dx/config.js';
export type { JniweaveConfig } from './dx/config.js';
export { setDebugEnabled } from './dx/logger.js';
