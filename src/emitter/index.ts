export { emitMethod, emitRawBlock, emitUnit, lineMarker, needsDecomposition } from './emitUnit.js';
export { planMarshalling } from './marshalling.js';
export type { Acquisition, MarshallingPlan } from './marshalling.js';
export { buildLineMap, mapGeneratedLine } from './lineMarkers.js';
export type { LineMap, LineMapEntry } from './lineMarkers.js';
export { DEFAULT_EMIT_OPTIONS, resolveEmitOptions } from './emitterTypes.js';
export type { EmitOptions } from './emitterTypes.js';
