export { correlate, correlateSegments, findSignature } from './correlate.js';
export { jniToken, mangleJniIdentifier } from './jniMangle.js';
export type { MatchedDeclaration, MatchedSegment } from './correlateTypes.js';
