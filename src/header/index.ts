export { parseJniHeader } from './parseJniHeader.js';
export type { LowLevelSignature } from './headerTypes.js';
