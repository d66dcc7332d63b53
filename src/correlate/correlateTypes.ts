import type { LowLevelSignature } from '../header/headerTypes.js';
import type { Declaration, RawBlock } from '../parser/parserTypes.js';

/** `signature.argumentCTypes.length - 2 === declaration.arguments.length` always holds. */
export type MatchedDeclaration = {
  readonly kind: 'matched';
  readonly declaration: Declaration;
  readonly signature: LowLevelSignature;
};

export type MatchedSegment = RawBlock | MatchedDeclaration;
