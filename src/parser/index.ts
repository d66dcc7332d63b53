export { parseSegments } from './parseJava.js';
export { createParser } from './loadParser.js';
export type { Argument, Declaration, RawBlock, Segment } from './parserTypes.js';
