import Parser from 'tree-sitter';
import Java from 'tree-sitter-java';

export function createParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Java);
  return parser;
}

// The node binding reads string input through a fixed-size buffer; inputs
// larger than the default need a bigger one.
const DEFAULT_BUFFER_SIZE = 32 * 1024;

export function parseJava(source: string): Parser.Tree {
  const parser = createParser();
  return parser.parse(source, undefined, {
    bufferSize: Math.max(DEFAULT_BUFFER_SIZE, source.length * 2 + 1),
  });
}
