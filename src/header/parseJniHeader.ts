import { ParseError } from '../errors.js';
import { logDebug } from '../dx/logger.js';
import type { LowLevelSignature } from './headerTypes.js';

const C_METHOD_MARKER = 'JNIEXPORT';

function lineAt(text: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}

function parseOne(
  header: string,
  start: number,
  fileName?: string,
): { signature: LowLevelSignature; end: number } {
  const line = lineAt(header, start);
  const fail = (message: string) =>
    new ParseError(message, { file: fileName, line }, [
      'regenerate the header with `javac -h` (or `javah`) from the compiled class',
    ]);

  const open = header.indexOf('(', start);
  if (open === -1) throw fail('JNI declaration has no argument list');
  const close = header.indexOf(')', open);
  if (close === -1) throw fail('JNI declaration has an unterminated argument list');
  const end = header.indexOf(';', close);
  if (end === -1) throw fail('JNI declaration is missing its terminating ";"');

  const headerLine = header.slice(start, open).replace(/\r?\n/g, '').trim();
  const tokens = headerLine.split(/\s+/);
  if (tokens.length < 3) throw fail(`Unrecognized JNI declaration head "${headerLine}"`);

  const argumentCTypes = header
    .slice(open + 1, close)
    .split(',')
    .map((a) => a.replace(/\r?\n/g, '').trim())
    .filter((a) => a.length > 0);

  return {
    signature: {
      headerLine,
      functionName: tokens[tokens.length - 1],
      returnCType: tokens[1],
      argumentCTypes,
      line,
    },
    end,
  };
}

/**
 * Reads every `JNIEXPORT` declaration of a generated JNI header, in header
 * order. The head is kept as written so the emitted definition matches it.
 */
export function parseJniHeader(header: string, fileName?: string): LowLevelSignature[] {
  const signatures: LowLevelSignature[] = [];

  let index = header.indexOf(C_METHOD_MARKER);
  while (index !== -1) {
    const { signature, end } = parseOne(header, index, fileName);
    signatures.push(signature);
    index = header.indexOf(C_METHOD_MARKER, end);
  }

  logDebug('parsed JNI header', { file: fileName, signatures: signatures.length });
  return signatures;
}
