import { CorrelationError } from '../errors.js';
import { logDebug } from '../dx/logger.js';
import { warn } from '../dx/warnings.js';
import type { LowLevelSignature } from '../header/headerTypes.js';
import type { Declaration, Segment } from '../parser/parserTypes.js';
import type { MatchedDeclaration, MatchedSegment } from './correlateTypes.js';
import { jniToken } from './jniMangle.js';

/**
 * Finds the JNI signature for one declaration.
 *
 * Overloads are told apart by argument count only: the first signature whose
 * head contains the declaration's token and whose argument list has exactly
 * two more entries than the Java one wins.
 */
export function findSignature(
  declaration: Declaration,
  signatures: readonly LowLevelSignature[],
  fileName?: string,
): LowLevelSignature {
  const token = jniToken(declaration.className, declaration.methodName);
  const candidates = signatures.filter((s) => s.headerLine.includes(token));
  const matches = candidates.filter(
    (s) => s.argumentCTypes.length - 2 === declaration.arguments.length,
  );

  const [match] = matches;
  if (!match) {
    const label = `${declaration.className}#${declaration.methodName}`;
    throw new CorrelationError(
      declaration.className,
      declaration.methodName,
      `Couldn't find C method for Java method '${label}' (${declaration.arguments.length} argument(s), ` +
        `token "${token}", ${candidates.length} candidate(s) by name)`,
      { file: fileName, line: declaration.startLine },
      ['regenerate the JNI header after changing native method signatures'],
    );
  }

  if (matches.length > 1) {
    warn({
      code: 'AMBIGUOUS_OVERLOAD',
      message:
        `${declaration.className}#${declaration.methodName} matches ${matches.length} signatures with ` +
        `${declaration.arguments.length} argument(s); using ${match.functionName}`,
      hint: 'overloads with the same argument count are not told apart by type',
    });
  }

  return match;
}

export function correlate(
  declarations: readonly Declaration[],
  signatures: readonly LowLevelSignature[],
  fileName?: string,
): MatchedDeclaration[] {
  return declarations.map((declaration): MatchedDeclaration => ({
    kind: 'matched',
    declaration,
    signature: findSignature(declaration, signatures, fileName),
  }));
}

/** Like {@link correlate}, keeping raw blocks in their place. */
export function correlateSegments(
  segments: readonly Segment[],
  signatures: readonly LowLevelSignature[],
  fileName?: string,
): MatchedSegment[] {
  const matched = segments.map((segment): MatchedSegment =>
    segment.kind === 'raw'
      ? segment
      : { kind: 'matched', declaration: segment, signature: findSignature(segment, signatures, fileName) },
  );
  logDebug('correlated', { file: fileName, declarations: matched.filter((m) => m.kind === 'matched').length });
  return matched;
}
