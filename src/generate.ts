import { correlateSegments } from './correlate/correlate.js';
import type { MatchedSegment } from './correlate/correlateTypes.js';
import { traceDebug, traceError, traceInfo, formatSignature } from './dx/trace.js';
import type { EmitOptions } from './emitter/emitterTypes.js';
import { emitUnit } from './emitter/emitUnit.js';
import { JniweaveError } from './errors.js';
import type { LowLevelSignature } from './header/headerTypes.js';
import { parseJniHeader } from './header/parseJniHeader.js';
import { parseSegments } from './parser/parseJava.js';
import type { Segment } from './parser/parserTypes.js';

export type GenerateRequest = {
  javaSource: string;
  headerSource: string;
  /** Path or base name of the header; the unit includes it by base name. */
  headerFileName: string;
  /** Name used in error messages for the Java file. */
  sourceName?: string;
  options?: Partial<EmitOptions>;
};

export type GenerateResult = {
  unit: string;
  segments: Segment[];
  signatures: LowLevelSignature[];
  matched: MatchedSegment[];
};

/**
 * Runs parse, header parse, correlation and emission for one Java file.
 * Any stage failing aborts the file; no partial unit is returned.
 */
export function generateNativeUnit(request: GenerateRequest): GenerateResult {
  const { sourceName, headerFileName } = request;
  traceInfo('generate.begin', { sourceName, headerFileName });

  try {
    const segments = parseSegments(request.javaSource, sourceName);
    traceDebug('generate.parsed', { sourceName, segments: segments.length });

    const signatures = parseJniHeader(request.headerSource, headerFileName);
    traceDebug('generate.header', {
      headerFileName,
      signatures: signatures.map(formatSignature),
    });

    const matched = correlateSegments(segments, signatures, sourceName);
    const unit = emitUnit(headerFileName, matched, request.options);
    traceInfo('generate.done', { sourceName, bytes: unit.length });

    return { unit, segments, signatures, matched };
  } catch (err) {
    if (err instanceof JniweaveError) {
      traceError('generate.failed', { sourceName, kind: err.kind, message: err.message });
    }
    throw err;
  }
}
