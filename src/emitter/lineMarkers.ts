import { LINE_MARKER_PREFIX } from './emitUnit.js';

export type LineMapEntry = {
  /** 1-based line of the marker in the generated unit. */
  readonly generatedLine: number;
  /** Java line the marker names. */
  readonly sourceLine: number;
};

export type LineMap = {
  readonly entries: readonly LineMapEntry[];
};

function parseMarker(line: string): number | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith(LINE_MARKER_PREFIX)) return undefined;
  const n = Number.parseInt(trimmed.slice(LINE_MARKER_PREFIX.length), 10);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

export function buildLineMap(unit: string): LineMap {
  const entries: LineMapEntry[] = [];
  const lines = unit.split(/\r?\n/g);
  for (let i = 0; i < lines.length; i++) {
    const sourceLine = parseMarker(lines[i]);
    if (sourceLine === undefined) continue;
    entries.push({ generatedLine: i + 1, sourceLine });
  }
  return Object.freeze({ entries: Object.freeze(entries) });
}

/**
 * Maps a line of the generated unit back to the Java source, counting from
 * the nearest marker above it. Lines above the first marker and marker lines
 * themselves have no source line.
 */
export function mapGeneratedLine(map: LineMap, generatedLine: number): number | undefined {
  let best: LineMapEntry | undefined;
  for (const entry of map.entries) {
    if (entry.generatedLine > generatedLine) break;
    best = entry;
  }
  if (!best || best.generatedLine === generatedLine) return undefined;
  return best.sourceLine + (generatedLine - best.generatedLine - 1);
}
