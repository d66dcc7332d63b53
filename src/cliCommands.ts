import { readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { loadOptionalConfig } from './dx/config.js';
import { setDebugEnabled } from './dx/logger.js';
import { isTraceEnabled } from './dx/trace.js';
import { buildLineMap, mapGeneratedLine } from './emitter/lineMarkers.js';
import { JniweaveError } from './errors.js';
import { generateNativeUnit } from './generate.js';
import { parseJniHeader } from './header/parseJniHeader.js';

function getFlagValue(argv: string[], name: string): string | undefined {
  const idx = argv.indexOf(name);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

function positionals(argv: string[], valueFlags: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    if (valueFlags.includes(argv[i])) {
      i++;
      continue;
    }
    out.push(argv[i]);
  }
  return out;
}

export function usage(): string {
  return `jniweave

Usage:
	jniweave generate <Source.java> <Header.h> [--out <Unit.cpp>]
	jniweave signatures <Header.h>
	jniweave where <Unit.cpp> <line>

Examples:
	jniweave generate src/com/example/Native.java jni/com_example_Native.h
	jniweave where jni/com_example_Native.cpp 42

Notes:
	- The header comes from \`javac -h\` (or \`javah\`) run on the compiled class
	- generate writes next to the header (.h -> .cpp) unless --out is given
	- Set JNIWEAVE_DEBUG=1 for debug logs, JNIWEAVE_TRACE=1 for trace events
`;
}

function reportError(e: unknown) {
  if (e instanceof JniweaveError) {
    console.error(`[jniweave] ${e.message}`);
    for (const h of e.hints) console.error(`  hint: ${h}`);
  } else {
    console.error(`[jniweave] ${e instanceof Error ? e.message : String(e)}`);
  }
  if (isTraceEnabled()) console.error(e);
}

function defaultOutPath(headerPath: string): string {
  return headerPath.endsWith('.h') ? `${headerPath.slice(0, -2)}.cpp` : `${headerPath}.cpp`;
}

async function generateCommand(args: string[], cwd: string): Promise<number> {
  const [javaPath, headerPath] = positionals(args, ['--out']);
  if (!javaPath || !headerPath) {
    console.error('Usage: jniweave generate <Source.java> <Header.h> [--out <Unit.cpp>]');
    return 1;
  }

  const config = await loadOptionalConfig(cwd);
  if (config?.debug) setDebugEnabled(true);

  const outPath = resolve(cwd, getFlagValue(args, '--out') ?? defaultOutPath(headerPath));
  const javaSource = readFileSync(resolve(cwd, javaPath), 'utf8');
  const headerSource = readFileSync(resolve(cwd, headerPath), 'utf8');

  const { unit, matched } = generateNativeUnit({
    javaSource,
    headerSource,
    headerFileName: headerPath,
    sourceName: javaPath,
    options: config?.emit,
  });
  writeFileSync(outPath, unit, 'utf8');

  const methods = matched.filter((m) => m.kind === 'matched').length;
  console.log(`Generated ${outPath} (${methods} method(s))`);
  return 0;
}

function signaturesCommand(args: string[], cwd: string): number {
  const [headerPath] = args;
  if (!headerPath) {
    console.error('Usage: jniweave signatures <Header.h>');
    return 1;
  }
  const signatures = parseJniHeader(readFileSync(resolve(cwd, headerPath), 'utf8'), headerPath);
  for (const s of signatures) {
    console.log(`${s.line}: ${s.returnCType} ${s.functionName}(${s.argumentCTypes.join(', ')})`);
  }
  return 0;
}

function whereCommand(args: string[], cwd: string): number {
  const [unitPath, lineRaw] = args;
  const line = Number(lineRaw);
  if (!unitPath || !Number.isInteger(line) || line <= 0) {
    console.error('Usage: jniweave where <Unit.cpp> <line>');
    return 1;
  }
  const map = buildLineMap(readFileSync(resolve(cwd, unitPath), 'utf8'));
  const sourceLine = mapGeneratedLine(map, line);
  if (sourceLine === undefined) {
    console.error(`No source line for ${unitPath}:${line}`);
    return 1;
  }
  console.log(String(sourceLine));
  return 0;
}

/** Runs one CLI invocation and returns the process exit code. */
export async function runCli(argv: string[], cwd: string = process.cwd()): Promise<number> {
  const [cmd, ...rest] = argv;

  if (!cmd || cmd === '-h' || cmd === '--help') {
    console.log(usage());
    return 0;
  }

  try {
    if (cmd === 'generate') return await generateCommand(rest, cwd);
    if (cmd === 'signatures') return signaturesCommand(rest, cwd);
    if (cmd === 'where') return whereCommand(rest, cwd);
  } catch (e) {
    reportError(e);
    return 1;
  }

  console.error(`Unknown command: ${cmd}`);
  console.log(usage());
  return 1;
}
