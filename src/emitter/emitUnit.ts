import { requiresMarshalling } from '../classifier/typeClassifier.js';
import type { MatchedDeclaration, MatchedSegment } from '../correlate/correlateTypes.js';
import type { Declaration, RawBlock } from '../parser/parserTypes.js';
import type { EmitOptions } from './emitterTypes.js';
import { resolveEmitOptions } from './emitterTypes.js';
import type { MarshallingPlan } from './marshalling.js';
import { handleName, planMarshalling } from './marshalling.js';

export const LINE_MARKER_PREFIX = '//@line:';

export function lineMarker(line: number): string {
  return `\n${LINE_MARKER_PREFIX}${line}\n`;
}

/**
 * A method is split into an inner function and a wrapper when its embedded
 * code may return early while native resources are held. Any `return` in the
 * code counts.
 */
export function needsDecomposition(declaration: Declaration): boolean {
  return (
    declaration.arguments.some((a) => requiresMarshalling(a.type)) &&
    declaration.embeddedCode.includes('return')
  );
}

function fixedParams(declaration: Declaration): string[] {
  return declaration.isStatic ? ['JNIEnv* env', 'jclass clazz'] : ['JNIEnv* env', 'jobject object'];
}

function fixedArgs(declaration: Declaration): string[] {
  return declaration.isStatic ? ['env', 'clazz'] : ['env', 'object'];
}

function params(matched: MatchedDeclaration, options: EmitOptions): string[] {
  const { declaration, signature } = matched;
  return [
    ...fixedParams(declaration),
    ...declaration.arguments.map(
      (arg, i) => `${signature.argumentCTypes[i + 2]} ${handleName(arg, options)}`,
    ),
  ];
}

function body(declaration: Declaration): string {
  return `${lineMarker(declaration.startLine)}${declaration.embeddedCode}\n`;
}

function block(lines: string[]): string {
  return `${lines.map((l) => `${l}\n`).join('')}\n`;
}

function emitSingle(matched: MatchedDeclaration, plan: MarshallingPlan, options: EmitOptions): string {
  return [
    `${matched.signature.headerLine}(${params(matched, options).join(', ')}) {\n`,
    block(plan.prologue),
    body(matched.declaration),
    block(plan.epilogue),
    '}\n\n',
  ].join('');
}

function emitDecomposed(matched: MatchedDeclaration, plan: MarshallingPlan, options: EmitOptions): string {
  const { declaration, signature } = matched;
  const innerName = `${options.wrapperPrefix}${signature.functionName}`;
  const outerParams = params(matched, options);

  const innerParams = [
    ...outerParams,
    ...plan.acquisitions.map((a) => `${a.type.pointerType} ${a.name}`),
  ];
  const callArgs = [
    ...fixedArgs(declaration),
    ...declaration.arguments.map((arg) => handleName(arg, options)),
    ...plan.acquisitions.map((a) => a.name),
  ];

  const isVoid = signature.returnCType === 'void';
  const call = `${innerName}(${callArgs.join(', ')});`;

  return [
    `static inline ${signature.returnCType} ${innerName}(${innerParams.join(', ')}) {\n`,
    body(declaration),
    '}\n\n',
    `${signature.headerLine}(${outerParams.join(', ')}) {\n`,
    block(plan.prologue),
    isVoid ? `\t${call}\n\n` : `\t${signature.returnCType} ${options.returnValueName} = ${call}\n\n`,
    block(plan.epilogue),
    isVoid ? '' : `\treturn ${options.returnValueName};\n`,
    '}\n\n',
  ].join('');
}

/** Raw code always ends on its own line. */
export function emitRawBlock(raw: RawBlock): string {
  const code = raw.nativeCode.replace(/\r/g, '');
  return `${lineMarker(raw.startLine)}${code}${code.endsWith('\n') ? '' : '\n'}`;
}

/** Emits the JNI definition(s) for one declaration. */
export function emitMethod(matched: MatchedDeclaration, options?: Partial<EmitOptions>): string {
  const resolved = resolveEmitOptions(options);
  const plan = planMarshalling(matched.declaration.arguments, resolved);
  return needsDecomposition(matched.declaration)
    ? emitDecomposed(matched, plan, resolved)
    : emitSingle(matched, plan, resolved);
}

/**
 * Emits the whole compilation unit: the header include (by base name), then
 * every segment in source order.
 */
export function emitUnit(
  headerFileName: string,
  segments: readonly MatchedSegment[],
  options?: Partial<EmitOptions>,
): string {
  const include = headerFileName.split(/[\\/]/).pop() ?? headerFileName;
  const out = [`#include <${include}>\n`];
  for (const segment of segments) {
    out.push(segment.kind === 'raw' ? emitRawBlock(segment) : emitMethod(segment, options));
  }
  return out.join('');
}
