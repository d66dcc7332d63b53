import type { MarshalledType } from '../classifier/classifierTypes.js';
import { requiresMarshalling } from '../classifier/typeClassifier.js';
import type { Argument } from '../parser/parserTypes.js';
import type { EmitOptions } from './emitterTypes.js';

export type Acquisition = {
  /** Name of the pointer variable, the argument's own name. */
  name: string;
  /** Name of the incoming JNI handle. */
  handle: string;
  type: MarshalledType;
};

export type MarshallingPlan = {
  /** Buffers, then strings, then arrays. */
  acquisitions: Acquisition[];
  prologue: string[];
  epilogue: string[];
};

// GetPrimitiveArrayCritical forbids further JNI calls until released, so
// arrays are acquired last and released first.
const ACQUIRE_ORDER: ReadonlyArray<MarshalledType['kind']> = ['buffer', 'string', 'array'];
const RELEASE_ORDER: ReadonlyArray<MarshalledType['kind']> = ['array', 'string'];

export function handleName(arg: Argument, options: EmitOptions): string {
  return requiresMarshalling(arg.type) ? `${options.argPrefix}${arg.name}` : arg.name;
}

function acquireLine(a: Acquisition): string {
  const t = a.type.pointerType;
  switch (a.type.kind) {
    case 'buffer':
      return `\t${t} ${a.name} = (${t})env->GetDirectBufferAddress(${a.handle});`;
    case 'string':
      return `\t${t} ${a.name} = (${t})env->GetStringUTFChars(${a.handle}, 0);`;
    case 'array':
      return `\t${t} ${a.name} = (${t})env->GetPrimitiveArrayCritical(${a.handle}, 0);`;
  }
}

function releaseLine(a: Acquisition): string | undefined {
  switch (a.type.kind) {
    case 'array':
      return `\tenv->ReleasePrimitiveArrayCritical(${a.handle}, ${a.name}, 0);`;
    case 'string':
      return `\tenv->ReleaseStringUTFChars(${a.handle}, ${a.name});`;
    case 'buffer':
      return undefined;
  }
}

/**
 * Lists the setup and cleanup lines for every marshalled argument of a
 * method. Within one category the declaration order is kept.
 */
export function planMarshalling(args: readonly Argument[], options: EmitOptions): MarshallingPlan {
  const all: Acquisition[] = [];
  for (const arg of args) {
    if (!requiresMarshalling(arg.type)) continue;
    all.push({ name: arg.name, handle: handleName(arg, options), type: arg.type });
  }

  const acquisitions = ACQUIRE_ORDER.flatMap((kind) => all.filter((a) => a.type.kind === kind));
  const prologue = acquisitions.map(acquireLine);
  const epilogue = RELEASE_ORDER.flatMap((kind) => all.filter((a) => a.type.kind === kind))
    .map(releaseLine)
    .filter((l): l is string => l !== undefined);

  return { acquisitions, prologue, epilogue };
}
