export type EmitOptions = {
  /** Prefix for the raw JNI handle of a marshalled argument. */
  argPrefix: string;
  /** Prefix for the inner function of a decomposed method. */
  wrapperPrefix: string;
  /** Name of the temporary holding the inner function's result. */
  returnValueName: string;
};

export const DEFAULT_EMIT_OPTIONS: EmitOptions = {
  argPrefix: 'obj_',
  wrapperPrefix: 'wrapped_',
  returnValueName: 'JNI_returnValue',
};

export function resolveEmitOptions(options?: Partial<EmitOptions>): EmitOptions {
  return { ...DEFAULT_EMIT_OPTIONS, ...(options ?? {}) };
}
