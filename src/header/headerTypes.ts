export type LowLevelSignature = {
  /** `JNIEXPORT <ret> JNICALL <name>` with line breaks removed. */
  readonly headerLine: string;
  readonly functionName: string;
  readonly returnCType: string;
  /** Always starts with the `JNIEnv *` and `jclass`/`jobject` slots. */
  readonly argumentCTypes: readonly string[];
  /** 1-based line of the `JNIEXPORT` marker in the header. */
  readonly line: number;
};
