import { logWarn } from './logger.js';
import { traceWarn } from './trace.js';

export type JniweaveWarningCode =
  | 'AMBIGUOUS_OVERLOAD'
  | 'NATIVE_METHOD_WITHOUT_CODE';

export type JniweaveWarning = {
  code: JniweaveWarningCode;
  message: string;
  hint?: string;
};

/**
 * Emit a non-fatal warning.
 *
 * Prints only when debug logging is enabled.
 */
export function warn(w: JniweaveWarning) {
  const hint = w.hint ? ` Hint: ${w.hint}` : '';
  traceWarn('warning', { code: w.code, message: w.message });
  logWarn(`warning(${w.code}): ${w.message}${hint}`);
}
