let enabled = false;

export function isDebugEnabled(): boolean {
  return enabled || process.env.JNIWEAVE_DEBUG === '1';
}

/**
 * Enable/disable jniweave debug logging programmatically.
 *
 * The CLI calls this when `jniweave.config.js` sets `debug: true`.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log('[jniweave]', ...args);
}

export function logWarn(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.warn('[jniweave]', ...args);
}
