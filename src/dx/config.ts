import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import type { EmitOptions } from '../emitter/emitterTypes.js';
import { logDebug } from './logger.js';

export type JniweaveConfig = {
  /** Enable debug logs without env var */
  debug?: boolean;
  /** Overrides for the names the emitter synthesizes */
  emit?: Partial<EmitOptions>;
};

let cached:
  | { loaded: true; config: JniweaveConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, 'jniweave.config.js');
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function readEmitOptions(raw: unknown): Partial<EmitOptions> | undefined {
  if (!isRecord(raw)) return undefined;
  const emit: Partial<EmitOptions> = {};
  if (typeof raw.argPrefix === 'string') emit.argPrefix = raw.argPrefix;
  if (typeof raw.wrapperPrefix === 'string') emit.wrapperPrefix = raw.wrapperPrefix;
  if (typeof raw.returnValueName === 'string') emit.returnValueName = raw.returnValueName;
  return emit;
}

/**
 * Keeps the fields of a loaded config module that have the expected shape.
 * Anything else is dropped.
 */
export function normalizeConfig(raw: unknown): JniweaveConfig | null {
  if (!isRecord(raw)) return null;
  const config: JniweaveConfig = {};
  if (typeof raw.debug === 'boolean') config.debug = raw.debug;
  const emit = readEmitOptions(raw.emit);
  if (emit) config.emit = emit;
  return config;
}

/**
 * Loads optional `jniweave.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<JniweaveConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const exported = isRecord(mod) && 'default' in mod ? mod.default : mod;
  cached = { loaded: true, config: normalizeConfig(exported) };
  logDebug('loaded config', { path: p });
  return cached.config;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
