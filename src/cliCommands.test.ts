import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runCli } from './cliCommands.js';
import { __resetConfigCacheForTests } from './dx/config.js';
import { generateNativeUnit } from './generate.js';

function fixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`../examples/${name}`, import.meta.url)), 'utf8');
}

function project(): string {
  const dir = mkdtempSync(join(tmpdir(), 'jniweave-cli-'));
  writeFileSync(join(dir, 'Native.java'), fixture('Native.java'));
  writeFileSync(join(dir, 'com_example_Native.h'), fixture('com_example_Native.h'));
  return dir;
}

describe('cli', () => {
  const log = () => vi.mocked(console.log);
  const error = () => vi.mocked(console.error);

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    __resetConfigCacheForTests();
  });

  it('prints usage', async () => {
    expect(await runCli(['--help'])).toBe(0);
    expect(String(log().mock.calls[0]?.[0])).toContain('jniweave generate <Source.java> <Header.h>');
  });

  it('generates the unit next to the header', async () => {
    const dir = project();
    expect(await runCli(['generate', 'Native.java', 'com_example_Native.h'], dir)).toBe(0);

    const expected = generateNativeUnit({
      javaSource: fixture('Native.java'),
      headerSource: fixture('com_example_Native.h'),
      headerFileName: 'com_example_Native.h',
    }).unit;
    expect(readFileSync(join(dir, 'com_example_Native.cpp'), 'utf8')).toBe(expected);
    expect(log()).toHaveBeenCalledWith(`Generated ${join(dir, 'com_example_Native.cpp')} (5 method(s))`);
  });

  it('writes to --out', async () => {
    const dir = project();
    expect(await runCli(['generate', 'Native.java', 'com_example_Native.h', '--out', 'glue.cpp'], dir)).toBe(0);
    expect(existsSync(join(dir, 'glue.cpp'))).toBe(true);
  });

  it('writes nothing when correlation fails', async () => {
    const dir = project();
    writeFileSync(join(dir, 'com_example_Native.h'), '#include <jni.h>\n');

    expect(await runCli(['generate', 'Native.java', 'com_example_Native.h'], dir)).toBe(1);
    expect(existsSync(join(dir, 'com_example_Native.cpp'))).toBe(false);
    expect(String(error().mock.calls[0]?.[0])).toMatch(
      /^\[jniweave\] Native\.java:10 Couldn't find C method for Java method 'Native#scale'/,
    );
  });

  it('applies emit options from jniweave.config.js', async () => {
    const dir = project();
    writeFileSync(join(dir, 'package.json'), '{"type":"module"}\n');
    writeFileSync(join(dir, 'jniweave.config.js'), 'export default { emit: { returnValueName: "result" } };\n');

    expect(await runCli(['generate', 'Native.java', 'com_example_Native.h'], dir)).toBe(0);
    const unit = readFileSync(join(dir, 'com_example_Native.cpp'), 'utf8');
    expect(unit).toContain('\treturn result;\n');
    expect(unit).not.toContain('JNI_returnValue');
  });

  it('lists header signatures', async () => {
    const dir = project();
    expect(await runCli(['signatures', 'com_example_Native.h'], dir)).toBe(0);
    expect(log()).toHaveBeenCalledWith(
      '13: void Java_com_example_Native_scale(JNIEnv *, jclass, jfloatArray, jint, jfloat)',
    );
  });

  it('maps a generated line back to the Java source', async () => {
    const dir = project();
    await runCli(['generate', 'Native.java', 'com_example_Native.h'], dir);
    const lines = readFileSync(join(dir, 'com_example_Native.cpp'), 'utf8').split('\n');
    const line = lines.indexOf('\t\treturn (int)strlen(text);') + 1;
    log().mockClear();

    expect(await runCli(['where', 'com_example_Native.cpp', String(line)], dir)).toBe(0);
    expect(log()).toHaveBeenCalledWith('15');
  });

  it('rejects unknown commands and missing arguments', async () => {
    expect(await runCli(['frobnicate'])).toBe(1);
    expect(await runCli(['generate', 'Only.java'])).toBe(1);
    expect(await runCli(['where', 'x.cpp', 'zero'])).toBe(1);
  });
});
