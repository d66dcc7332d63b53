import { describe, it, expect } from 'vitest';

import { ParseError } from '../errors.js';
import { parseJniHeader } from './index.js';

const HEADER = [
  '#include <jni.h>',
  '#ifdef __cplusplus',
  'extern "C" {',
  '#endif',
  '/*',
  ' * Class:     com_example_Native',
  ' * Method:    doubleAll',
  ' * Signature: ([II)V',
  ' */',
  'JNIEXPORT void JNICALL Java_com_example_Native_doubleAll',
  '  (JNIEnv *, jclass, jintArray, jint);',
  '',
  'JNIEXPORT jint JNICALL Java_com_example_Native_first',
  '  (JNIEnv *, jobject, jstring);',
  '#ifdef __cplusplus',
  '}',
  '#endif',
  '',
].join('\n');

describe('JNI header parser', () => {
  it('reads every JNIEXPORT declaration in order', () => {
    expect(parseJniHeader(HEADER)).toEqual([
      {
        headerLine: 'JNIEXPORT void JNICALL Java_com_example_Native_doubleAll',
        functionName: 'Java_com_example_Native_doubleAll',
        returnCType: 'void',
        argumentCTypes: ['JNIEnv *', 'jclass', 'jintArray', 'jint'],
        line: 10,
      },
      {
        headerLine: 'JNIEXPORT jint JNICALL Java_com_example_Native_first',
        functionName: 'Java_com_example_Native_first',
        returnCType: 'jint',
        argumentCTypes: ['JNIEnv *', 'jobject', 'jstring'],
        line: 13,
      },
    ]);
  });

  it('handles CRLF line endings', () => {
    const [sig] = parseJniHeader(
      'JNIEXPORT jlong JNICALL Java_A_f\r\n  (JNIEnv *,\r\n jclass);\r\n',
    );
    expect(sig.headerLine).toBe('JNIEXPORT jlong JNICALL Java_A_f');
    expect(sig.argumentCTypes).toEqual(['JNIEnv *', 'jclass']);
  });

  it('returns nothing for a header without declarations', () => {
    expect(parseJniHeader('#include <jni.h>\n')).toEqual([]);
  });

  it('reports the line of a malformed declaration', () => {
    const bad = '#include <jni.h>\n\nJNIEXPORT void JNICALL Java_A_f\n  (JNIEnv *, jclass\n';
    expect(() => parseJniHeader(bad, 'A.h')).toThrow(ParseError);
    expect(() => parseJniHeader(bad, 'A.h')).toThrow(
      'A.h:3 JNI declaration has an unterminated argument list',
    );
  });
});
