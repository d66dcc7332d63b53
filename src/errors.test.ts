import { describe, it, expect } from 'vitest';

import { CorrelationError, JniweaveError, ParseError } from './errors.js';

describe('errors', () => {
  it('prefixes the message with file and line', () => {
    const err = new ParseError('unterminated comment', { file: 'Native.java', line: 12 });
    expect(err.message).toBe('Native.java:12 unterminated comment');
    expect(err.kind).toBe('PARSE_ERROR');
    expect(err.name).toBe('ParseError');
    expect(err).toBeInstanceOf(JniweaveError);
  });

  it('falls back to the line alone', () => {
    expect(new ParseError('bad', { line: 3 }).message).toBe('line 3 bad');
    expect(new ParseError('bad').message).toBe('bad');
  });

  it('renders hints in toString', () => {
    const err = new CorrelationError('Native', 'add', 'no signature', {}, ['regenerate the header']);
    expect(err.toString()).toBe('[CORRELATION_ERROR] no signature\n  hint: regenerate the header');
    expect(err.className).toBe('Native');
    expect(err.methodName).toBe('add');
  });
});
