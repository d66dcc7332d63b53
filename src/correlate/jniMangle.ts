/**
 * Escapes a Java identifier the way JNI function names do: `_` → `_1`,
 * `;` → `_2`, `[` → `_3`, and any other character outside `[A-Za-z0-9]`
 * as `_0xxxx` (its UTF-16 code unit in lowercase hex).
 */
export function mangleJniIdentifier(name: string): string {
  let out = '';
  for (const ch of name) {
    if (/[A-Za-z0-9]/.test(ch)) out += ch;
    else if (ch === '_') out += '_1';
    else if (ch === ';') out += '_2';
    else if (ch === '[') out += '_3';
    else {
      for (let i = 0; i < ch.length; i++) {
        out += `_0${ch.charCodeAt(i).toString(16).padStart(4, '0')}`;
      }
    }
  }
  return out;
}

/**
 * The `Class_method` fragment of a JNI function name. `className` is a binary
 * name, so nested types (`Outer$Inner`) come out as `Outer_00024Inner`.
 */
export function jniToken(className: string, methodName: string): string {
  return `${mangleJniIdentifier(className)}_${mangleJniIdentifier(methodName)}`;
}
