import type Parser from 'tree-sitter';

import { classifyType } from '../classifier/typeClassifier.js';
import { ParseError } from '../errors.js';
import { logDebug } from '../dx/logger.js';
import { warn } from '../dx/warnings.js';
import { parseJava } from './loadParser.js';
import type { Argument, Declaration, Segment } from './parserTypes.js';

type SyntaxNode = Parser.SyntaxNode;

const RAW_BLOCK_MARKER = '/*JNI';
const JAVADOC_MARKER = '/**';

const TYPE_DECLARATIONS = new Set([
  'class_declaration',
  'interface_declaration',
  'enum_declaration',
  'record_declaration',
  'annotation_type_declaration',
]);

const SIGNATURE_HINT =
  'native methods are declared as `native <type> name(<Type> arg, ...);` with the C/C++ body in a /* ... */ comment starting on the same line, right after the `;`';

type NativeMethod = {
  node: SyntaxNode;
  className: string;
  methodName: string;
  isStatic: boolean;
  arguments: Argument[];
};

type ScanEvent =
  | { kind: 'method'; method: NativeMethod }
  | { kind: 'comment'; node: SyntaxNode };

function lineOf(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

function compact(text: string): string {
  return text.replace(/\s+/g, '');
}

function syntaxError(node: SyntaxNode, fileName?: string): ParseError {
  const loc = { file: fileName, line: lineOf(node) };
  if (node.type === 'ERROR' && node.text.trimStart().startsWith('/*')) {
    return new ParseError('Unterminated block comment', loc, [
      'embedded native code must be closed with */',
    ]);
  }
  if (node.startIndex === node.endIndex) {
    return new ParseError(`Syntax error: missing "${node.type}"`, loc, [SIGNATURE_HINT]);
  }
  const snippet = node.text.split(/\r?\n/)[0]?.trim().slice(0, 60) ?? '';
  return new ParseError(`Syntax error near "${snippet}"`, loc, [SIGNATURE_HINT]);
}

function hasModifier(method: SyntaxNode, modifier: string): boolean {
  const modifiers = method.namedChildren.find((c) => c.type === 'modifiers');
  return modifiers?.children.some((c) => c.type === modifier) ?? false;
}

function enclosingClassName(node: SyntaxNode): string {
  const names: string[] = [];
  for (let p = node.parent; p; p = p.parent) {
    if (!TYPE_DECLARATIONS.has(p.type)) continue;
    const name = p.childForFieldName('name');
    if (name) names.unshift(name.text);
  }
  return names.join('$');
}

function parseParameter(param: SyntaxNode, fileName?: string): Argument {
  if (param.type === 'spread_parameter') {
    const typeNode = param.namedChildren.find(
      (c) => c.type !== 'modifiers' && c.type !== 'variable_declarator',
    );
    const declarator = param.namedChildren.find((c) => c.type === 'variable_declarator');
    const name = declarator?.childForFieldName('name');
    if (!typeNode || !name) {
      throw new ParseError('Unparseable varargs parameter', { file: fileName, line: lineOf(param) }, [
        SIGNATURE_HINT,
      ]);
    }
    const dims = declarator?.childForFieldName('dimensions')?.text ?? '';
    const declaredType = `${compact(typeNode.text)}${compact(dims)}[]`;
    return { name: name.text, declaredType, type: classifyType(declaredType) };
  }

  const typeNode = param.childForFieldName('type');
  const name = param.childForFieldName('name');
  if (!typeNode || !name) {
    throw new ParseError('Parameter is missing a type or a name', { file: fileName, line: lineOf(param) }, [
      SIGNATURE_HINT,
    ]);
  }
  const dims = param.childForFieldName('dimensions')?.text ?? '';
  const declaredType = `${compact(typeNode.text)}${compact(dims)}`;
  return { name: name.text, declaredType, type: classifyType(declaredType) };
}

function parseNativeMethod(node: SyntaxNode, fileName?: string): NativeMethod {
  const name = node.childForFieldName('name');
  const params = node.childForFieldName('parameters');
  if (!name || !params) {
    throw new ParseError('Unparseable native method signature', { file: fileName, line: lineOf(node) }, [
      SIGNATURE_HINT,
    ]);
  }

  const args = params.namedChildren
    .filter((c) => c.type === 'formal_parameter' || c.type === 'spread_parameter')
    .map((c) => parseParameter(c, fileName));

  return {
    node,
    className: enclosingClassName(node),
    methodName: name.text,
    isStatic: hasModifier(node, 'static'),
    arguments: args,
  };
}

function isBodilessNative(node: SyntaxNode): boolean {
  return hasModifier(node, 'native') && node.childForFieldName('body') == null;
}

/**
 * Walks the tree in document order, collecting native method declarations
 * and block comments. Throws on the first syntax error.
 */
function scan(root: SyntaxNode, fileName?: string): ScanEvent[] {
  const events: ScanEvent[] = [];

  function visit(node: SyntaxNode) {
    if (node.type === 'ERROR' || (node !== root && node.startIndex === node.endIndex)) {
      throw syntaxError(node, fileName);
    }
    if (node.type === 'method_declaration' && isBodilessNative(node)) {
      events.push({ kind: 'method', method: parseNativeMethod(node, fileName) });
    } else if (node.type === 'block_comment') {
      events.push({ kind: 'comment', node });
    }
    for (const child of node.children) visit(child);
  }

  visit(root);
  return events;
}

function reportMissingCode(method: NativeMethod) {
  logDebug('native method without embedded code', {
    className: method.className,
    methodName: method.methodName,
    line: lineOf(method.node),
  });
  warn({
    code: 'NATIVE_METHOD_WITHOUT_CODE',
    message: `${method.className}#${method.methodName} (line ${lineOf(method.node)}) has no embedded code and is skipped`,
    hint: 'put the C/C++ body in a /* ... */ comment starting on the same line, right after the `;`',
  });
}

function isEmbeddedCodeFor(method: NativeMethod, comment: SyntaxNode, source: string): boolean {
  if (comment.startPosition.row !== method.node.endPosition.row) return false;
  if (comment.text.startsWith(JAVADOC_MARKER)) return false;
  return source.slice(method.node.endIndex, comment.startIndex).trim() === '';
}

function toDeclaration(method: NativeMethod, comment: SyntaxNode): Declaration {
  return {
    kind: 'declaration',
    className: method.className,
    methodName: method.methodName,
    isStatic: method.isStatic,
    arguments: method.arguments,
    embeddedCode: comment.text.slice(2, -2),
    startLine: comment.startPosition.row + 1,
    endLine: comment.endPosition.row + 1,
  };
}

/**
 * Splits a Java source file into raw `/*JNI` blocks and native method
 * declarations with their embedded code, in source order.
 *
 * A block comment is a method's embedded code when it starts on the line of
 * the `;` ending a `native` method declaration, with only whitespace between
 * them. Javadoc comments are never embedded code.
 */
export function parseSegments(source: string, fileName?: string): Segment[] {
  const tree = parseJava(source);
  const events = scan(tree.rootNode, fileName);

  const segments: Segment[] = [];
  let pending: NativeMethod | null = null;

  for (const event of events) {
    if (event.kind === 'method') {
      if (pending) reportMissingCode(pending);
      pending = event.method;
      continue;
    }

    const comment = event.node;
    if (pending && comment.startIndex >= pending.node.endIndex) {
      if (isEmbeddedCodeFor(pending, comment, source)) {
        segments.push(toDeclaration(pending, comment));
        pending = null;
        continue;
      }
      reportMissingCode(pending);
      pending = null;
    }

    if (comment.text.startsWith(RAW_BLOCK_MARKER)) {
      segments.push({
        kind: 'raw',
        nativeCode: comment.text.slice(RAW_BLOCK_MARKER.length, -2),
        startLine: lineOf(comment),
      });
    }
  }
  if (pending) reportMissingCode(pending);

  logDebug('parsed segments', {
    file: fileName,
    raw: segments.filter((s) => s.kind === 'raw').length,
    declarations: segments.filter((s) => s.kind === 'declaration').length,
  });
  return segments;
}
