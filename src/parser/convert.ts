/**
 * Convert the Lezer syntax tree into the template AST.
 *
 * - A Template with a single term collapses to that term; several juxtaposed
 *   terms become a list node.
 * - Groups are transparent: `(a b)` yields whatever `a b` yields.
 * - Method chains fold left: `x.f().g()` is g applied to f applied to x.
 *   Each method call spans its own `.name(...)`, not the receiver.
 * - String escapes are decoded and integer literals range-checked here.
 */

import type { SyntaxNode, Tree } from "@lezer/common";
import type { ExpressionNode, FunctionCallNode, SourceSpan } from "../ast/template-ast";
import { TemplateParseError } from "../errors";
import { parser } from "./parser";

const I64_MAX = 2n ** 63n - 1n;

const PUNCTUATION = new Set(["(", ")", ",", "."]);

/**
 * Parse template source into an AST. No name or type checking happens here.
 */
export function parseTemplate(source: string): ExpressionNode {
  return convertProgram(parseTree(source), source);
}

/**
 * Parse template source into the concrete Lezer tree.
 */
export function parseTree(source: string): Tree {
  try {
    return parser.parse(source);
  } catch (err) {
    if (err instanceof SyntaxError) {
      const pos = failedPosition(err, source.length);
      throw TemplateParseError.syntaxError({ from: pos, to: pos }, err);
    }
    throw err;
  }
}

// Strict Lezer parsers report "No parse at <offset>".
function failedPosition(err: SyntaxError, fallback: number): number {
  const match = /No parse at (\d+)/.exec(err.message);
  return match ? Math.min(Number(match[1]), fallback) : fallback;
}

export function convertProgram(tree: Tree, source: string): ExpressionNode {
  const template = tree.topNode.getChild("Template");
  if (!template) {
    return { kind: "list", items: [], span: { from: source.length, to: source.length } };
  }
  return convertTemplate(template, source);
}

function spanOf(node: SyntaxNode): SourceSpan {
  return { from: node.from, to: node.to };
}

function text(node: SyntaxNode, source: string): string {
  return source.slice(node.from, node.to);
}

function children(node: SyntaxNode): SyntaxNode[] {
  const result: SyntaxNode[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (!PUNCTUATION.has(child.name)) result.push(child);
  }
  return result;
}

function unexpected(node: SyntaxNode): never {
  throw new Error(`unexpected syntax node: ${node.name} at ${node.from}`);
}

// ============================================
// Templates and terms
// ============================================

function convertTemplate(node: SyntaxNode, source: string): ExpressionNode {
  const items = children(node).map((term) => convertTerm(term, source));
  if (items.length === 1) {
    return items[0];
  }
  return { kind: "list", items, span: spanOf(node) };
}

function convertTerm(node: SyntaxNode, source: string): ExpressionNode {
  const [first, ...chain] = children(node);
  if (!first) unexpected(node);

  return chain.reduce<ExpressionNode>((object, methodNode) => {
    const callNode = methodNode.getChild("FunctionCall");
    if (methodNode.name !== "MethodCall" || !callNode) unexpected(methodNode);
    return {
      kind: "methodCall",
      method: { object, call: convertFunctionCall(callNode, source) },
      span: spanOf(methodNode),
    };
  }, convertPrimary(first, source));
}

function convertPrimary(node: SyntaxNode, source: string): ExpressionNode {
  switch (node.name) {
    case "String":
      return { kind: "string", value: decodeString(text(node, source)), span: spanOf(node) };
    case "Integer":
      return { kind: "integer", value: parseInteger(text(node, source), spanOf(node)), span: spanOf(node) };
    case "Identifier":
      return { kind: "identifier", name: text(node, source), span: spanOf(node) };
    case "FunctionCall":
      return { kind: "functionCall", call: convertFunctionCall(node, source), span: spanOf(node) };
    case "Group": {
      const inner = node.getChild("Template");
      if (!inner) unexpected(node);
      return convertTemplate(inner, source);
    }
    default:
      unexpected(node);
  }
}

// ============================================
// Calls
// ============================================

function convertFunctionCall(node: SyntaxNode, source: string): FunctionCallNode {
  const nameNode = node.getChild("FunctionName");
  const argsNode = node.getChild("Arguments");
  if (!nameNode || !argsNode) unexpected(node);

  return {
    name: text(nameNode, source),
    nameSpan: spanOf(nameNode),
    args: children(argsNode).map((arg) => convertTemplate(arg, source)),
    argsSpan: { from: argsNode.from + 1, to: argsNode.to - 1 },
  };
}

// ============================================
// Literals
// ============================================

function decodeString(literal: string): string {
  let result = "";
  for (let i = 1; i < literal.length - 1; i++) {
    const ch = literal[i];
    if (ch !== "\\") {
      result += ch;
      continue;
    }
    const escaped = literal[++i];
    switch (escaped) {
      case '"':
        result += '"';
        break;
      case "\\":
        result += "\\";
        break;
      case "n":
        result += "\n";
        break;
      default:
        // The grammar only admits the escapes above.
        throw new Error(`invalid escape: \\${escaped}`);
    }
  }
  return result;
}

function parseInteger(digits: string, literalSpan: SourceSpan): bigint {
  if (digits.length > 1 && digits.startsWith("0")) {
    throw TemplateParseError.syntaxError(literalSpan);
  }
  const value = BigInt(digits);
  if (value > I64_MAX) {
    throw new TemplateParseError(
      { type: "ParseIntError", reason: "number too large to fit in target type" },
      literalSpan
    );
  }
  return value;
}
