/**
 * Template AST - the untyped syntax tree produced by the parser.
 *
 * No name resolution or type checking has happened yet: identifiers are
 * plain names, and function/method calls are just names with argument lists.
 */

// ============================================
// Source Spans
// ============================================

export type SourceSpan = {
  from: number; // Start offset in source
  to: number; // End offset in source (exclusive)
};

export type Spanned<T> = T & { span: SourceSpan };

// ============================================
// Expressions
// ============================================

export type ExpressionNode = Spanned<ExpressionKind>;

export type ExpressionKind =
  | { kind: "identifier"; name: string }
  | { kind: "integer"; value: bigint }
  | { kind: "string"; value: string }
  | { kind: "list"; items: ExpressionNode[] }
  | { kind: "functionCall"; call: FunctionCallNode }
  | { kind: "methodCall"; method: MethodCallNode };

export type FunctionCallNode = {
  name: string;
  nameSpan: SourceSpan;
  args: ExpressionNode[];
  /** Text between the parentheses; arity errors point here. */
  argsSpan: SourceSpan;
};

export type MethodCallNode = {
  object: ExpressionNode;
  call: FunctionCallNode;
};

// ============================================
// Helper functions
// ============================================

export function emptySpan(): SourceSpan {
  return { from: 0, to: 0 };
}

/**
 * Drop every span so trees parsed from differently spaced sources can be
 * compared with a deep equality check.
 */
export function normalizeTree(node: ExpressionNode): ExpressionNode {
  const span = emptySpan();
  switch (node.kind) {
    case "identifier":
    case "integer":
    case "string":
      return { ...node, span };
    case "list":
      return { kind: "list", items: node.items.map(normalizeTree), span };
    case "functionCall":
      return { kind: "functionCall", call: normalizeCall(node.call), span };
    case "methodCall":
      return {
        kind: "methodCall",
        method: {
          object: normalizeTree(node.method.object),
          call: normalizeCall(node.method.call),
        },
        span,
      };
  }
}

function normalizeCall(call: FunctionCallNode): FunctionCallNode {
  return {
    name: call.name,
    nameSpan: emptySpan(),
    args: call.args.map(normalizeTree),
    argsSpan: emptySpan(),
  };
}
