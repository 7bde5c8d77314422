/**
 * Build the evaluation tree from the AST.
 *
 * Identifiers are resolved through the caller's keyword resolver; literals
 * become constant properties; lists, functions and methods are dispatched
 * to their builders. The first error aborts the build.
 */

import type { ExpressionNode, MethodCallNode } from "../ast/template-ast";
import { TemplateParseError } from "../errors";
import { ListTemplate } from "../render/template";
import { constant, property } from "../values/property";
import { buildFunctionCall, builtinFunctions, type FunctionBuilder } from "./builtins";
import {
  intoTemplate,
  propertyExpression,
  templateExpression,
  type BuildContext,
  type Expression,
  type KeywordResolver,
} from "./expression";
import { buildPropertyMethod } from "./methods";

export interface BuildOptions {
  /** Extra global functions; entries override builtins of the same name. */
  functions?: ReadonlyMap<string, FunctionBuilder>;
}

export function buildExpression<C>(
  root: ExpressionNode,
  buildKeyword: KeywordResolver<C>,
  options: BuildOptions = {}
): Expression<C> {
  const functions = options.functions
    ? new Map([...builtinFunctions, ...options.functions])
    : builtinFunctions;

  const builder: BuildContext<C> = { build };

  function build(node: ExpressionNode): Expression<C> {
    switch (node.kind) {
      case "identifier": {
        const keyword = buildKeyword(node.name, node.span);
        if (!keyword) {
          throw TemplateParseError.noSuchKeyword(node.name, node.span);
        }
        return propertyExpression(keyword.property, keyword.labels);
      }
      case "integer":
        return propertyExpression(property("Integer", constant(node.value)));
      case "string":
        return propertyExpression(property("String", constant(node.value)));
      case "list":
        return templateExpression(new ListTemplate(node.items.map((item) => intoTemplate(build(item)))));
      case "functionCall":
        return buildFunctionCall(functions, node.call, builder);
      case "methodCall":
        return buildMethodCall(node.method);
    }
  }

  function buildMethodCall(method: MethodCallNode): Expression<C> {
    const object = build(method.object);
    if (object.kind === "template") {
      throw TemplateParseError.noSuchMethod("Template", method.call.name, method.call.nameSpan);
    }
    const { property: self, labels } = object.value;
    const result = buildPropertyMethod(self, method.call, builder);
    return propertyExpression(result, [...labels, method.call.name]);
  }

  return build(root);
}
