/**
 * Builtin Registry
 *
 * Global functions callable from templates. Each entry builds its own
 * template from the call's argument nodes; adding a function means adding
 * an entry.
 */

import type { FunctionCallNode } from "../ast/template-ast";
import { TemplateParseError } from "../errors";
import { ConditionalTemplate, LabelTemplate, SeparateTemplate } from "../render/template";
import { mapProperty } from "../values/property";
import { expectArguments, expectExactArguments, expectSomeArguments } from "./arguments";
import {
  intoPlainText,
  intoTemplate,
  templateExpression,
  tryIntoBoolean,
  type BuildContext,
  type Expression,
} from "./expression";

export type FunctionBuilder = <C>(call: FunctionCallNode, builder: BuildContext<C>) => Expression<C>;

/**
 * label(labels, content): render content under the whitespace-separated
 * labels. The label text is itself evaluated per context.
 */
function buildLabel<C>(call: FunctionCallNode, builder: BuildContext<C>): Expression<C> {
  const [labelNode, contentNode] = expectExactArguments(call, 2);
  const labelText = intoPlainText(builder.build(labelNode));
  const content = intoTemplate(builder.build(contentNode));
  const labels = mapProperty(labelText, splitLabels);
  return templateExpression(new LabelTemplate(content, labels));
}

function splitLabels(text: string): readonly string[] {
  return text.split(/\s+/).filter((label) => label !== "");
}

/**
 * if(condition, then[, else])
 */
function buildIf<C>(call: FunctionCallNode, builder: BuildContext<C>): Expression<C> {
  const {
    required: [conditionNode, trueNode],
    optional: [falseNode],
  } = expectArguments(call, 2, 1);
  const condition = tryIntoBoolean(builder.build(conditionNode));
  if (!condition) {
    throw TemplateParseError.invalidArgumentType("Boolean", conditionNode.span);
  }
  const trueTemplate = intoTemplate(builder.build(trueNode));
  const falseTemplate = falseNode ? intoTemplate(builder.build(falseNode)) : undefined;
  return templateExpression(new ConditionalTemplate(condition, trueTemplate, falseTemplate));
}

/**
 * separate(separator, contents...)
 */
function buildSeparate<C>(call: FunctionCallNode, builder: BuildContext<C>): Expression<C> {
  const {
    required: [separatorNode],
    rest: contentNodes,
  } = expectSomeArguments(call, 1);
  const separator = intoTemplate(builder.build(separatorNode));
  const contents = contentNodes.map((node) => intoTemplate(builder.build(node)));
  return templateExpression(new SeparateTemplate(separator, contents));
}

export const builtinFunctions: ReadonlyMap<string, FunctionBuilder> = new Map<string, FunctionBuilder>([
  ["label", buildLabel],
  ["if", buildIf],
  ["separate", buildSeparate],
]);

/**
 * Build a global function call against the given function table.
 */
export function buildFunctionCall<C>(
  functions: ReadonlyMap<string, FunctionBuilder>,
  call: FunctionCallNode,
  builder: BuildContext<C>
): Expression<C> {
  const fn = functions.get(call.name);
  if (!fn) {
    throw TemplateParseError.noSuchFunction(call.name, call.nameSpan);
  }
  return fn(call, builder);
}
