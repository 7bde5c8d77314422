/**
 * Build-time expressions and the coercions between them.
 *
 * An expression is either a property (a typed value plus the labels
 * collected while resolving it) or a template that only renders text.
 * Methods apply to properties; anything can become a template or plain text.
 */

import type { ExpressionNode, SourceSpan } from "../ast/template-ast";
import type { Property, TemplateProperty } from "../values/property";
import {
  FormattablePropertyTemplate,
  LabelTemplate,
  plainTextProperty,
  type Template,
} from "../render/template";

export type LabeledProperty<C> = {
  property: Property<C>;
  labels: readonly string[];
};

export type Expression<C> =
  | { kind: "property"; value: LabeledProperty<C> }
  | { kind: "template"; template: Template<C> };

/**
 * Maps an identifier to a property of the context type. Returning undefined
 * reports the identifier as an unknown keyword.
 */
export type KeywordResolver<C> = (name: string, span: SourceSpan) => LabeledProperty<C> | undefined;

/**
 * Handed to method and function builders so they can build their arguments.
 */
export interface BuildContext<C> {
  build(node: ExpressionNode): Expression<C>;
}

export function propertyExpression<C>(property: Property<C>, labels: readonly string[] = []): Expression<C> {
  return { kind: "property", value: { property, labels } };
}

export function templateExpression<C>(template: Template<C>): Expression<C> {
  return { kind: "template", template };
}

/**
 * Booleans pass through; strings are true when non-empty.
 */
export function tryIntoBoolean<C>(expression: Expression<C>): TemplateProperty<C, boolean> | undefined {
  if (expression.kind !== "property") return undefined;
  const { property } = expression.value;
  switch (property.tag) {
    case "Boolean":
      return property.extract;
    case "String": {
      const extract = property.extract;
      return (context) => extract(context) !== "";
    }
    default:
      return undefined;
  }
}

export function tryIntoInteger<C>(expression: Expression<C>): TemplateProperty<C, bigint> | undefined {
  if (expression.kind !== "property") return undefined;
  const { property } = expression.value;
  return property.tag === "Integer" ? property.extract : undefined;
}

export function intoPlainText<C>(expression: Expression<C>): TemplateProperty<C, string> {
  if (expression.kind === "template") {
    return plainTextProperty(expression.template);
  }
  const { property } = expression.value;
  if (property.tag === "String") {
    return property.extract;
  }
  return plainTextProperty(new FormattablePropertyTemplate(property));
}

export function intoTemplate<C>(expression: Expression<C>): Template<C> {
  if (expression.kind === "template") {
    return expression.template;
  }
  const { property, labels } = expression.value;
  const template = new FormattablePropertyTemplate(property);
  if (labels.length === 0) {
    return template;
  }
  return new LabelTemplate(template, () => labels);
}
