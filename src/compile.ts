/**
 * Template compilation entry point.
 */

import { buildExpression, type BuildOptions } from "./builder/build";
import { intoTemplate, type KeywordResolver } from "./builder/expression";
import { parseTemplate } from "./parser/convert";
import type { Template } from "./render/template";

/**
 * Parse and build a template. The result can be rendered against any number
 * of contexts; nothing is rebuilt between renders.
 *
 * @throws TemplateParseError on the first syntax, name, arity or type error
 */
export function compileTemplate<C>(
  source: string,
  buildKeyword: KeywordResolver<C>,
  options?: BuildOptions
): Template<C> {
  const node = parseTemplate(source);
  return intoTemplate(buildExpression(node, buildKeyword, options));
}
