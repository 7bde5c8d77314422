/**
 * Lezer parser for the template grammar.
 *
 * The grammar is compiled when this module loads. The parser runs in strict
 * mode, so malformed input throws instead of producing error nodes.
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { buildParser } from "@lezer/generator";
import type { LRParser } from "@lezer/lr";
import { functionNameTokenizer } from "./tokens";
import { highlighting } from "./highlight";

const grammarPath = fileURLToPath(new URL("./template.grammar", import.meta.url));

function loadParser(): LRParser {
  const grammar = readFileSync(grammarPath, "utf-8");
  const built = buildParser(grammar, {
    fileName: grammarPath,
    warn: (message) => console.warn(message),
    externalTokenizer: (name, terms) => {
      if (name !== "functionName") {
        throw new Error(`Unknown external tokenizer: ${name}`);
      }
      return functionNameTokenizer(terms.FunctionName);
    },
  });
  return built.configure({ props: [highlighting], strict: true });
}

export const parser = loadParser();
