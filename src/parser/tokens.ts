/**
 * External tokenizer deciding when an identifier names a function.
 *
 * `name (` is a call even with whitespace before the parenthesis, so the
 * decision needs lookahead past the identifier that the built-in token
 * rules cannot express.
 */

import { ExternalTokenizer } from "@lezer/lr";

const OPEN_PAREN = 40; // (
const UNDERSCORE = 95; // _

function isAsciiLetter(ch: number): boolean {
  return (ch >= 65 && ch <= 90) || (ch >= 97 && ch <= 122);
}

function isDigit(ch: number): boolean {
  return ch >= 48 && ch <= 57;
}

function isWhitespace(ch: number): boolean {
  return ch === 32 || ch === 9 || ch === 10 || ch === 13;
}

export function functionNameTokenizer(functionName: number): ExternalTokenizer {
  return new ExternalTokenizer((input) => {
    if (!isAsciiLetter(input.next)) return;

    let length = 1;
    while (true) {
      const ch = input.peek(length);
      if (!isAsciiLetter(ch) && !isDigit(ch) && ch !== UNDERSCORE) break;
      length++;
    }

    let lookahead = length;
    while (isWhitespace(input.peek(lookahead))) lookahead++;

    if (input.peek(lookahead) === OPEN_PAREN) {
      input.acceptToken(functionName, length);
    }
  });
}
