import moo from "moo";
import { StageError } from "./errors";
import {
  isKeyword,
  isOperator,
  isPunctuation,
  keywords,
  operators,
  punctuation,
  Token,
} from "./token";

export class LexicalError extends StageError {
  readonly kind = "LexicalError";
  constructor(public readonly character: string, public readonly line: number) {
    super(`Unrecognized character '${character}' on line ${line}`);
  }
}

const keywordSet: ReadonlySet<string> = new Set(keywords);

const rules: moo.Rules = {
  whitespace: { match: /[ \t\r\n]+/, lineBreaks: true },
  blockComment: { match: /\/\*[^]*?\*\//, lineBreaks: true },
  comment: /\/\/[^\n]*/,
  number: /[0-9]+(?:\.[0-9]+)?(?:[eE][+-]?[0-9]+)?/,
  string: {
    match: /"(?:\\["\\]|[^\n"\\])*"|'(?:\\['\\]|[^\n'\\])*'/,
    value: (text) => text.slice(1, -1).replace(/\\(["'\\])/g, "$1"),
  },
  word: {
    match: /[A-Za-z_][A-Za-z0-9_]*/,
    type: (text) => (keywordSet.has(text) ? "keyword" : "identifier"),
  },
  operator: [...operators],
  punctuation: [...punctuation],
  error: moo.error,
};

/**
 * A lazy token sequence over one source text. Every iteration starts again
 * from the beginning, and ends with a single `endOfInput` token.
 */
export class Lexer implements Iterable<Token> {
  constructor(private readonly source: string) {}
  *[Symbol.iterator](): Iterator<Token> {
    const lexer = moo.compile(rules).reset(this.source);
    let line = 1;
    for (const tok of lexer) {
      line = tok.line + tok.lineBreaks;
      if (
        tok.type === "whitespace" ||
        tok.type === "comment" ||
        tok.type === "blockComment"
      ) {
        continue;
      }
      yield toToken(tok);
    }
    yield { tag: "endOfInput", line };
  }
}

export function lex(source: string): Token[] {
  return Array.from(new Lexer(source));
}

function toToken(tok: moo.Token): Token {
  const { line } = tok;
  switch (tok.type) {
    case "number":
      return /[.eE]/.test(tok.value)
        ? { tag: "float", value: Number(tok.value), line }
        : { tag: "integer", value: BigInt(tok.value), line };
    case "string":
      return { tag: "string", value: tok.value, line };
    case "identifier":
      return { tag: "identifier", value: tok.value, line };
    case "keyword":
      if (isKeyword(tok.value)) return { tag: tok.value, line };
      break;
    case "operator":
      if (isOperator(tok.value)) return { tag: tok.value, line };
      break;
    case "punctuation":
      if (isPunctuation(tok.value)) return { tag: tok.value, line };
      break;
  }
  // moo's error token holds the rest of the input
  throw new LexicalError(String.fromCodePoint(tok.text.codePointAt(0) ?? 0), line);
}
