// prettier-ignore
export const keywords = [
  "if", "else", "while", "for", "break", "continue", "return", "func",
  "true", "false",
] as const;

// longest first, so that `<=` is never read as `<` followed by `=`
// prettier-ignore
export const operators = [
  "&&", "||", "==", "!=", "<=", ">=",
  "+", "-", "*", "/", "%", "<", ">", "!", "=",
] as const;

export const punctuation = [";", ",", "(", ")", "{", "}"] as const;

export type Keyword = (typeof keywords)[number];
export type Operator = (typeof operators)[number];
export type Punctuation = (typeof punctuation)[number];

type Simple<Tag extends string> = {
  [K in Tag]: { tag: K; line: number };
}[Tag];

export type Token =
  | { tag: "integer"; value: bigint; line: number }
  | { tag: "float"; value: number; line: number }
  | { tag: "string"; value: string; line: number }
  | { tag: "identifier"; value: string; line: number }
  | Simple<Keyword | Operator | Punctuation | "endOfInput">;

export type TokenTag = Token["tag"];

export type TokenKind =
  | "identifier"
  | "number"
  | "string"
  | "operator"
  | "keyword"
  | "punctuation"
  | "endOfInput";

export function isKeyword(text: string): text is Keyword {
  return keywords.some((keyword) => keyword === text);
}

export function isOperator(text: string): text is Operator {
  return operators.some((op) => op === text);
}

export function isPunctuation(text: string): text is Punctuation {
  return punctuation.some((p) => p === text);
}

export function tokenKind(token: Token): TokenKind {
  switch (token.tag) {
    case "integer":
    case "float":
      return "number";
    case "string":
    case "identifier":
    case "endOfInput":
      return token.tag;
    default:
      if (isKeyword(token.tag)) return "keyword";
      if (isOperator(token.tag)) return "operator";
      return "punctuation";
  }
}

export function describeToken(token: Token): string {
  switch (token.tag) {
    case "integer":
    case "float":
      return `number ${token.value}`;
    case "string":
      return `string "${token.value}"`;
    case "identifier":
      return `identifier '${token.value}'`;
    case "endOfInput":
      return "end of input";
    default:
      return `${tokenKind(token)} '${token.tag}'`;
  }
}
