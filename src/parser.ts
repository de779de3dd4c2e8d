import {
  Block,
  BinaryOperator,
  Expr,
  Program,
  SimpleStmt,
  Stmt,
} from "./ast";
import { StageError } from "./errors";
import { describeToken, Token, TokenTag } from "./token";
import { boolean, float, integer, string } from "./value";

interface IParseState {
  token(): Token;
  peek(offset: number): Token;
  advance(): void;
}

type Parser<T> = (state: IParseState) => T;

class ParseState implements IParseState {
  private index = 0;
  private readonly endOfInput: Token;
  constructor(private tokens: Token[]) {
    const last = tokens[tokens.length - 1];
    this.endOfInput = { tag: "endOfInput", line: last ? last.line : 1 };
  }
  token(): Token {
    return this.peek(0);
  }
  peek(offset: number): Token {
    return this.tokens[this.index + offset] ?? this.endOfInput;
  }
  advance(): void {
    this.index++;
  }
}

export class ParseError extends StageError {
  readonly kind = "SyntaxError";
  readonly line: number;
  constructor(public readonly expected: string, public readonly received: Token) {
    super(
      `Syntax error on line ${received.line}: expected ${expected}, received ${describeToken(received)}`
    );
    this.line = received.line;
  }
}

export function parse(input: Token[]): Program {
  return matchProgram(new ParseState(input));
}

const matchProgram: Parser<Program> = (state) => {
  const { line } = state.token();
  const body = parseUntil(state, matchStatement, checkEndOfInput);
  return { tag: "program", body, line };
};

const matchStatement: Parser<Stmt> = (state) => {
  const token = state.token();
  const { line } = token;
  switch (token.tag) {
    case "if":
      return matchIf(state);
    case "while": {
      state.advance();
      match(state, "(");
      const condition = matchExpr(state);
      match(state, ")");
      const body = matchBlock(state);
      return { tag: "while", condition, body, line };
    }
    case "for": {
      state.advance();
      match(state, "(");
      const init = checkSimpleStatement(state);
      match(state, ";");
      const condition = checkExpr(state);
      match(state, ";");
      const update = checkSimpleStatement(state);
      match(state, ")");
      const body = matchBlock(state);
      return { tag: "for", init, condition, update, body, line };
    }
    case "func": {
      state.advance();
      const name = match(state, "identifier").value;
      match(state, "(");
      const parameters = commaList(state, checkParameter);
      match(state, ")");
      const body = matchBlock(state);
      return { tag: "func", name, parameters, body, line };
    }
    case "return": {
      state.advance();
      const expr = checkExpr(state);
      match(state, ";");
      return { tag: "return", expr, line };
    }
    case "break":
    case "continue":
      state.advance();
      match(state, ";");
      return { tag: token.tag, line };
    case "{":
      return matchBlock(state);
    default: {
      const stmt = assert(state, "statement", checkSimpleStatement(state));
      match(state, ";");
      return stmt;
    }
  }
};

// `else if` is read as an else block holding a single if statement
const matchIf: Parser<Stmt> = (state) => {
  const { line } = match(state, "if");
  match(state, "(");
  const condition = matchExpr(state);
  match(state, ")");
  const thenBlock = matchBlock(state);
  let elseBlock: Block | null = null;
  if (check(state, "else")) {
    const next = state.token();
    elseBlock =
      next.tag === "if"
        ? { tag: "block", body: [matchIf(state)], line: next.line }
        : matchBlock(state);
  }
  return { tag: "if", condition, thenBlock, elseBlock, line };
};

const checkSimpleStatement: Parser<SimpleStmt | null> = (state) => {
  const token = state.token();
  if (token.tag === "identifier" && state.peek(1).tag === "=") {
    state.advance();
    state.advance();
    const expr = matchExpr(state);
    return { tag: "assign", target: token.value, expr, line: token.line };
  }
  const expr = checkExpr(state);
  if (!expr) return null;
  return { tag: "expr", expr, line: token.line };
};

const checkParameter: Parser<string | null> = (state) => {
  const param = check(state, "identifier");
  return param ? param.value : null;
};

const matchExpr: Parser<Expr> = (state) => {
  return assert(state, "expression", checkExpr(state));
};

const checkExpr: Parser<Expr | null> = (state) => {
  return infixLeft(state, checkAndExpr, ["||"]);
};

const checkAndExpr: Parser<Expr | null> = (state) => {
  return infixLeft(state, checkEqualityExpr, ["&&"]);
};

const checkEqualityExpr: Parser<Expr | null> = (state) => {
  return infixLeft(state, checkRelationalExpr, ["==", "!="]);
};

const checkRelationalExpr: Parser<Expr | null> = (state) => {
  return infixLeft(state, checkAddExpr, ["<", ">", "<=", ">="]);
};

const checkAddExpr: Parser<Expr | null> = (state) => {
  return infixLeft(state, checkMulExpr, ["+", "-"]);
};

const checkMulExpr: Parser<Expr | null> = (state) => {
  return infixLeft(state, checkPrefixExpr, ["*", "/", "%"]);
};

const checkPrefixExpr: Parser<Expr | null> = (state) => {
  const tok = state.token();
  if (tok.tag === "!" || tok.tag === "-") {
    state.advance();
    const operand = assert(state, "expression", checkPrefixExpr(state));
    return { tag: "unaryOp", operator: tok.tag, operand, line: tok.line };
  } else {
    return checkBaseExpr(state);
  }
};

const checkBaseExpr: Parser<Expr | null> = (state) => {
  const token = state.token();
  const { line } = token;
  switch (token.tag) {
    case "(": {
      state.advance();
      const expr = matchExpr(state);
      match(state, ")");
      return expr;
    }
    case "identifier":
      state.advance();
      if (check(state, "(")) {
        const args = commaList(state, checkExpr);
        match(state, ")");
        return { tag: "call", callee: token.value, args, line };
      }
      return { tag: "identifier", name: token.value, line };
    case "integer":
      state.advance();
      return { tag: "literal", value: integer(token.value), line };
    case "float":
      state.advance();
      return { tag: "literal", value: float(token.value), line };
    case "string":
      state.advance();
      return { tag: "literal", value: string(token.value), line };
    case "true":
    case "false":
      state.advance();
      return { tag: "literal", value: boolean(token.tag === "true"), line };
    default:
      return null;
  }
};

const checkEndOfInput: Parser<boolean> = (state) => {
  return !!check(state, "endOfInput");
};

const checkEndBrace: Parser<boolean> = (state) => {
  return !!check(state, "}");
};

const matchBlock: Parser<Block> = (state) => {
  const { line } = match(state, "{");
  const body = parseUntil(state, matchStatement, checkEndBrace);
  return { tag: "block", body, line };
};

// utilities

type TokenOf<Tag extends TokenTag> = Extract<Token, { tag: Tag }>;

function isTag<Tag extends TokenTag>(
  token: Token,
  tag: Tag
): token is TokenOf<Tag> {
  return token.tag === tag;
}

function check<Tag extends TokenTag>(
  state: IParseState,
  tag: Tag
): TokenOf<Tag> | null {
  const token = state.token();
  if (isTag(token, tag)) {
    state.advance();
    return token;
  } else {
    return null;
  }
}

function match<Tag extends TokenTag>(
  state: IParseState,
  tag: Tag
): TokenOf<Tag> {
  const token = state.token();
  if (isTag(token, tag)) {
    state.advance();
    return token;
  } else {
    throw new ParseError(`'${tag}'`, token);
  }
}

function parseUntil<T>(
  state: IParseState,
  parseValue: Parser<T>,
  parseEnd: Parser<boolean>
): T[] {
  const out: T[] = [];
  while (!parseEnd(state)) {
    out.push(parseValue(state));
  }
  return out;
}

function infixLeft(
  state: IParseState,
  nextParser: Parser<Expr | null>,
  operators: BinaryOperator[]
): Expr | null {
  const first = nextParser(state);
  if (!first) return null;
  let left: Expr = first;
  while (true) {
    const token = state.token();
    const operator = operators.find((op) => op === token.tag);
    if (!operator) {
      break;
    }
    state.advance();
    const right = assert(state, "expression", nextParser(state));
    left = { tag: "binaryOp", operator, left, right, line: token.line };
  }
  return left;
}

function commaList<T>(state: IParseState, checkParser: Parser<T | null>): T[] {
  const out: T[] = [];
  while (true) {
    const res = checkParser(state);
    if (res === null) break;
    out.push(res);
    if (!check(state, ",")) break;
  }
  return out;
}

function assert<T>(state: IParseState, expected: string, res: T | null): T {
  if (res === null) {
    throw new ParseError(expected, state.token());
  }
  return res;
}
