import { Block, Expr, Program, SimpleStmt, Stmt } from "./ast";
import { noMatch } from "./utils";
import { formatValue } from "./value";

/**
 * Writes a program back out as source text. Binary operations are fully
 * parenthesized, so parsing the output gives back the same tree.
 */
export function print(program: Program): string {
  return program.body.map((stmt) => printStmt(stmt, 0)).join("\n");
}

function printStmt(stmt: Stmt, depth: number): string {
  const indent = "  ".repeat(depth);
  switch (stmt.tag) {
    case "assign":
    case "expr":
      return `${indent}${printSimple(stmt)};`;
    case "if": {
      const head = `${indent}if (${printExpr(stmt.condition)}) ${printBlock(
        stmt.thenBlock,
        depth
      )}`;
      return stmt.elseBlock
        ? `${head} else ${printBlock(stmt.elseBlock, depth)}`
        : head;
    }
    case "while":
      return `${indent}while (${printExpr(stmt.condition)}) ${printBlock(
        stmt.body,
        depth
      )}`;
    case "for": {
      const init = stmt.init ? printSimple(stmt.init) : "";
      const condition = stmt.condition ? printExpr(stmt.condition) : "";
      const update = stmt.update ? printSimple(stmt.update) : "";
      return `${indent}for (${init}; ${condition}; ${update}) ${printBlock(
        stmt.body,
        depth
      )}`;
    }
    case "func":
      return `${indent}func ${stmt.name}(${stmt.parameters.join(
        ", "
      )}) ${printBlock(stmt.body, depth)}`;
    case "return":
      return stmt.expr
        ? `${indent}return ${printExpr(stmt.expr)};`
        : `${indent}return;`;
    case "break":
    case "continue":
      return `${indent}${stmt.tag};`;
    case "block":
      return `${indent}${printBlock(stmt, depth)}`;
    // istanbul ignore next
    default:
      return noMatch(stmt);
  }
}

function printSimple(stmt: SimpleStmt): string {
  return stmt.tag === "assign"
    ? `${stmt.target} = ${printExpr(stmt.expr)}`
    : printExpr(stmt.expr);
}

function printBlock(block: Block, depth: number): string {
  if (!block.body.length) return "{}";
  const body = block.body.map((stmt) => printStmt(stmt, depth + 1));
  return `{\n${body.join("\n")}\n${"  ".repeat(depth)}}`;
}

export function printExpr(expr: Expr): string {
  switch (expr.tag) {
    case "literal":
      return formatValue(expr.value);
    case "identifier":
      return expr.name;
    case "binaryOp":
      return `(${printExpr(expr.left)} ${expr.operator} ${printExpr(
        expr.right
      )})`;
    case "unaryOp":
      return `${expr.operator}${printExpr(expr.operand)}`;
    case "call":
      return `${expr.callee}(${expr.args.map(printExpr).join(", ")})`;
    // istanbul ignore next
    default:
      return noMatch(expr);
  }
}

/** An indented outline of the tree, one node per line. */
export function dumpTree(program: Program): string {
  const lines: string[] = ["Program"];
  for (const stmt of program.body) {
    dumpStmt(stmt, 1, "", lines);
  }
  return lines.join("\n");
}

function dumpStmt(stmt: Stmt, depth: number, role: string, out: string[]) {
  const line = (text: string) => out.push(`${"|  ".repeat(depth)}${role}${text}`);
  switch (stmt.tag) {
    case "assign":
      line(`Assignment ${stmt.target}`);
      dumpExpr(stmt.expr, depth + 1, "", out);
      return;
    case "expr":
      line("ExprStatement");
      dumpExpr(stmt.expr, depth + 1, "", out);
      return;
    case "if":
      line("If");
      dumpExpr(stmt.condition, depth + 1, "Condition: ", out);
      dumpStmt(stmt.thenBlock, depth + 1, "Then: ", out);
      if (stmt.elseBlock) dumpStmt(stmt.elseBlock, depth + 1, "Else: ", out);
      return;
    case "while":
      line("While");
      dumpExpr(stmt.condition, depth + 1, "Condition: ", out);
      dumpStmt(stmt.body, depth + 1, "Body: ", out);
      return;
    case "for":
      line("For");
      if (stmt.init) dumpStmt(stmt.init, depth + 1, "Init: ", out);
      if (stmt.condition) {
        dumpExpr(stmt.condition, depth + 1, "Condition: ", out);
      }
      if (stmt.update) dumpStmt(stmt.update, depth + 1, "Update: ", out);
      dumpStmt(stmt.body, depth + 1, "Body: ", out);
      return;
    case "func":
      line(`FunctionDef ${stmt.name}(${stmt.parameters.join(", ")})`);
      dumpStmt(stmt.body, depth + 1, "Body: ", out);
      return;
    case "return":
      line("Return");
      if (stmt.expr) dumpExpr(stmt.expr, depth + 1, "", out);
      return;
    case "break":
      line("Break");
      return;
    case "continue":
      line("Continue");
      return;
    case "block":
      line("Block");
      for (const child of stmt.body) {
        dumpStmt(child, depth + 1, "", out);
      }
      return;
    // istanbul ignore next
    default:
      noMatch(stmt);
  }
}

function dumpExpr(expr: Expr, depth: number, role: string, out: string[]) {
  const line = (text: string) => out.push(`${"|  ".repeat(depth)}${role}${text}`);
  switch (expr.tag) {
    case "literal":
      line(`Literal ${formatValue(expr.value)}`);
      return;
    case "identifier":
      line(`Identifier ${expr.name}`);
      return;
    case "binaryOp":
      line(`BinaryOp ${expr.operator}`);
      dumpExpr(expr.left, depth + 1, "Left: ", out);
      dumpExpr(expr.right, depth + 1, "Right: ", out);
      return;
    case "unaryOp":
      line(`UnaryOp ${expr.operator}`);
      dumpExpr(expr.operand, depth + 1, "", out);
      return;
    case "call":
      line(`Call ${expr.callee}`);
      for (const arg of expr.args) {
        dumpExpr(arg, depth + 1, "Arg: ", out);
      }
      return;
    // istanbul ignore next
    default:
      noMatch(expr);
  }
}
