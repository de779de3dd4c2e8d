import { BinaryOpExpr, Expr, Program, Stmt } from "../ast";
import { noMatch } from "../utils";
import { BlockScope } from "./block-scope";
import {
  isNumeric,
  SemanticError,
  SemanticReason,
  StaticType,
} from "./types";

export class TreeWalker {
  private errors: SemanticError[] = [];
  constructor(private scope: BlockScope) {}
  program(program: Program): SemanticError[] {
    this.errors = [];
    this.block(program.body);
    return this.errors;
  }
  private report(reason: SemanticReason, detail: string, line: number): void {
    this.errors.push(new SemanticError(reason, detail, line));
  }
  private block(body: Stmt[]): void {
    for (const stmt of body) {
      this.stmt(stmt);
    }
  }
  private stmt(stmt: Stmt): void {
    switch (stmt.tag) {
      case "expr":
        this.expr(stmt.expr);
        return;
      case "assign": {
        const type = this.expr(stmt.expr);
        const func = this.scope.assignVariable(stmt.target, type, stmt.line);
        if (func) {
          this.report(
            "TypeMismatch",
            `cannot assign to function '${stmt.target}'`,
            stmt.line
          );
        }
        return;
      }
      case "if": {
        const { thenBlock, elseBlock } = stmt;
        this.expr(stmt.condition);
        this.scope.inScope("block", () => this.block(thenBlock.body));
        if (elseBlock) {
          this.scope.inScope("block", () => this.block(elseBlock.body));
        }
        return;
      }
      case "while": {
        const { body } = stmt;
        this.expr(stmt.condition);
        this.scope.inScope("loop", () => this.block(body.body));
        return;
      }
      case "for": {
        const { init, condition, update, body } = stmt;
        this.scope.inScope("loop", () => {
          if (init) this.stmt(init);
          if (condition) this.expr(condition);
          this.block(body.body);
          // the update runs after the body
          if (update) this.stmt(update);
        });
        return;
      }
      case "func": {
        const { name, parameters, body, line } = stmt;
        // declared before the body is walked, so it may call itself
        this.scope.declareFunction(name, parameters.length, line);
        this.scope.inScope("function", () => {
          for (const param of parameters) {
            this.scope.declareParameter(param, line);
          }
          this.block(body.body);
        });
        return;
      }
      case "return":
        if (!this.scope.inFunction()) {
          this.report("IllegalReturn", "'return' outside a function", stmt.line);
        }
        if (stmt.expr) this.expr(stmt.expr);
        return;
      case "break":
      case "continue":
        if (!this.scope.inLoop()) {
          this.report(
            "IllegalBreakOrContinue",
            `'${stmt.tag}' outside a loop`,
            stmt.line
          );
        }
        return;
      case "block": {
        const { body } = stmt;
        this.scope.inScope("block", () => this.block(body));
        return;
      }
      // istanbul ignore next
      default:
        noMatch(stmt);
    }
  }
  private expr(expr: Expr): StaticType {
    switch (expr.tag) {
      case "literal":
        return expr.value.tag;
      case "identifier": {
        const symbol = this.scope.getValue(expr.name);
        if (symbol?.tag === "variable") return symbol.type;
        this.report(
          "UndefinedVariable",
          symbol
            ? `'${expr.name}' is a function, not a variable`
            : `'${expr.name}' is not defined`,
          expr.line
        );
        return "unknown";
      }
      case "unaryOp": {
        const type = this.expr(expr.operand);
        if (expr.operator === "!") {
          if (type !== "boolean" && type !== "unknown") {
            this.report(
              "TypeMismatch",
              `operator '!' cannot be applied to ${type}`,
              expr.line
            );
          }
          return "boolean";
        }
        if (!isNumeric(type) && type !== "unknown") {
          this.report(
            "TypeMismatch",
            `operator '-' cannot be applied to ${type}`,
            expr.line
          );
          return "unknown";
        }
        return type;
      }
      case "binaryOp":
        return this.binaryOp(expr);
      case "call": {
        for (const arg of expr.args) {
          this.expr(arg);
        }
        const func = this.scope.getFunction(expr.callee);
        if (!func) {
          this.report(
            "UndefinedFunction",
            this.scope.getVariable(expr.callee)
              ? `'${expr.callee}' is a variable, not a function`
              : `function '${expr.callee}' is not defined`,
            expr.line
          );
        } else if (func.arity !== expr.args.length) {
          this.report(
            "ArityMismatch",
            `'${expr.callee}' expects ${func.arity} argument(s), received ${expr.args.length}`,
            expr.line
          );
        }
        return "unknown";
      }
      // istanbul ignore next
      default:
        return noMatch(expr);
    }
  }
  private binaryOp(expr: BinaryOpExpr): StaticType {
    const left = this.expr(expr.left);
    const right = this.expr(expr.right);
    const known = left !== "unknown" && right !== "unknown";
    const mismatch = (): StaticType => {
      this.report(
        "TypeMismatch",
        `operator '${expr.operator}' cannot be applied to ${left} and ${right}`,
        expr.line
      );
      return "unknown";
    };
    const numericOrUnknown = (type: StaticType) =>
      isNumeric(type) || type === "unknown";

    switch (expr.operator) {
      case "+":
      case "-":
      case "*":
      case "/":
      case "%":
        if (!numericOrUnknown(left) || !numericOrUnknown(right)) {
          return mismatch();
        }
        if (left === "float" || right === "float") return "float";
        return known ? "integer" : "unknown";
      case "&&":
      case "||": {
        const ok = (type: StaticType) =>
          type === "boolean" || type === "unknown";
        if (!ok(left) || !ok(right)) mismatch();
        return "boolean";
      }
      case "==":
      case "!=":
        if (known && category(left) !== category(right)) mismatch();
        return "boolean";
      case "<":
      case ">":
      case "<=":
      case ">=": {
        const ordered = (type: StaticType) =>
          numericOrUnknown(type) || type === "string";
        if (
          !ordered(left) ||
          !ordered(right) ||
          (known && category(left) !== category(right))
        ) {
          mismatch();
        }
        return "boolean";
      }
      // istanbul ignore next
      default:
        return noMatch(expr.operator);
    }
  }
}

function category(type: StaticType): string {
  return isNumeric(type) ? "numeric" : type;
}
