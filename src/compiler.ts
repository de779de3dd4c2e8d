import {
  BinaryOperator,
  Expr,
  FuncStmt,
  Program,
  Stmt,
} from "./ast";
import { StageError } from "./errors";
import { Instruction, NullaryOpcode, Opcode } from "./opcode";
import { Scope } from "./scope";
import { noMatch } from "./utils";
import { integer } from "./value";
import { Writer } from "./writer";

export class CodegenError extends StageError {
  readonly kind = "CodegenError";
  constructor(detail: string, public readonly line: number) {
    super(`Code generation failed on line ${line}: ${detail}`);
  }
}

export function compile(program: Program): Instruction[] {
  return new Compiler().compileProgram(program);
}

const binaryOpcodes: Record<BinaryOperator, NullaryOpcode> = {
  "+": Opcode.Add,
  "-": Opcode.Sub,
  "*": Opcode.Mul,
  "/": Opcode.Div,
  "%": Opcode.Mod,
  "&&": Opcode.And,
  "||": Opcode.Or,
  "==": Opcode.Eq,
  "!=": Opcode.Neq,
  "<": Opcode.Lt,
  ">": Opcode.Gt,
  "<=": Opcode.Lte,
  ">=": Opcode.Gte,
};

type LoopLabels = { breakLabel: string; continueLabel: string };

class LabelState {
  private count = 0;
  private funcCounts: Map<string, number> = new Map();
  create(): string {
    this.count++;
    return `L${this.count}`;
  }
  // `@` cannot start an identifier, so function labels never meet `L<n>`
  createFunc(name: string): string {
    const count = (this.funcCounts.get(name) ?? 0) + 1;
    this.funcCounts.set(name, count);
    return count === 1 ? `@${name}` : `@${name}#${count}`;
  }
}

class Compiler {
  private asm = new Writer();
  private functionCode: Instruction[] = [];
  private labels = new LabelState();
  private functions = new Scope<string, string>();
  private loops: LoopLabels[] = [];
  compileProgram(program: Program): Instruction[] {
    this.compileBlock(program.body);
    this.asm.halt();
    // function bodies sit past HALT, out of the way of the main flow
    return [...this.asm.compile(), ...this.functionCode];
  }
  private compileBlock(block: Stmt[]) {
    for (const stmt of block) {
      this.compileStmt(stmt);
    }
  }
  private compileStmt(stmt: Stmt) {
    switch (stmt.tag) {
      case "expr":
        this.compileExpr(stmt.expr);
        this.asm.pop();
        return;
      case "assign":
        this.compileExpr(stmt.expr);
        this.asm.store(stmt.target);
        return;
      case "if": {
        const condElse = stmt.elseBlock ? this.labels.create() : null;
        const condEnd = this.labels.create();
        this.compileExpr(stmt.condition);
        this.asm.jumpIfFalse(condElse ?? condEnd);
        this.compileBlock(stmt.thenBlock.body);
        if (stmt.elseBlock && condElse) {
          this.asm.jump(condEnd);
          this.asm.label(condElse);
          this.compileBlock(stmt.elseBlock.body);
        }
        this.asm.label(condEnd);
        return;
      }
      case "while": {
        const loopBegin = this.labels.create();
        const loopEnd = this.labels.create();
        this.asm.label(loopBegin);
        this.compileExpr(stmt.condition);
        this.asm.jumpIfFalse(loopEnd);
        this.compileLoopBody(stmt.body.body, {
          breakLabel: loopEnd,
          continueLabel: loopBegin,
        });
        this.asm.jump(loopBegin);
        this.asm.label(loopEnd);
        return;
      }
      case "for": {
        if (stmt.init) this.compileStmt(stmt.init);
        const loopBegin = this.labels.create();
        const loopNext = this.labels.create();
        const loopEnd = this.labels.create();
        this.asm.label(loopBegin);
        if (stmt.condition) {
          this.compileExpr(stmt.condition);
          this.asm.jumpIfFalse(loopEnd);
        }
        this.compileLoopBody(stmt.body.body, {
          breakLabel: loopEnd,
          continueLabel: loopNext,
        });
        this.asm.label(loopNext);
        if (stmt.update) this.compileStmt(stmt.update);
        this.asm.jump(loopBegin);
        this.asm.label(loopEnd);
        return;
      }
      case "func":
        this.compileFunc(stmt);
        return;
      case "return":
        if (stmt.expr) {
          this.compileExpr(stmt.expr);
        } else {
          this.asm.push(integer(0n));
        }
        this.asm.return();
        return;
      case "break":
      case "continue": {
        const loop = this.loops[this.loops.length - 1];
        if (!loop) {
          throw new CodegenError(`'${stmt.tag}' outside a loop`, stmt.line);
        }
        this.asm.jump(
          stmt.tag === "break" ? loop.breakLabel : loop.continueLabel
        );
        return;
      }
      case "block":
        this.compileBlock(stmt.body);
        return;
      // istanbul ignore next
      default:
        noMatch(stmt);
    }
  }
  private compileLoopBody(block: Stmt[], labels: LoopLabels) {
    this.loops.push(labels);
    this.compileBlock(block);
    this.loops.pop();
  }
  private compileFunc(stmt: FuncStmt) {
    const label = this.labels.createFunc(stmt.name);
    // bound before the body is compiled, so it may call itself
    this.functions.set(stmt.name, label);

    const outer = {
      asm: this.asm,
      loops: this.loops,
      functions: this.functions,
    };
    this.asm = new Writer();
    this.loops = [];
    this.functions = this.functions.push("function");

    this.asm.label(label);
    // arguments arrive in order, so the last one is on top
    for (const param of [...stmt.parameters].reverse()) {
      this.asm.store(param);
    }
    this.compileBlock(stmt.body.body);
    this.asm.push(integer(0n)).return();
    this.functionCode.push(...this.asm.compile());

    this.asm = outer.asm;
    this.loops = outer.loops;
    this.functions = outer.functions;
  }
  private compileExpr(expr: Expr) {
    switch (expr.tag) {
      case "literal":
        this.asm.push(expr.value);
        return;
      case "identifier":
        this.asm.load(expr.name);
        return;
      case "binaryOp":
        this.compileExpr(expr.left);
        this.compileExpr(expr.right);
        this.asm.writeOpcode(binaryOpcodes[expr.operator]);
        return;
      case "unaryOp":
        this.compileExpr(expr.operand);
        this.asm.writeOpcode(expr.operator === "-" ? Opcode.Neg : Opcode.Not);
        return;
      case "call": {
        for (const arg of expr.args) {
          this.compileExpr(arg);
        }
        const label = this.functions.lookup(expr.callee);
        if (label === undefined) {
          throw new CodegenError(
            `call to unknown function '${expr.callee}'`,
            expr.line
          );
        }
        this.asm.call(label, expr.args.length);
        return;
      }
      // istanbul ignore next
      default:
        noMatch(expr);
    }
  }
}
