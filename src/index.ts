import { Program } from "./ast";
import { check } from "./check";
import { CodegenError, compile } from "./compiler";
import { StageError } from "./errors";
import { execute, ExecuteOptions } from "./interpreter";
import { lex, LexicalError } from "./lexer";
import { Instruction } from "./opcode";
import { parse, ParseError } from "./parser";
import { Bindings } from "./value";

export type { Program } from "./ast";
export { check, SemanticError } from "./check";
export type { CheckResult, SemanticReason, StaticType } from "./check";
export { compile, CodegenError } from "./compiler";
export { disassemble, formatInstruction } from "./disassembler";
export { assemble, Assembler, AssemblyError } from "./assembler";
export { StageError } from "./errors";
export type { ErrorKind } from "./errors";
export { execute, interpret, RuntimeError } from "./interpreter";
export type {
  ExecuteOptions,
  ExecutionResult,
  RuntimeReason,
  TraceEvent,
} from "./interpreter";
export { lex, Lexer, LexicalError } from "./lexer";
export { Opcode } from "./opcode";
export type { Instruction } from "./opcode";
export { parse, ParseError } from "./parser";
export { dumpTree, print } from "./printer";
export type { Token } from "./token";
export { formatValue, unwrapBindings } from "./value";
export type { Bindings, Value } from "./value";

export type Stage = "lex" | "parse" | "check" | "compile" | "execute";

export type RunOptions = ExecuteOptions & {
  /** Stop after analysis; no bytecode is generated or run. */
  execute?: boolean;
};

export type RunResult =
  | {
      ok: true;
      ast: Program;
      bytecode: Instruction[] | null;
      bindings: Bindings | null;
    }
  | {
      ok: false;
      stage: Stage;
      errors: StageError[];
      ast: Program | null;
      bytecode: Instruction[] | null;
    };

/**
 * Runs source text through every stage. A stage that fails ends the run;
 * its errors come back with whatever the earlier stages produced.
 */
export default function run(
  source: string,
  options: RunOptions = {}
): RunResult {
  let ast: Program;
  try {
    ast = parse(lex(source));
  } catch (error) {
    if (error instanceof LexicalError) {
      return { ok: false, stage: "lex", errors: [error], ast: null, bytecode: null };
    }
    if (error instanceof ParseError) {
      return { ok: false, stage: "parse", errors: [error], ast: null, bytecode: null };
    }
    throw error;
  }

  const checked = check(ast);
  if (!checked.ok) {
    return { ok: false, stage: "check", errors: checked.errors, ast, bytecode: null };
  }
  if (options.execute === false) {
    return { ok: true, ast, bytecode: null, bindings: null };
  }

  let bytecode: Instruction[];
  try {
    bytecode = compile(ast);
  } catch (error) {
    if (error instanceof CodegenError) {
      return { ok: false, stage: "compile", errors: [error], ast, bytecode: null };
    }
    throw error;
  }

  const result = execute(bytecode, { trace: options.trace });
  if (!result.ok) {
    return { ok: false, stage: "execute", errors: [result.error], ast, bytecode };
  }
  return { ok: true, ast, bytecode, bindings: result.bindings };
}
