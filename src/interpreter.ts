import { formatInstruction } from "./disassembler";
import { StageError } from "./errors";
import { Instruction, Opcode } from "./opcode";
import { DuplicateKeyError, KeyNotFoundError, StrictMap } from "./strict-map";
import {
  Bindings,
  boolean,
  float,
  integer,
  isTruthy,
  Value,
} from "./value";

export type RuntimeReason =
  | "StackUnderflow"
  | "DivisionByZero"
  | "UndefinedVariable"
  | "InvalidJumpTarget"
  | "TypeMismatch";

export class RuntimeError extends StageError {
  readonly kind = "RuntimeError";
  constructor(
    public readonly reason: RuntimeReason,
    public readonly detail: string,
    public readonly address: number,
    public readonly instruction: Instruction
  ) {
    super(
      `${reason} at ${address} (${formatInstruction(instruction)}): ${detail}`
    );
  }
}

export type TraceEvent = {
  address: number;
  instruction: Instruction;
  stack: readonly Value[];
};

export type ExecuteOptions = {
  /** Called before each instruction runs. */
  trace?: (event: TraceEvent) => void;
};

export type ExecutionResult =
  | { ok: true; bindings: Bindings }
  | { ok: false; error: RuntimeError };

type NumberValue = Extract<Value, { tag: "integer" | "float" }>;

function isNumber(value: Value): value is NumberValue {
  return value.tag === "integer" || value.tag === "float";
}

const toFloat = (value: NumberValue): number => Number(value.value);

class StackFrame {
  readonly locals: Bindings = new Map();
  constructor(
    public readonly base: number,
    public readonly returnAddress: number
  ) {}
}

class Stack {
  private values: Value[] = [];
  private frames: StackFrame[] = [new StackFrame(0, 0)];
  get frame(): StackFrame {
    return this.frames[this.frames.length - 1];
  }
  get global(): StackFrame {
    return this.frames[0];
  }
  // how many values the current frame may pop
  get available(): number {
    return this.values.length - this.frame.base;
  }
  push(value: Value): void {
    this.values.push(value);
  }
  pop(): Value | undefined {
    if (this.available <= 0) return undefined;
    return this.values.pop();
  }
  pushFrame(argCount: number, returnAddress: number): void {
    this.frames.push(
      new StackFrame(this.values.length - argCount, returnAddress)
    );
  }
  /** Leaves the current frame, keeping its top value; null at top level. */
  popFrame(): number | null {
    if (this.frames.length === 1) return null;
    const { base, returnAddress } = this.frame;
    const result = this.available > 0 ? this.values.pop() : undefined;
    this.values.length = base;
    if (result) this.push(result);
    this.frames.pop();
    return returnAddress;
  }
  snapshot(): Value[] {
    return [...this.values];
  }
}

export function interpret(
  program: Instruction[],
  options: ExecuteOptions = {}
): Bindings {
  return new Interpreter(program, options).runAll();
}

export function execute(
  program: Instruction[],
  options: ExecuteOptions = {}
): ExecutionResult {
  try {
    return { ok: true, bindings: interpret(program, options) };
  } catch (error) {
    if (error instanceof RuntimeError) return { ok: false, error };
    throw error;
  }
}

class Interpreter {
  private stack = new Stack();
  private labels = new StrictMap<string, number>();
  private ip = 0;
  private address = 0;
  constructor(
    private program: Instruction[],
    private options: ExecuteOptions
  ) {}
  runAll(): Bindings {
    this.resolveLabels();
    while (this.ip < this.program.length) {
      this.address = this.ip;
      const instruction = this.program[this.ip++];
      if (this.options.trace) {
        this.options.trace({
          address: this.address,
          instruction,
          stack: this.stack.snapshot(),
        });
      }
      if (instruction.op === Opcode.Halt) break;
      if (!this.run(instruction)) break;
    }
    return new Map(this.stack.global.locals);
  }
  private fault(reason: RuntimeReason, detail: string): RuntimeError {
    return new RuntimeError(
      reason,
      detail,
      this.address,
      this.program[this.address]
    );
  }
  private resolveLabels(): void {
    for (const [address, instruction] of this.program.entries()) {
      this.address = address;
      if (instruction.op !== Opcode.Label) continue;
      try {
        this.labels.init(instruction.label, address);
      } catch (error) {
        if (!(error instanceof DuplicateKeyError)) throw error;
        throw this.fault(
          "InvalidJumpTarget",
          `label '${instruction.label}' is defined twice`
        );
      }
    }
    for (const [address, instruction] of this.program.entries()) {
      this.address = address;
      switch (instruction.op) {
        case Opcode.Jump:
        case Opcode.JumpIfFalse:
        case Opcode.Call:
          try {
            this.labels.get(instruction.label);
          } catch (error) {
            if (!(error instanceof KeyNotFoundError)) throw error;
            throw this.fault(
              "InvalidJumpTarget",
              `label '${instruction.label}' is not defined`
            );
          }
      }
    }
    this.address = 0;
  }
  private jump(label: string): void {
    this.ip = this.labels.get(label);
  }
  private pop(): Value {
    const value = this.stack.pop();
    if (!value) throw this.fault("StackUnderflow", "operand stack is empty");
    return value;
  }
  // returns false once the program should stop
  private run(instruction: Instruction): boolean {
    switch (instruction.op) {
      case Opcode.Push:
        this.stack.push(instruction.value);
        return true;
      case Opcode.Pop:
        this.pop();
        return true;
      case Opcode.Load: {
        const { name } = instruction;
        const value =
          this.stack.frame.locals.get(name) ??
          this.stack.global.locals.get(name);
        if (!value) {
          throw this.fault("UndefinedVariable", `'${name}' is not defined`);
        }
        this.stack.push(value);
        return true;
      }
      case Opcode.Store:
        this.stack.frame.locals.set(instruction.name, this.pop());
        return true;
      case Opcode.Label:
        return true;
      case Opcode.Jump:
        this.jump(instruction.label);
        return true;
      case Opcode.JumpIfFalse:
        if (!isTruthy(this.pop())) this.jump(instruction.label);
        return true;
      case Opcode.Call:
        if (this.stack.available < instruction.argc) {
          throw this.fault(
            "StackUnderflow",
            `${instruction.argc} argument(s) expected on the stack`
          );
        }
        this.stack.pushFrame(instruction.argc, this.ip);
        this.jump(instruction.label);
        return true;
      case Opcode.Return: {
        const returnAddress = this.stack.popFrame();
        if (returnAddress === null) return false;
        this.ip = returnAddress;
        return true;
      }
      case Opcode.Halt:
        return false;
      case Opcode.Neg: {
        const value = this.pop();
        if (value.tag === "integer") {
          this.stack.push(integer(-value.value));
        } else if (value.tag === "float") {
          this.stack.push(float(0 - value.value));
        } else {
          throw this.typeMismatch(value);
        }
        return true;
      }
      case Opcode.Not: {
        const value = this.pop();
        if (value.tag !== "boolean") throw this.typeMismatch(value);
        this.stack.push(boolean(!value.value));
        return true;
      }
      default: {
        const right = this.pop();
        const left = this.pop();
        this.stack.push(this.binary(instruction.op, left, right));
        return true;
      }
    }
  }
  private binary(op: Opcode, left: Value, right: Value): Value {
    switch (op) {
      case Opcode.Add:
      case Opcode.Sub:
      case Opcode.Mul:
      case Opcode.Div:
      case Opcode.Mod:
        return this.arithmetic(op, left, right);
      case Opcode.And:
      case Opcode.Or:
        if (left.tag !== "boolean" || right.tag !== "boolean") {
          throw this.typeMismatch(left, right);
        }
        return boolean(
          op === Opcode.And
            ? left.value && right.value
            : left.value || right.value
        );
      case Opcode.Eq:
        return boolean(equals(left, right));
      case Opcode.Neq:
        return boolean(!equals(left, right));
      default: {
        const ordering = this.compare(left, right);
        switch (op) {
          case Opcode.Lt:
            return boolean(ordering < 0);
          case Opcode.Gt:
            return boolean(ordering > 0);
          case Opcode.Lte:
            return boolean(ordering <= 0);
          case Opcode.Gte:
            return boolean(ordering >= 0);
          // istanbul ignore next
          default:
            throw new Error(`unknown opcode ${op}`);
        }
      }
    }
  }
  private arithmetic(op: Opcode, left: Value, right: Value): Value {
    if (!isNumber(left) || !isNumber(right)) {
      throw this.typeMismatch(left, right);
    }
    if (left.tag === "integer" && right.tag === "integer") {
      return integer(this.integerArithmetic(op, left.value, right.value));
    }
    // any float operand makes the result a float
    return float(this.floatArithmetic(op, toFloat(left), toFloat(right)));
  }
  // bigint division truncates toward zero; `%` keeps the dividend's sign
  private integerArithmetic(op: Opcode, a: bigint, b: bigint): bigint {
    switch (op) {
      case Opcode.Add:
        return a + b;
      case Opcode.Sub:
        return a - b;
      case Opcode.Mul:
        return a * b;
      case Opcode.Div:
        if (b === 0n) throw this.fault("DivisionByZero", "division by zero");
        return a / b;
      case Opcode.Mod:
        if (b === 0n) throw this.fault("DivisionByZero", "modulo by zero");
        return a % b;
      // istanbul ignore next
      default:
        throw new Error(`unknown opcode ${op}`);
    }
  }
  private floatArithmetic(op: Opcode, a: number, b: number): number {
    switch (op) {
      case Opcode.Add:
        return a + b;
      case Opcode.Sub:
        return a - b;
      case Opcode.Mul:
        return a * b;
      case Opcode.Div:
        if (b === 0) throw this.fault("DivisionByZero", "division by zero");
        return a / b;
      case Opcode.Mod:
        if (b === 0) throw this.fault("DivisionByZero", "modulo by zero");
        return a % b;
      // istanbul ignore next
      default:
        throw new Error(`unknown opcode ${op}`);
    }
  }
  // NaN when the operands are unordered
  private compare(left: Value, right: Value): number {
    if (isNumber(left) && isNumber(right)) return compareNumbers(left, right);
    if (left.tag === "string" && right.tag === "string") {
      return order(left.value, right.value);
    }
    throw this.typeMismatch(left, right);
  }
  private typeMismatch(...values: Value[]): RuntimeError {
    return this.fault(
      "TypeMismatch",
      `unsupported operand type(s): ${values.map((v) => v.tag).join(", ")}`
    );
  }
}

function order<T extends bigint | number | string>(a: T, b: T): number {
  if (a === b) return 0;
  if (a < b) return -1;
  if (a > b) return 1;
  return NaN;
}

function compareNumbers(left: NumberValue, right: NumberValue): number {
  if (left.tag === "integer" && right.tag === "integer") {
    return order(left.value, right.value);
  }
  return order(toFloat(left), toFloat(right));
}

function equals(left: Value, right: Value): boolean {
  if (isNumber(left) && isNumber(right)) {
    return compareNumbers(left, right) === 0;
  }
  return left.tag === right.tag && left.value === right.value;
}
