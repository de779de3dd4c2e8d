import { Assembler, assemble } from "./assembler";
import { formatInstruction } from "./disassembler";
import { execute, interpret, RuntimeError, TraceEvent } from "./interpreter";
import { Opcode } from "./opcode";
import { boolean, float, formatValue, integer, string, unwrapBindings, Value } from "./value";

const run = (listing: string) => unwrapBindings(interpret(assemble(listing)));

const failure = (listing: string): RuntimeError => {
  const result = execute(assemble(listing));
  if (result.ok) throw new Error("ran without error");
  return result.error;
};

it("runs an empty program", () => {
  expect(interpret([])).toEqual(new Map());
});

it("stores the result of an expression", () => {
  expect(run("PUSH 10\nPUSH 5\nADD\nSTORE x\nHALT")).toEqual({ x: 15n });
});

it("runs a loop", () => {
  // prettier-ignore
  const program = new Assembler()
    .integer(0).store("sum")
    .integer(1).store("i")
    .label("loop")
      .load("i").integer(5).lt().jumpIfFalse("end")
      .load("sum").load("i").add().store("sum")
      .load("i").integer(1).add().store("i")
      .jump("loop")
    .label("end")
      .halt()
    .assemble();
  expect(unwrapBindings(interpret(program))).toEqual({ sum: 10n, i: 5n });
});

it("keeps integers integral unless a float is involved", () => {
  // prettier-ignore
  const program = new Assembler()
    .integer(7).integer(2).div().store("a")
    .float(7).integer(2).div().store("b")
    .integer(-7).integer(2).div().store("c")
    .integer(7).integer(3).mod().store("d")
    .integer(-7).integer(3).mod().store("e")
    .integer(1).float(0.5).add().store("f")
    .float(2).integer(2).mul().store("g")
    .integer(3).neg().store("h")
    .halt()
    .assemble();
  expect(Object.fromEntries(interpret(program))).toEqual({
    a: integer(3),
    b: float(3.5),
    c: integer(-3),
    d: integer(1),
    e: integer(-1),
    f: float(1.5),
    g: float(4),
    h: integer(-3),
  });
});

it("compares values", () => {
  // prettier-ignore
  const program = new Assembler()
    .integer(1).float(1).eq().store("numbers")
    .integer(1).string("1").eq().store("mixed")
    .string("a").string("b").lt().store("strings")
    .float(2.5).integer(2).gt().store("greater")
    .integer(2).integer(2).writeOpcode(Opcode.Gte).store("gte")
    .integer(2).integer(2).writeOpcode(Opcode.Neq).store("neq")
    .boolean(true).boolean(false).and().store("and")
    .boolean(true).boolean(false).or().store("or")
    .boolean(true).not().store("not")
    .halt()
    .assemble();
  expect(unwrapBindings(interpret(program))).toEqual({
    numbers: true,
    mixed: false,
    strings: true,
    greater: true,
    gte: true,
    neq: false,
    and: false,
    or: true,
    not: false,
  });
});

it("orders infinities and integers past 2^53", () => {
  // prettier-ignore
  const program = new Assembler()
    .float(Infinity).float(Infinity).writeOpcode(Opcode.Lte).store("lte")
    .float(Infinity).float(Infinity).eq().store("eq")
    .float(-Infinity).float(Infinity).lt().store("lt")
    .integer(9007199254740993n).integer(9007199254740992n).gt().store("big")
    .integer(9007199254740993n).integer(9007199254740992n).eq().store("same")
    .halt()
    .assemble();
  expect(unwrapBindings(interpret(program))).toEqual({
    lte: true,
    eq: true,
    lt: true,
    big: true,
    same: false,
  });
});

it("treats zero, empty strings and false as false", () => {
  const runsThrough = (value: Value) =>
    interpret(
      new Assembler()
        .push(value)
        .jumpIfFalse("skip")
        .integer(1)
        .store("ran")
        .label("skip")
        .halt()
        .assemble()
    ).has("ran");

  expect(runsThrough(integer(0))).toBe(false);
  expect(runsThrough(float(0))).toBe(false);
  expect(runsThrough(string(""))).toBe(false);
  expect(runsThrough(boolean(false))).toBe(false);
  expect(runsThrough(integer(-1))).toBe(true);
  expect(runsThrough(float(0.5))).toBe(true);
  expect(runsThrough(string("0"))).toBe(true);
  expect(runsThrough(boolean(true))).toBe(true);
});

it("calls functions in their own frame", () => {
  const listing = `
    PUSH 1
    PUSH 2
    CALL @add 2
    STORE x
    HALT
    LABEL @add
    STORE b
    STORE a
    LOAD a
    LOAD b
    ADD
    RETURN
  `;
  expect(run(listing)).toEqual({ x: 3n });
});

it("lets functions read globals", () => {
  const listing = `
    PUSH 10
    STORE g
    CALL @f 0
    STORE x
    HALT
    LABEL @f
    LOAD g
    PUSH 1
    ADD
    RETURN
  `;
  expect(run(listing)).toEqual({ g: 10n, x: 11n });
});

it("stops on a top-level RETURN or at the end of the program", () => {
  expect(run("PUSH 1\nSTORE x\nRETURN\nPUSH 2\nSTORE x")).toEqual({ x: 1n });
  expect(run("PUSH 1\nSTORE x")).toEqual({ x: 1n });
  expect(run("HALT\nPUSH 1\nSTORE x")).toEqual({});
});

it("reports division by zero", () => {
  const error = failure("PUSH 1\nPUSH 0\nDIV");
  expect(error).toBeInstanceOf(RuntimeError);
  expect(error).toMatchObject({
    kind: "RuntimeError",
    reason: "DivisionByZero",
    address: 2,
    message: "DivisionByZero at 2 (DIV): division by zero",
  });
  expect(failure("PUSH 1\nPUSH 0\nMOD").message).toEqual(
    "DivisionByZero at 2 (MOD): modulo by zero"
  );
  expect(failure("PUSH 1.5\nPUSH 0.0\nDIV").reason).toEqual("DivisionByZero");
  expect(() => interpret(assemble("PUSH 1\nPUSH 0\nDIV"))).toThrowError(
    RuntimeError
  );
});

it("reports stack underflow", () => {
  expect(failure("ADD").message).toEqual(
    "StackUnderflow at 0 (ADD): operand stack is empty"
  );
  // a function cannot pop its caller's values
  expect(
    failure("PUSH 1\nCALL @f 0\nHALT\nLABEL @f\nPOP\nRETURN").message
  ).toEqual("StackUnderflow at 4 (POP): operand stack is empty");
  expect(failure("PUSH 1\nCALL @f 2\nHALT\nLABEL @f\nRETURN").message).toEqual(
    "StackUnderflow at 1 (CALL @f 2): 2 argument(s) expected on the stack"
  );
});

it("reports undefined variables", () => {
  expect(failure("LOAD y").message).toEqual(
    "UndefinedVariable at 0 (LOAD y): 'y' is not defined"
  );
});

it("checks jump targets before running", () => {
  expect(failure("JUMP nowhere").message).toEqual(
    "InvalidJumpTarget at 0 (JUMP nowhere): label 'nowhere' is not defined"
  );
  expect(failure("LABEL a\nLABEL a\nHALT").message).toEqual(
    "InvalidJumpTarget at 1 (LABEL a): label 'a' is defined twice"
  );
  expect(failure("PUSH 1\nPUSH 0\nDIV\nJUMP x").reason).toEqual(
    "InvalidJumpTarget"
  );
});

it("reports operands of the wrong type", () => {
  expect(failure('PUSH 1\nPUSH "a"\nADD').message).toEqual(
    "TypeMismatch at 2 (ADD): unsupported operand type(s): integer, string"
  );
  expect(failure("PUSH 1\nNOT").message).toEqual(
    "TypeMismatch at 1 (NOT): unsupported operand type(s): integer"
  );
  expect(failure('PUSH "a"\nNEG').reason).toEqual("TypeMismatch");
  expect(failure('PUSH 1\nPUSH "a"\nCMP_LT').reason).toEqual("TypeMismatch");
  expect(failure("PUSH 1\nPUSH true\nAND").reason).toEqual("TypeMismatch");
});

it("traces each instruction before it runs", () => {
  const events: TraceEvent[] = [];
  const result = execute(assemble("PUSH 1\nPUSH 2\nADD\nHALT"), {
    trace: (event) => events.push(event),
  });
  expect(result.ok).toBe(true);
  expect(
    events.map(({ address, instruction, stack }) => [
      address,
      formatInstruction(instruction),
      stack.map(formatValue),
    ])
  ).toEqual([
    [0, "PUSH 1", []],
    [1, "PUSH 2", ["1"]],
    [2, "ADD", ["1", "2"]],
    [3, "HALT", ["3"]],
  ]);
});
