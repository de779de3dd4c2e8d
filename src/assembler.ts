import { Instruction, isOpcode, Opcode } from "./opcode";
import { boolean, float, integer, string, Value } from "./value";
import { Writer } from "./writer";

export class AssemblyError extends Error {
  constructor(message: string, public readonly line: number) {
    super(`line ${line}: ${message}`);
  }
}

/** Builds programs by hand, one chained call per instruction. */
export class Assembler extends Writer {
  assemble(): Instruction[] {
    return this.compile();
  }
  integer(value: bigint | number): this {
    return this.push(integer(value));
  }
  float(value: number): this {
    return this.push(float(value));
  }
  string(value: string): this {
    return this.push(string(value));
  }
  boolean(value: boolean): this {
    return this.push(boolean(value));
  }
  add(): this {
    return this.writeOpcode(Opcode.Add);
  }
  sub(): this {
    return this.writeOpcode(Opcode.Sub);
  }
  mul(): this {
    return this.writeOpcode(Opcode.Mul);
  }
  div(): this {
    return this.writeOpcode(Opcode.Div);
  }
  mod(): this {
    return this.writeOpcode(Opcode.Mod);
  }
  neg(): this {
    return this.writeOpcode(Opcode.Neg);
  }
  eq(): this {
    return this.writeOpcode(Opcode.Eq);
  }
  lt(): this {
    return this.writeOpcode(Opcode.Lt);
  }
  gt(): this {
    return this.writeOpcode(Opcode.Gt);
  }
  and(): this {
    return this.writeOpcode(Opcode.And);
  }
  or(): this {
    return this.writeOpcode(Opcode.Or);
  }
  not(): this {
    return this.writeOpcode(Opcode.Not);
  }
}

/** Reads a textual listing, one instruction per line, back into a program. */
export function assemble(listing: string): Instruction[] {
  const program: Instruction[] = [];
  for (const [index, raw] of listing.split("\n").entries()) {
    const text = raw.trim();
    if (!text) continue;
    program.push(parseInstruction(text, index + 1));
  }
  return program;
}

function parseInstruction(text: string, line: number): Instruction {
  const [name, ...rest] = text.split(/\s+/);
  const operands = text.slice(name.length).trim();
  if (!isOpcode(name)) {
    throw new AssemblyError(`unknown opcode '${name}'`, line);
  }
  const operand = (): string => {
    if (rest.length !== 1) {
      throw new AssemblyError(`${name} takes one operand`, line);
    }
    return rest[0];
  };
  switch (name) {
    case Opcode.Push:
      return { op: name, value: parseValue(operands, line) };
    case Opcode.Load:
    case Opcode.Store:
      return { op: name, name: operand() };
    case Opcode.Jump:
    case Opcode.JumpIfFalse:
    case Opcode.Label:
      return { op: name, label: operand() };
    case Opcode.Call: {
      const [label, argc] = rest;
      if (rest.length !== 2 || !/^[0-9]+$/.test(argc)) {
        throw new AssemblyError("CALL takes a label and an argument count", line);
      }
      return { op: name, label, argc: Number(argc) };
    }
    default:
      if (rest.length) {
        throw new AssemblyError(`${name} takes no operand`, line);
      }
      return { op: name };
  }
}

function parseValue(text: string, line: number): Value {
  if (text.startsWith('"')) {
    if (text.length < 2 || !text.endsWith('"')) {
      throw new AssemblyError(`unterminated string ${text}`, line);
    }
    return string(text.slice(1, -1).replace(/\\(["\\])/g, "$1"));
  }
  if (text === "true" || text === "false") return boolean(text === "true");
  if (/^-?[0-9]+$/.test(text)) return integer(BigInt(text));
  const value = Number(text);
  if (text === "" || Number.isNaN(value)) {
    throw new AssemblyError(`invalid value '${text}'`, line);
  }
  return float(value);
}
