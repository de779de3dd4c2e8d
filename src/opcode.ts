import { Value } from "./value";

export enum Opcode {
  Push = "PUSH", // value
  Pop = "POP",
  //
  Add = "ADD",
  Sub = "SUB",
  Mul = "MUL",
  Div = "DIV",
  Mod = "MOD",
  Neg = "NEG",
  //
  And = "AND",
  Or = "OR",
  Not = "NOT",
  //
  Eq = "CMP_EQ",
  Neq = "CMP_NE",
  Lt = "CMP_LT",
  Gt = "CMP_GT",
  Lte = "CMP_LE",
  Gte = "CMP_GE",
  //
  Load = "LOAD", // name
  Store = "STORE", // name
  //
  Jump = "JUMP", // label
  JumpIfFalse = "JUMP_IF_FALSE", // label
  Label = "LABEL", // label
  Call = "CALL", // label, argument count
  Return = "RETURN",
  Halt = "HALT",
}

export type NullaryOpcode = Exclude<
  Opcode,
  | Opcode.Push
  | Opcode.Load
  | Opcode.Store
  | Opcode.Jump
  | Opcode.JumpIfFalse
  | Opcode.Label
  | Opcode.Call
>;

export type Instruction =
  | { op: Opcode.Push; value: Value }
  | { op: Opcode.Load | Opcode.Store; name: string }
  | { op: Opcode.Jump | Opcode.JumpIfFalse | Opcode.Label; label: string }
  | { op: Opcode.Call; label: string; argc: number }
  | { op: NullaryOpcode };

export const opcodes: readonly Opcode[] = Object.values(Opcode);

export function isOpcode(name: string): name is Opcode {
  return opcodes.some((op) => op === name);
}
