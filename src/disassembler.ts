import { Instruction, Opcode } from "./opcode";
import { formatValue } from "./value";

export function formatInstruction(instruction: Instruction): string {
  switch (instruction.op) {
    case Opcode.Push:
      return `${instruction.op} ${formatValue(instruction.value)}`;
    case Opcode.Load:
    case Opcode.Store:
      return `${instruction.op} ${instruction.name}`;
    case Opcode.Jump:
    case Opcode.JumpIfFalse:
    case Opcode.Label:
      return `${instruction.op} ${instruction.label}`;
    case Opcode.Call:
      return `${instruction.op} ${instruction.label} ${instruction.argc}`;
    default:
      return instruction.op;
  }
}

export function disassemble(program: Instruction[]): string {
  return program.map(formatInstruction).join("\n");
}
