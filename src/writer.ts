import { Instruction, NullaryOpcode, Opcode } from "./opcode";
import { Value } from "./value";

export class Writer {
  private program: Instruction[] = [];
  compile(): Instruction[] {
    return this.program;
  }
  writeOpcode(op: NullaryOpcode): this {
    this.program.push({ op });
    return this;
  }
  push(value: Value): this {
    this.program.push({ op: Opcode.Push, value });
    return this;
  }
  pop(): this {
    return this.writeOpcode(Opcode.Pop);
  }
  load(name: string): this {
    this.program.push({ op: Opcode.Load, name });
    return this;
  }
  store(name: string): this {
    this.program.push({ op: Opcode.Store, name });
    return this;
  }
  label(label: string): this {
    this.program.push({ op: Opcode.Label, label });
    return this;
  }
  jump(label: string): this {
    this.program.push({ op: Opcode.Jump, label });
    return this;
  }
  jumpIfFalse(label: string): this {
    this.program.push({ op: Opcode.JumpIfFalse, label });
    return this;
  }
  call(label: string, argc: number): this {
    this.program.push({ op: Opcode.Call, label, argc });
    return this;
  }
  return(): this {
    return this.writeOpcode(Opcode.Return);
  }
  halt(): this {
    return this.writeOpcode(Opcode.Halt);
  }
}
