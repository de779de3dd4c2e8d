#!/usr/bin/env node
import chalk from "chalk";
import * as fs from "fs";
import { disassemble, formatInstruction } from "./disassembler";
import run, { RunResult } from "./index";
import { TraceEvent } from "./interpreter";
import { dumpTree, print } from "./printer";
import { formatValue } from "./value";

export const usage =
  "usage: stacklang <file> [--ast] [--tree] [--bytecode] [--check] [--trace] [--no-color]";

export class UsageError extends Error {}

export type CliOptions = {
  file: string;
  /** print the tree back out as normalized source */
  ast: boolean;
  tree: boolean;
  bytecode: boolean;
  /** analyze only, without running */
  check: boolean;
  trace: boolean;
  color: boolean;
};

const flags = ["--ast", "--tree", "--bytecode", "--check", "--trace", "--no-color"];

export function parseArgs(args: string[]): CliOptions {
  const unknown = args.find((arg) => arg.startsWith("-") && !flags.includes(arg));
  if (unknown) throw new UsageError(`unknown option '${unknown}'`);
  const files = args.filter((arg) => !arg.startsWith("-"));
  if (files.length !== 1) throw new UsageError("expected exactly one source file");
  return {
    file: files[0],
    ast: args.includes("--ast"),
    tree: args.includes("--tree"),
    bytecode: args.includes("--bytecode"),
    check: args.includes("--check"),
    trace: args.includes("--trace"),
    color: !args.includes("--no-color"),
  };
}

export type Output = { stdout: string[]; stderr: string[] };

export function render(
  result: RunResult,
  options: CliOptions,
  c: chalk.Chalk
): Output {
  const out: Output = { stdout: [], stderr: [] };
  const section = (title: string, body: string) => {
    out.stdout.push(c.bold(`== ${title} ==`), body);
  };

  if (result.ast && options.tree) section("tree", dumpTree(result.ast));
  if (result.ast && options.ast) section("source", print(result.ast));
  if (result.bytecode && options.bytecode) {
    section("bytecode", disassemble(result.bytecode));
  }

  if (!result.ok) {
    for (const error of result.errors) {
      out.stderr.push(`${c.red(error.kind)}: ${error.message}`);
    }
    return out;
  }
  if (!result.bindings) {
    out.stdout.push(c.green("no errors found"));
    return out;
  }
  for (const [name, value] of result.bindings) {
    out.stdout.push(`${c.cyan(name)} = ${formatValue(value)}`);
  }
  return out;
}

export function formatTrace(event: TraceEvent): string {
  const stack = event.stack.map(formatValue).join(", ");
  return `${event.address}\t${formatInstruction(event.instruction)}\t[${stack}]`;
}

// fs errors may come from another realm, so they are read by shape
function readFailure(error: unknown): string {
  if (typeof error !== "object" || error === null) return String(error);
  if ("code" in error && error.code === "ENOENT") return "file not found";
  return "message" in error ? String(error.message) : String(error);
}

export function main(args: string[]): number {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    console.error(usage);
    return 1;
  }
  const c = new chalk.Instance(options.color ? {} : { level: 0 });
  let source: string;
  try {
    source = fs.readFileSync(options.file, "utf8");
  } catch (error) {
    console.error(`${c.red("error")}: ${readFailure(error)}: ${options.file}`);
    return 1;
  }
  const result = run(source, {
    execute: !options.check,
    trace: options.trace
      ? (event) => console.error(c.gray(formatTrace(event)))
      : undefined,
  });
  const { stdout, stderr } = render(result, options, c);
  for (const line of stdout) console.log(line);
  for (const line of stderr) console.error(line);
  return result.ok ? 0 : 1;
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
