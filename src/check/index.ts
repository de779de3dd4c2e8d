import { Program } from "../ast";
import { BlockScope } from "./block-scope";
import { TreeWalker } from "./tree-walker";
import { CheckResult } from "./types";

export { SemanticError } from "./types";
export type { CheckResult, SemanticReason, StaticType } from "./types";

export function check(program: Program): CheckResult {
  const treeWalker = new TreeWalker(new BlockScope());
  const errors = treeWalker.program(program);
  return errors.length ? { ok: false, errors } : { ok: true };
}
