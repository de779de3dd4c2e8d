import { StageError } from "../errors";
import { ValueTag } from "../value";

export type StaticType = ValueTag | "unknown";

export type SemanticReason =
  | "UndefinedVariable"
  | "UndefinedFunction"
  | "ArityMismatch"
  | "TypeMismatch"
  | "IllegalBreakOrContinue"
  | "IllegalReturn";

export class SemanticError extends StageError {
  readonly kind = "SemanticError";
  constructor(
    public readonly reason: SemanticReason,
    public readonly detail: string,
    public readonly line: number
  ) {
    super(`${reason} on line ${line}: ${detail}`);
  }
}

export type SymbolInfo =
  | { tag: "variable"; type: StaticType; line: number }
  | { tag: "function"; arity: number; line: number };

export type CheckResult =
  | { ok: true }
  | { ok: false; errors: SemanticError[] };

export function isNumeric(type: StaticType): boolean {
  return type === "integer" || type === "float";
}

// the type a variable holds after being assigned `next` where it held `prev`
export function widen(prev: StaticType, next: StaticType): StaticType {
  if (prev === next) return prev;
  if (isNumeric(prev) && isNumeric(next)) return "float";
  return "unknown";
}
