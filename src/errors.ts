export type ErrorKind =
  | "LexicalError"
  | "SyntaxError"
  | "SemanticError"
  | "CodegenError"
  | "RuntimeError";

/**
 * Common base of every error a pipeline stage reports. `kind` tells the
 * stages apart without instanceof checks against each subclass.
 */
export abstract class StageError extends Error {
  abstract readonly kind: ErrorKind;
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}
