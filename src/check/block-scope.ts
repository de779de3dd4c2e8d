import { Scope, ScopeKind } from "../scope";
import { StaticType, SymbolInfo, widen } from "./types";

type FunctionSymbol = Extract<SymbolInfo, { tag: "function" }>;
type VariableSymbol = Extract<SymbolInfo, { tag: "variable" }>;

/**
 * Names visible at the current point of the walk. Variables and functions
 * always belong to the innermost function (or to the global scope); block and
 * loop scopes only record where the walk is.
 */
export class BlockScope {
  private scope = new Scope<string, SymbolInfo>();
  private readonly global = this.scope;
  inScope<T>(kind: ScopeKind, fn: () => T): T {
    this.scope = this.scope.push(kind);
    try {
      return fn();
    } finally {
      this.scope = this.scope.pop();
    }
  }
  /**
   * Records an assignment. Returns the function symbol in the way when the
   * name already names a function of this scope.
   */
  assignVariable(
    name: string,
    type: StaticType,
    line: number
  ): FunctionSymbol | null {
    const owner = this.scope.owner();
    const existing = owner.lookupOwn(name);
    if (existing?.tag === "function") return existing;
    if (existing) {
      existing.type = widen(existing.type, type);
    } else {
      owner.set(name, { tag: "variable", type, line });
    }
    return null;
  }
  declareParameter(name: string, line: number): void {
    this.scope.owner().set(name, { tag: "variable", type: "unknown", line });
  }
  declareFunction(name: string, arity: number, line: number): void {
    this.scope.owner().set(name, { tag: "function", arity, line });
  }
  // a function body sees its own variables and the globals, nothing between
  getValue(name: string): SymbolInfo | null {
    return (
      this.scope.owner().lookupOwn(name) ?? this.global.lookupOwn(name) ?? null
    );
  }
  getVariable(name: string): VariableSymbol | null {
    const symbol = this.getValue(name);
    return symbol?.tag === "variable" ? symbol : null;
  }
  getFunction(name: string): FunctionSymbol | null {
    for (
      let scope: Scope<string, SymbolInfo> | null = this.scope;
      scope;
      scope = scope.parentScope
    ) {
      const symbol = scope.lookupOwn(name);
      if (symbol?.tag === "function") return symbol;
    }
    return null;
  }
  inLoop(): boolean {
    return this.scope.enclosing(["loop", "function", "global"]) === "loop";
  }
  inFunction(): boolean {
    return this.scope.enclosing(["function"]) === "function";
  }
}
