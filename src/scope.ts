export class NoParentScopeError extends Error {
  constructor() {
    super("No parent scope");
  }
}

export type ScopeKind = "global" | "function" | "loop" | "block";

/**
 * A chain of nested name tables. Lookups walk from the innermost scope
 * outwards; `global` and `function` scopes own the names declared inside them.
 */
export class Scope<K, V> {
  private map: Map<K, V> = new Map();
  constructor(
    public readonly kind: ScopeKind = "global",
    private parent: Scope<K, V> | null = null
  ) {}
  lookup(key: K): V | undefined {
    return this.map.get(key) ?? this.parent?.lookup(key);
  }
  lookupOwn(key: K): V | undefined {
    return this.map.get(key);
  }
  set(key: K, value: V): this {
    this.map.set(key, value);
    return this;
  }
  push(kind: ScopeKind = "block"): Scope<K, V> {
    return new Scope(kind, this);
  }
  pop(): Scope<K, V> {
    if (!this.parent) throw new NoParentScopeError();
    return this.parent;
  }
  get parentScope(): Scope<K, V> | null {
    return this.parent;
  }
  /** The innermost enclosing `function` or `global` scope. */
  owner(): Scope<K, V> {
    if (this.kind === "function" || !this.parent) return this;
    return this.parent.owner();
  }
  /** The kind of the innermost scope, this one included, whose kind is listed. */
  enclosing(kinds: ScopeKind[]): ScopeKind | null {
    if (kinds.includes(this.kind)) return this.kind;
    return this.parent ? this.parent.enclosing(kinds) : null;
  }
}
