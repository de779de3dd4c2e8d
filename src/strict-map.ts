export class KeyNotFoundError<K> extends Error {
  constructor(public key: K) {
    super(`Key not found: ${String(key)}`);
  }
}

export class DuplicateKeyError<K> extends Error {
  constructor(public key: K) {
    super(`Duplicate key: ${String(key)}`);
  }
}

/** A Map whose entries are written once and must exist when read. */
export class StrictMap<K, V> {
  private map: Map<K, V> = new Map();
  get(key: K): V {
    const value = this.map.get(key);
    if (value === undefined) throw new KeyNotFoundError(key);
    return value;
  }
  init(key: K, value: V): this {
    if (this.map.has(key)) throw new DuplicateKeyError(key);
    this.map.set(key, value);
    return this;
  }
}
