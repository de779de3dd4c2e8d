export type Value =
  | { tag: "integer"; value: bigint }
  | { tag: "float"; value: number }
  | { tag: "boolean"; value: boolean }
  | { tag: "string"; value: string };

export type ValueTag = Value["tag"];

export type Bindings = Map<string, Value>;

// integers are exact at any size; a number argument is truncated
export const integer = (value: bigint | number): Value => ({
  tag: "integer",
  value: typeof value === "bigint" ? value : BigInt(Math.trunc(value)),
});
export const float = (value: number): Value => ({ tag: "float", value });
export const boolean = (value: boolean): Value => ({ tag: "boolean", value });
export const string = (value: string): Value => ({ tag: "string", value });

export function isTruthy(value: Value): boolean {
  switch (value.tag) {
    case "boolean":
      return value.value;
    case "string":
      return value.value !== "";
    case "integer":
      return value.value !== 0n;
    case "float":
      return value.value !== 0;
  }
}

export function escapeString(value: string): string {
  return `"${value.replace(/[\\"]/g, "\\$&")}"`;
}

// floats keep a fractional part so that `2.0` reads back as a float
export function formatValue(value: Value): string {
  switch (value.tag) {
    case "integer":
    case "boolean":
      return String(value.value);
    case "float":
      return Number.isInteger(value.value)
        ? value.value.toFixed(1)
        : String(value.value);
    case "string":
      return escapeString(value.value);
  }
}

export function unwrap(value: Value): bigint | number | boolean | string {
  return value.value;
}

export function unwrapBindings(
  bindings: Bindings
): Record<string, bigint | number | boolean | string> {
  return Object.fromEntries(
    Array.from(bindings.entries()).map(([name, value]) => [name, unwrap(value)])
  );
}
