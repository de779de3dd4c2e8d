// istanbul ignore next
export function noMatch(value: never): never {
  throw new Error(`no match: ${JSON.stringify(value)}`);
}
