/** Copy of `input` without the keys whose value is undefined. */
export function definedOnly<T extends object>(input: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in input) {
    if (input[key] !== undefined) out[key] = input[key];
  }
  return out;
}
