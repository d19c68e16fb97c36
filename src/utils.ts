// istanbul ignore next
export function noMatch(_: never): never {
  throw new Error("no match");
}

/** Round `value` up to the next multiple of `alignment`. */
export function alignTo(value: number, alignment: number): number {
  return Math.ceil(value / alignment) * alignment;
}
