/**
 * One field of a sparse update: either left alone or replaced. Kept apart
 * from `undefined` so "not supplied" cannot be confused with "cleared".
 */
export type Patch<T> =
  | { readonly kind: "unset" }
  | { readonly kind: "set"; readonly value: T };

const unset: Patch<never> = { kind: "unset" };
export const UNSET: Patch<never> = Object.freeze(unset);

export function setTo<T>(value: T): Patch<T> {
  const patch: Patch<T> = { kind: "set", value };
  return Object.freeze(patch);
}

export function isSet<T>(
  patch: Patch<T>
): patch is { readonly kind: "set"; readonly value: T } {
  return patch.kind === "set";
}

export function valueOr<T>(patch: Patch<T>, fallback: T): T {
  return patch.kind === "set" ? patch.value : fallback;
}

export function patchEquals<T>(
  a: Patch<T>,
  b: Patch<T>,
  eq: (x: T, y: T) => boolean
): boolean {
  if (a.kind === "unset" || b.kind === "unset") return a.kind === b.kind;
  return eq(a.value, b.value);
}
