// Maybe helpers — own module to keep runtime code out of the type barrel (src/types.ts)

import type { Absent, Maybe, Present } from "../types.js";

export const ABSENT: Absent = Object.freeze({ kind: "absent" });

export function present<T>(value: T): Present<T> {
  return { kind: "present", value };
}

export function isPresent<T>(m: Maybe<T>): m is Present<T> {
  return m.kind === "present";
}

/** Collapses to `null` at the wire boundary, where JSON has no sum types. */
export function toNullable<T>(m: Maybe<T>): T | null {
  return m.kind === "present" ? m.value : null;
}

export function fromNullable<T>(value: T | null | undefined): Maybe<T> {
  return value === null || value === undefined ? ABSENT : present(value);
}

export function mapMaybe<T, U>(m: Maybe<T>, fn: (value: T) => U): Maybe<U> {
  return m.kind === "present" ? present(fn(m.value)) : ABSENT;
}
