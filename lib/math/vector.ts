/**
 * Fixed-length numeric tuples used as the solver's intermediate space.
 * All binary ops assume both operands share the same length.
 */
export type LinearValue = number[];

export function magnitudeSq(v: readonly number[]): number {
  let out = 0;
  for (let i = 0; i < v.length; i++) {
    out += v[i] * v[i];
  }
  return out;
}

export function distanceSq(a: readonly number[], b: readonly number[]): number {
  let out = 0;
  for (let i = 0; i < a.length; i++) {
    const d = b[i] - a[i];
    out += d * d;
  }
  return out;
}

export function add(a: readonly number[], b: readonly number[]): LinearValue {
  return a.map((x, i) => x + b[i]);
}

export function sub(a: readonly number[], b: readonly number[]): LinearValue {
  return a.map((x, i) => x - b[i]);
}

export function scale(a: readonly number[], s: number): LinearValue {
  return a.map((x) => x * s);
}

export function zeros(length: number): LinearValue {
  return new Array<number>(length).fill(0);
}
