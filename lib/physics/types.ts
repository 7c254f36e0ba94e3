/**
 * Contract shared by every solver. `step` advances internal state in place and
 * returns the structured value at the new position.
 */
export interface Spring<T> {
  /** A copy of the goal as passed in, written back verbatim when the spring sleeps. */
  readonly goal: T;
  setGoal(goal: T): void;
  setDampingRatio(dampingRatio: number): void;
  setFrequency(frequency: number): void;
  canSleep(): boolean;
  step(dt: number): T;
}

/** Maps a structured value onto a fixed-length numeric vector and back. */
export interface LinearAdapter<T> {
  readonly size: number;
  toIntermediate(value: T): number[];
  fromIntermediate(value: readonly number[]): T;
  /** Detached copy, so later edits to a caller's value don't reach the spring. */
  clone(value: T): T;
}
