import { DEFAULT_SLEEP_THRESHOLDS, type SleepThresholds } from "@/lib/config";
import { add, distanceSq, magnitudeSq, scale, sub, zeros } from "@/lib/math/vector";
import { oscillatorCoefficients } from "@/lib/physics/oscillator";
import type { LinearAdapter, Spring } from "@/lib/physics/types";

/**
 * n-dimensional damped spring over an adapter's intermediate space.
 * Coordinates are independent; they only share (d, f).
 */
export class LinearSpring<T> implements Spring<T> {
  private d: number;
  private f: number;
  private p: number[];
  private v: number[];
  private g: number[];
  private rawGoal: T;

  private readonly adapter: LinearAdapter<T>;
  private readonly thresholds: SleepThresholds;

  constructor(
    dampingRatio: number,
    frequency: number,
    current: T,
    goal: T,
    adapter: LinearAdapter<T>,
    thresholds: SleepThresholds = DEFAULT_SLEEP_THRESHOLDS
  ) {
    this.d = dampingRatio;
    this.f = frequency;
    this.adapter = adapter;
    this.thresholds = thresholds;

    this.p = adapter.toIntermediate(current);
    this.v = zeros(adapter.size);
    this.g = adapter.toIntermediate(goal);
    this.rawGoal = adapter.clone(goal);
  }

  get goal(): T {
    return this.rawGoal;
  }

  get position(): readonly number[] {
    return this.p;
  }

  get velocity(): readonly number[] {
    return this.v;
  }

  setGoal(goal: T) {
    this.rawGoal = this.adapter.clone(goal);
    this.g = this.adapter.toIntermediate(goal);
  }

  setDampingRatio(dampingRatio: number) {
    this.d = dampingRatio;
  }

  setFrequency(frequency: number) {
    this.f = frequency;
  }

  canSleep(): boolean {
    if (magnitudeSq(this.v) > this.thresholds.sleepVelocityThreshold) {
      return false;
    }
    if (distanceSq(this.p, this.g) > this.thresholds.sleepOffsetThreshold) {
      return false;
    }
    return true;
  }

  step(dt: number): T {
    const { pp, pv, vp, vv } = oscillatorCoefficients(this.d, this.f, dt);

    const offset = sub(this.p, this.g);
    const v = this.v;

    this.p = add(add(scale(offset, pp), scale(v, pv)), this.g);
    this.v = add(scale(offset, vp), scale(v, vv));

    return this.adapter.fromIntermediate(this.p);
  }
}
