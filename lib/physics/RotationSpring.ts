import * as THREE from "three";
import { DEFAULT_SLEEP_THRESHOLDS, type SleepThresholds } from "@/lib/config";
import { expRotation, rotationBetween } from "@/lib/math/rotation";
import { oscillatorCoefficients } from "@/lib/physics/oscillator";
import type { Spring } from "@/lib/physics/types";

/**
 * Damped spring on orientations.
 *
 * Each step re-linearizes around the goal: the current offset is taken as a
 * rotation vector log(p · g⁻¹), the closed-form solution runs on that 3-vector
 * and the stored angular velocity, and the result is mapped back with
 * exp(offset') · g. Nothing is integrated incrementally, so large rotations
 * don't drift.
 */
export class RotationSpring implements Spring<THREE.Quaternion> {
  private d: number;
  private f: number;
  private p: THREE.Quaternion;
  private g: THREE.Quaternion;
  private v = new THREE.Vector3();
  private rawGoal: THREE.Quaternion;

  private readonly thresholds: SleepThresholds;

  constructor(
    dampingRatio: number,
    frequency: number,
    current: THREE.Quaternion,
    goal: THREE.Quaternion,
    thresholds: SleepThresholds = DEFAULT_SLEEP_THRESHOLDS
  ) {
    this.d = dampingRatio;
    this.f = frequency;
    this.thresholds = thresholds;

    this.p = current.clone().normalize();
    this.g = goal.clone().normalize();
    this.rawGoal = goal.clone();
  }

  get goal(): THREE.Quaternion {
    return this.rawGoal;
  }

  get orientation(): THREE.Quaternion {
    return this.p.clone();
  }

  /** Angular velocity as axis * rad/s. */
  get angularVelocity(): THREE.Vector3 {
    return this.v.clone();
  }

  setGoal(goal: THREE.Quaternion) {
    this.rawGoal = goal.clone();
    this.g = goal.clone().normalize();
  }

  setDampingRatio(dampingRatio: number) {
    this.d = dampingRatio;
  }

  setFrequency(frequency: number) {
    this.f = frequency;
  }

  canSleep(): boolean {
    const sleepP = this.p.angleTo(this.g) < this.thresholds.sleepRotationOffsetThreshold;
    const sleepV = this.v.length() < this.thresholds.sleepRotationVelocityThreshold;
    return sleepP && sleepV;
  }

  step(dt: number): THREE.Quaternion {
    const { pp, pv, vp, vv } = oscillatorCoefficients(this.d, this.f, dt);

    const offset = rotationBetween(this.p, this.g);
    const v0 = this.v;

    const pt = offset.clone().multiplyScalar(pp).addScaledVector(v0, pv);
    const vt = offset.clone().multiplyScalar(vp).addScaledVector(v0, vv);

    this.p = expRotation(pt).multiply(this.g).normalize();
    this.v = vt;

    return this.p.clone();
  }
}
