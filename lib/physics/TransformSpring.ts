import { DEFAULT_SLEEP_THRESHOLDS, type SleepThresholds } from "@/lib/config";
import { LinearSpring } from "@/lib/physics/LinearSpring";
import { RotationSpring } from "@/lib/physics/RotationSpring";
import type { Spring } from "@/lib/physics/types";
import { vector3Adapter } from "@/lib/values/linearAdapters";
import { RigidTransform } from "@/lib/values/RigidTransform";

/** Translation and rotation sprung together under one (d, f). */
export class TransformSpring implements Spring<RigidTransform> {
  private readonly translation: LinearSpring<RigidTransform["position"]>;
  private readonly rotation: RotationSpring;
  private rawGoal: RigidTransform;

  constructor(
    dampingRatio: number,
    frequency: number,
    current: RigidTransform,
    goal: RigidTransform,
    thresholds: SleepThresholds = DEFAULT_SLEEP_THRESHOLDS
  ) {
    this.translation = new LinearSpring(
      dampingRatio,
      frequency,
      current.position,
      goal.position,
      vector3Adapter,
      thresholds
    );
    this.rotation = new RotationSpring(dampingRatio, frequency, current.quaternion, goal.quaternion, thresholds);
    this.rawGoal = goal.clone();
  }

  get goal(): RigidTransform {
    return this.rawGoal;
  }

  setGoal(goal: RigidTransform) {
    this.rawGoal = goal.clone();
    this.translation.setGoal(goal.position);
    this.rotation.setGoal(goal.quaternion);
  }

  setDampingRatio(dampingRatio: number) {
    this.translation.setDampingRatio(dampingRatio);
    this.rotation.setDampingRatio(dampingRatio);
  }

  setFrequency(frequency: number) {
    this.translation.setFrequency(frequency);
    this.rotation.setFrequency(frequency);
  }

  canSleep(): boolean {
    return this.translation.canSleep() && this.rotation.canSleep();
  }

  step(dt: number): RigidTransform {
    const position = this.translation.step(dt);
    const quaternion = this.rotation.step(dt);
    return new RigidTransform(position, quaternion);
  }
}
