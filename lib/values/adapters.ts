import * as THREE from "three";
import type { SleepThresholds } from "@/lib/config";
import { LinearSpring } from "@/lib/physics/LinearSpring";
import { RotationSpring } from "@/lib/physics/RotationSpring";
import { TransformSpring } from "@/lib/physics/TransformSpring";
import type { Spring } from "@/lib/physics/types";
import {
  box2Adapter,
  colorAdapter,
  numberAdapter,
  vector2Adapter,
  vector3Adapter,
  vector4Adapter,
} from "@/lib/values/linearAdapters";
import { RigidTransform } from "@/lib/values/RigidTransform";

/**
 * Every value kind a spring can animate. Adding a kind means extending this
 * union; `createSpring` stops compiling until the new case is handled.
 */
export type TypedValue =
  | { kind: "number"; value: number }
  | { kind: "vector2"; value: THREE.Vector2 }
  | { kind: "vector3"; value: THREE.Vector3 }
  | { kind: "vector4"; value: THREE.Vector4 }
  | { kind: "color"; value: THREE.Color }
  | { kind: "box2"; value: THREE.Box2 }
  | { kind: "quaternion"; value: THREE.Quaternion }
  | { kind: "transform"; value: RigidTransform };

export type ValueKind = TypedValue["kind"];
export type AnimatableValue = TypedValue["value"];
export type SpringType = "linear" | "rotation" | "transform";

export function classify(value: unknown): TypedValue | undefined {
  if (typeof value === "number") return { kind: "number", value };
  if (value instanceof THREE.Vector2) return { kind: "vector2", value };
  if (value instanceof THREE.Vector3) return { kind: "vector3", value };
  if (value instanceof THREE.Vector4) return { kind: "vector4", value };
  if (value instanceof THREE.Color) return { kind: "color", value };
  if (value instanceof THREE.Box2) return { kind: "box2", value };
  if (value instanceof THREE.Quaternion) return { kind: "quaternion", value };
  if (value instanceof RigidTransform) return { kind: "transform", value };
  return undefined;
}

export function cloneValue(value: AnimatableValue): AnimatableValue {
  return typeof value === "number" ? value : value.clone();
}

export function springTypeOf(kind: ValueKind): SpringType {
  switch (kind) {
    case "quaternion":
      return "rotation";
    case "transform":
      return "transform";
    case "number":
    case "vector2":
    case "vector3":
    case "vector4":
    case "color":
    case "box2":
      return "linear";
  }
}

/**
 * Builds the solver that owns `goal`'s kind. A `current` of another kind has
 * no meaningful conversion, so the spring then starts at rest on the goal.
 */
export function createSpring(
  dampingRatio: number,
  frequency: number,
  current: TypedValue,
  goal: TypedValue,
  thresholds: SleepThresholds
): Spring<AnimatableValue> {
  const d = dampingRatio;
  const f = frequency;

  switch (goal.kind) {
    case "number": {
      const from = current.kind === "number" ? current.value : goal.value;
      return new LinearSpring(d, f, from, goal.value, numberAdapter, thresholds);
    }
    case "vector2": {
      const from = current.kind === "vector2" ? current.value : goal.value;
      return new LinearSpring(d, f, from, goal.value, vector2Adapter, thresholds);
    }
    case "vector3": {
      const from = current.kind === "vector3" ? current.value : goal.value;
      return new LinearSpring(d, f, from, goal.value, vector3Adapter, thresholds);
    }
    case "vector4": {
      const from = current.kind === "vector4" ? current.value : goal.value;
      return new LinearSpring(d, f, from, goal.value, vector4Adapter, thresholds);
    }
    case "color": {
      const from = current.kind === "color" ? current.value : goal.value;
      return new LinearSpring(d, f, from, goal.value, colorAdapter, thresholds);
    }
    case "box2": {
      const from = current.kind === "box2" ? current.value : goal.value;
      return new LinearSpring(d, f, from, goal.value, box2Adapter, thresholds);
    }
    case "quaternion": {
      const from = current.kind === "quaternion" ? current.value : goal.value;
      return new RotationSpring(d, f, from, goal.value, thresholds);
    }
    case "transform": {
      const from = current.kind === "transform" ? current.value : goal.value;
      return new TransformSpring(d, f, from, goal.value, thresholds);
    }
  }
}
