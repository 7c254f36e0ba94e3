export { SpringController } from "@/features/springs/SpringController";
export type {
  Scheduler,
  SettledCallback,
  SpringControllerOptions,
} from "@/features/springs/SpringController";
export { SpringTicker } from "@/features/springs/SpringTicker";
export type { SpringTickerOptions, Tickable } from "@/features/springs/SpringTicker";
export {
  PropertyAccessRegistry,
  createDefaultAccessors,
  directAccessor,
  pivotAccessor,
} from "@/features/springs/propertyAccessors";
export type { PropertyAccessor } from "@/features/springs/propertyAccessors";
export { springPresets } from "@/features/springs/presets";
export type { PresetName, SpringPreset } from "@/features/springs/presets";

export { LinearSpring } from "@/lib/physics/LinearSpring";
export { RotationSpring } from "@/lib/physics/RotationSpring";
export { TransformSpring } from "@/lib/physics/TransformSpring";
export { oscillatorCoefficients } from "@/lib/physics/oscillator";
export type { LinearAdapter, Spring } from "@/lib/physics/types";
export { RigidTransform } from "@/lib/values/RigidTransform";
export { classify, cloneValue, createSpring, springTypeOf } from "@/lib/values/adapters";
export type { AnimatableValue, SpringType, TypedValue, ValueKind } from "@/lib/values/adapters";
export { luvToRgb, rgbToLuv } from "@/lib/color/luv";
export { DEFAULT_SPRING_CONFIG, resolveConfig } from "@/lib/config";
export type { SleepThresholds, SpringConfig } from "@/lib/config";
export {
  InvalidParameterError,
  SpringError,
  TypeMismatchError,
  UnsupportedTypeError,
} from "@/lib/errors";
export { logger } from "@/lib/logger";
export type { LogEvent, LogLevel } from "@/lib/logger";
