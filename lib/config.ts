import { InvalidParameterError } from "@/lib/errors";

export interface SleepThresholds {
  /** Squared distance to goal in intermediate space. */
  sleepOffsetThreshold: number;
  /** Squared velocity magnitude in intermediate space. */
  sleepVelocityThreshold: number;
  /** Angle to goal, radians. */
  sleepRotationOffsetThreshold: number;
  /** Angular speed, radians per second. */
  sleepRotationVelocityThreshold: number;
}

export interface SpringConfig extends SleepThresholds {
  /** Reject goals whose kind differs from the property's current value. */
  strictRuntimeTypeChecking: boolean;
}

const DEG = Math.PI / 180;

export const DEFAULT_SLEEP_THRESHOLDS: SleepThresholds = {
  sleepOffsetThreshold: (1 / 3840) ** 2,
  sleepVelocityThreshold: 1e-2 ** 2,
  sleepRotationOffsetThreshold: 0.01 * DEG,
  sleepRotationVelocityThreshold: 0.1 * DEG,
};

export const DEFAULT_SPRING_CONFIG: SpringConfig = {
  strictRuntimeTypeChecking: true,
  ...DEFAULT_SLEEP_THRESHOLDS,
};

const THRESHOLD_KEYS = [
  "sleepOffsetThreshold",
  "sleepVelocityThreshold",
  "sleepRotationOffsetThreshold",
  "sleepRotationVelocityThreshold",
] as const satisfies readonly (keyof SleepThresholds)[];

/**
 * Merges overrides onto the defaults. Thresholds must be finite and
 * non-negative.
 */
export function resolveConfig(overrides: Partial<SpringConfig> = {}): SpringConfig {
  const config: SpringConfig = { ...DEFAULT_SPRING_CONFIG, ...overrides };

  for (const key of THRESHOLD_KEYS) {
    const value = config[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidParameterError(key, value);
    }
  }

  return config;
}

