import { resolveConfig, type SpringConfig } from "@/lib/config";
import {
  InvalidParameterError,
  TypeMismatchError,
  UnsupportedTypeError,
  describeType,
} from "@/lib/errors";
import { logger } from "@/lib/logger";
import type { Spring } from "@/lib/physics/types";
import {
  classify,
  createSpring,
  springTypeOf,
  type AnimatableValue,
  type TypedValue,
  type ValueKind,
} from "@/lib/values/adapters";
import {
  createDefaultAccessors,
  directAccessor,
  type PropertyAccessRegistry,
  type PropertyAccessor,
} from "@/features/springs/propertyAccessors";
import { springPresets, type PresetName, type SpringPreset } from "@/features/springs/presets";

const TAG = "springs";

export type SettledCallback = () => void;
export type Scheduler = (task: () => void) => void;

export interface SpringControllerOptions extends Partial<SpringConfig> {
  accessors?: PropertyAccessRegistry;
  /** Runs settled callbacks outside the current call stack. */
  schedule?: Scheduler;
}

interface SpringEntry {
  kind: ValueKind;
  spring: Spring<AnimatableValue>;
  accessor: PropertyAccessor;
}

interface PlannedGoal {
  property: string;
  goal: TypedValue;
  current: TypedValue | undefined;
  accessor: PropertyAccessor;
}

/**
 * Owns the active springs for a set of entities and drives them from a tick.
 *
 * Springs persist across `target` calls: retargeting keeps position and
 * velocity, so interrupted motion stays continuous.
 */
export class SpringController {
  readonly config: SpringConfig;

  private readonly states = new Map<object, Map<string, SpringEntry>>();
  private readonly settled = new Map<object, SettledCallback[]>();
  private readonly accessors: PropertyAccessRegistry;
  private readonly schedule: Scheduler;
  private disposed = false;

  constructor(options: SpringControllerOptions = {}) {
    const { accessors, schedule, ...overrides } = options;
    this.config = resolveConfig(overrides);
    this.accessors = accessors ?? createDefaultAccessors();
    this.schedule = schedule ?? ((task) => queueMicrotask(task));
  }

  /**
   * Animates `goals` on `entity` with the given damping ratio and undamped
   * frequency (Hz). A frequency of Infinity assigns the goals immediately.
   */
  target(
    entity: object,
    dampingRatio: number,
    frequency: number,
    goals: Readonly<Record<string, unknown>>
  ) {
    this.assertAlive();

    if (Number.isNaN(dampingRatio) || dampingRatio < 0 || !Number.isFinite(dampingRatio)) {
      throw new InvalidParameterError("dampingRatio", dampingRatio);
    }
    if (Number.isNaN(frequency) || frequency < 0) {
      throw new InvalidParameterError("frequency", frequency);
    }

    // Validate everything before touching any state.
    const planned = Object.entries(goals).map(([property, raw]) => this.plan(entity, property, raw));

    let state = this.states.get(entity);
    if (!state) {
      state = new Map();
      this.states.set(entity, state);
    }

    for (const { property, goal, current, accessor } of planned) {
      if (frequency === Infinity) {
        state.delete(property);
        accessor.set(entity, property, goal.value);
        continue;
      }

      const entry = state.get(property);
      if (entry && entry.kind === goal.kind) {
        entry.spring.setDampingRatio(dampingRatio);
        entry.spring.setFrequency(frequency);
        entry.spring.setGoal(goal.value);
        continue;
      }

      const spring = createSpring(dampingRatio, frequency, current ?? goal, goal, this.config);
      state.set(property, { kind: goal.kind, spring, accessor });
      logger.debug(TAG, `created ${springTypeOf(goal.kind)} spring for ${property}`, {
        dampingRatio,
        frequency,
      });
    }

    if (state.size === 0) {
      this.retire(entity);
    }
  }

  /** `target` with a named or custom preset. */
  animate(entity: object, preset: PresetName | SpringPreset, goals: Readonly<Record<string, unknown>>) {
    const { dampingRatio, frequency } = typeof preset === "string" ? springPresets[preset] : preset;
    this.target(entity, dampingRatio, frequency, goals);
  }

  /** Stops one property, or every property when `property` is omitted. */
  stop(entity: object, property?: string) {
    const state = this.states.get(entity);
    if (!state) {
      return;
    }

    if (property !== undefined) {
      state.delete(property);
      if (state.size > 0) {
        return;
      }
    }

    this.retire(entity);
  }

  /**
   * Queues a one-shot callback for when `entity` has no active springs.
   * Callbacks always run through the scheduler, in registration order.
   */
  onSettled(entity: object, callback: SettledCallback) {
    this.assertAlive();

    if (!this.states.has(entity)) {
      this.schedule(() => this.runSettled(callback));
      return;
    }

    const queue = this.settled.get(entity);
    if (queue) {
      queue.push(callback);
    } else {
      this.settled.set(entity, [callback]);
    }
  }

  /** Advances every active spring by `dt` seconds. */
  update(dt: number) {
    for (const [entity, state] of this.states) {
      for (const [property, { spring, accessor }] of state) {
        if (spring.canSleep()) {
          state.delete(property);
          accessor.set(entity, property, spring.goal);
        } else {
          accessor.set(entity, property, spring.step(dt));
        }
      }

      if (state.size === 0) {
        this.retire(entity);
      }
    }
  }

  isAnimating(entity: object, property?: string): boolean {
    const state = this.states.get(entity);
    if (!state) return false;
    return property === undefined ? state.size > 0 : state.has(property);
  }

  get activeCount(): number {
    let count = 0;
    this.states.forEach((state) => {
      count += state.size;
    });
    return count;
  }

  /** Drops all springs. Pending settled callbacks are discarded, not run. */
  dispose() {
    this.states.clear();
    this.settled.clear();
    this.disposed = true;
  }

  private plan(entity: object, property: string, raw: unknown): PlannedGoal {
    const goal = classify(raw);
    if (!goal) {
      throw new UnsupportedTypeError(describeType(raw));
    }

    const accessor = this.accessors.resolve(entity, property);
    const currentRaw = accessor.get(entity, property);
    const current = classify(currentRaw);

    // Pseudo-properties can only hold their own kind, strict or not.
    const replaceable = !this.config.strictRuntimeTypeChecking && accessor === directAccessor;
    if (!replaceable && current?.kind !== goal.kind) {
      throw new TypeMismatchError(property, current?.kind ?? describeType(currentRaw), goal.kind);
    }

    return { property, goal, current, accessor };
  }

  private retire(entity: object) {
    this.states.delete(entity);

    const callbacks = this.settled.get(entity);
    if (!callbacks) {
      return;
    }
    this.settled.delete(entity);
    logger.debug(TAG, `settled with ${callbacks.length} callback(s)`);

    for (const callback of callbacks) {
      this.schedule(() => this.runSettled(callback));
    }
  }

  private runSettled(callback: SettledCallback) {
    try {
      callback();
    } catch (error) {
      logger.error(TAG, "settled callback threw", error);
    }
  }

  private assertAlive() {
    if (this.disposed) {
      throw new Error("SpringController has been disposed");
    }
  }
}
