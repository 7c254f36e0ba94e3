import * as THREE from "three";
import { TypeMismatchError, describeType } from "@/lib/errors";
import { classify, cloneValue, type AnimatableValue } from "@/lib/values/adapters";
import { RigidTransform } from "@/lib/values/RigidTransform";

/** How the controller reads and writes one named property on a host entity. */
export interface PropertyAccessor {
  get(entity: object, property: string): unknown;
  set(entity: object, property: string, value: AnimatableValue): void;
}

type EntityPredicate = (entity: object) => boolean;

interface PseudoProperty {
  appliesTo: EntityPredicate;
  accessor: PropertyAccessor;
}

function hasCopy(value: unknown): value is { copy: (source: unknown) => unknown } {
  return typeof value === "object" && value !== null && "copy" in value && typeof value.copy === "function";
}

/**
 * Plain property access. three.js exposes `position`, `quaternion` and
 * `scale` as non-writable fields, so values of the same kind are copied into
 * the existing instance rather than replaced. Otherwise the property gets its
 * own copy of the value.
 */
export const directAccessor: PropertyAccessor = {
  get(entity, property) {
    return Reflect.get(entity, property);
  },
  set(entity, property, value) {
    const existing: unknown = Reflect.get(entity, property);
    if (hasCopy(existing) && classify(existing)?.kind === classify(value)?.kind) {
      existing.copy(value);
      return;
    }
    if (!Reflect.set(entity, property, cloneValue(value))) {
      throw new Error(`Property "${property}" is not writable`);
    }
  },
};

/** `pivot` on an Object3D: its position and quaternion as one RigidTransform. */
export const pivotAccessor: PropertyAccessor = {
  get(entity) {
    return entity instanceof THREE.Object3D ? RigidTransform.fromObject3D(entity) : undefined;
  },
  set(entity, property, value) {
    if (!(value instanceof RigidTransform)) {
      throw new TypeMismatchError(property, "transform", classify(value)?.kind ?? describeType(value));
    }
    if (entity instanceof THREE.Object3D) {
      value.applyTo(entity);
    }
  },
};

/**
 * Resolves property names to accessors. Pseudo-properties (values derived
 * from, rather than stored on, the entity) take priority over direct access.
 */
export class PropertyAccessRegistry {
  private pseudo = new Map<string, PseudoProperty[]>();

  register(property: string, appliesTo: EntityPredicate, accessor: PropertyAccessor): this {
    const list = this.pseudo.get(property) ?? [];
    list.push({ appliesTo, accessor });
    this.pseudo.set(property, list);
    return this;
  }

  resolve(entity: object, property: string): PropertyAccessor {
    const match = this.pseudo.get(property)?.find((p) => p.appliesTo(entity));
    return match?.accessor ?? directAccessor;
  }
}

export function createDefaultAccessors(): PropertyAccessRegistry {
  return new PropertyAccessRegistry().register(
    "pivot",
    (entity) => entity instanceof THREE.Object3D,
    pivotAccessor
  );
}
