import * as THREE from "three";
import { PropertyAccessRegistry, createDefaultAccessors, directAccessor, pivotAccessor } from "@/features/springs/propertyAccessors";
import { TypeMismatchError } from "@/lib/errors";
import { RigidTransform } from "@/lib/values/RigidTransform";

describe("directAccessor", () => {
  it("reads and assigns plain properties", () => {
    const entity = { opacity: 0 };
    directAccessor.set(entity, "opacity", 0.5);
    expect(directAccessor.get(entity, "opacity")).toBe(0.5);
  });

  it("copies into an existing value of the same kind", () => {
    const entity = { offset: new THREE.Vector2(0, 0) };
    const original = entity.offset;

    directAccessor.set(entity, "offset", new THREE.Vector2(3, 4));

    expect(entity.offset).toBe(original);
    expect(entity.offset.toArray()).toEqual([3, 4]);
  });

  it("replaces a value of another kind", () => {
    const entity: { value: unknown } = { value: new THREE.Vector2() };
    directAccessor.set(entity, "value", 7);
    expect(entity.value).toBe(7);
  });

  it("assigns a copy when replacing with a three.js value", () => {
    const entity: { value: unknown } = { value: undefined };
    const offset = new THREE.Vector2(3, 4);

    directAccessor.set(entity, "value", offset);
    offset.set(0, 0);

    expect(entity.value).toEqual(new THREE.Vector2(3, 4));
  });

  it("throws when a property cannot be written", () => {
    const entity = Object.freeze({ x: 1 });
    expect(() => directAccessor.set(entity, "x", 2)).toThrow('Property "x" is not writable');
  });
});

describe("pivotAccessor", () => {
  it("reads and writes position and rotation together", () => {
    const object = new THREE.Object3D();
    object.position.set(1, 2, 3);

    const read = pivotAccessor.get(object, "pivot");
    expect(read).toBeInstanceOf(RigidTransform);

    const next = new RigidTransform(
      new THREE.Vector3(4, 5, 6),
      new THREE.Quaternion().setFromAxisAngle(new THREE.Vector3(1, 0, 0), 1)
    );
    pivotAccessor.set(object, "pivot", next);

    expect(object.position.toArray()).toEqual([4, 5, 6]);
    expect(object.quaternion.equals(next.quaternion)).toBe(true);
  });

  it("refuses values that are not rigid transforms", () => {
    const object = new THREE.Object3D();
    expect(() => pivotAccessor.set(object, "pivot", 5)).toThrow(TypeMismatchError);
    expect(object.position.toArray()).toEqual([0, 0, 0]);
  });

  it("does not apply to plain objects", () => {
    expect(pivotAccessor.get({}, "pivot")).toBeUndefined();
  });
});

describe("PropertyAccessRegistry", () => {
  it("prefers a matching pseudo-property over direct access", () => {
    const registry = createDefaultAccessors();
    expect(registry.resolve(new THREE.Object3D(), "pivot")).toBe(pivotAccessor);
    expect(registry.resolve({ pivot: 1 }, "pivot")).toBe(directAccessor);
    expect(registry.resolve(new THREE.Object3D(), "position")).toBe(directAccessor);
  });

  it("accepts host-registered pseudo-properties", () => {
    const brightness = { level: 0 };
    const registry = new PropertyAccessRegistry().register("glow", (entity) => entity === brightness, {
      get: () => brightness.level,
      set: (_entity, _property, value) => {
        if (typeof value === "number") brightness.level = value;
      },
    });

    registry.resolve(brightness, "glow").set(brightness, "glow", 0.8);
    expect(brightness.level).toBe(0.8);
  });
});
