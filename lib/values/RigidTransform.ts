import * as THREE from "three";

/**
 * Translation + rotation without scale. This is what a "pivot" spring animates
 * on an Object3D.
 */
export class RigidTransform {
  readonly position: THREE.Vector3;
  readonly quaternion: THREE.Quaternion;

  constructor(position = new THREE.Vector3(), quaternion = new THREE.Quaternion()) {
    this.position = position;
    this.quaternion = quaternion;
  }

  static fromObject3D(object: THREE.Object3D): RigidTransform {
    return new RigidTransform(object.position.clone(), object.quaternion.clone());
  }

  applyTo(object: THREE.Object3D): void {
    object.position.copy(this.position);
    object.quaternion.copy(this.quaternion);
  }

  clone(): RigidTransform {
    return new RigidTransform(this.position.clone(), this.quaternion.clone());
  }

  copy(other: RigidTransform): this {
    this.position.copy(other.position);
    this.quaternion.copy(other.quaternion);
    return this;
  }

  equals(other: RigidTransform): boolean {
    return this.position.equals(other.position) && this.quaternion.equals(other.quaternion);
  }
}
