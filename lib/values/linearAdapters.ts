import * as THREE from "three";
import { luvToRgb, rgbToLuv } from "@/lib/color/luv";
import type { LinearAdapter } from "@/lib/physics/types";

export const numberAdapter: LinearAdapter<number> = {
  size: 1,
  toIntermediate: (value) => [value],
  fromIntermediate: (value) => value[0],
  clone: (value) => value,
};

export const vector2Adapter: LinearAdapter<THREE.Vector2> = {
  size: 2,
  toIntermediate: (value) => [value.x, value.y],
  fromIntermediate: (value) => new THREE.Vector2(value[0], value[1]),
  clone: (value) => value.clone(),
};

export const vector3Adapter: LinearAdapter<THREE.Vector3> = {
  size: 3,
  toIntermediate: (value) => [value.x, value.y, value.z],
  fromIntermediate: (value) => new THREE.Vector3(value[0], value[1], value[2]),
  clone: (value) => value.clone(),
};

export const vector4Adapter: LinearAdapter<THREE.Vector4> = {
  size: 4,
  toIntermediate: (value) => [value.x, value.y, value.z, value.w],
  fromIntermediate: (value) => new THREE.Vector4(value[0], value[1], value[2], value[3]),
  clone: (value) => value.clone(),
};

// Two corners, two components each.
export const box2Adapter: LinearAdapter<THREE.Box2> = {
  size: 4,
  toIntermediate: (value) => [value.min.x, value.min.y, value.max.x, value.max.y],
  fromIntermediate: (value) =>
    new THREE.Box2(new THREE.Vector2(value[0], value[1]), new THREE.Vector2(value[2], value[3])),
  clone: (value) => value.clone(),
};

/**
 * three.js keeps colors in linear working space; the LUV conversion expects
 * sRGB-encoded channels, so convert on the way in and out.
 */
export const colorAdapter: LinearAdapter<THREE.Color> = {
  size: 3,
  toIntermediate: (value) => {
    const { r, g, b } = value.getRGB({ r: 0, g: 0, b: 0 }, THREE.SRGBColorSpace);
    return rgbToLuv([r, g, b]);
  },
  fromIntermediate: (value) => {
    const [r, g, b] = luvToRgb([value[0], value[1], value[2]]);
    return new THREE.Color().setRGB(r, g, b, THREE.SRGBColorSpace);
  },
  clone: (value) => value.clone(),
};
