/**
 * sRGB <-> a CIELUV variant with a modified L component.
 *
 * Springs run on colors in this space so that interpolated hues stay
 * perceptually even instead of washing out through grey as raw RGB does.
 * The constants are fixed; changing any of them shifts every color
 * trajectory.
 */

export type RgbTriple = [r: number, g: number, b: number];
export type LuvTriple = [l: number, u: number, v: number];

const clamp01 = (value: number) => Math.min(Math.max(value, 0), 1);

/** D65 sRGB inverse gamma: encoded channel -> linear light. */
function decodeChannel(c: number): number {
  return c < 0.0404482362771076 ? c / 12.92 : 0.87941546140213 * (c + 0.055) ** 2.4;
}

/** D65 sRGB forward gamma: linear light -> encoded channel. */
function encodeChannel(c: number): number {
  return c < 3.1306684425e-3 ? 12.92 * c : 1.055 * c ** (1 / 2.4) - 0.055;
}

export function rgbToLuv([red, green, blue]: RgbTriple): LuvTriple {
  const r = decodeChannel(red);
  const g = decodeChannel(green);
  const b = decodeChannel(blue);

  // Rows are pre-scaled so that u and v fall straight out of x/z and y/z.
  const x = 0.9257063972951867 * r - 0.8333736323779866 * g - 0.09209820666085898 * b;
  const y = 0.2125862307855956 * r + 0.71517030370341085 * g + 0.0722004986433362 * b;
  const z = 3.6590806972265883 * r + 11.4426895800574232 * g + 4.1149915024264843 * b;

  // Linear segment near black, per CIE.
  const l = y > 0.008856451679035631 ? 116 * y ** (1 / 3) - 16 : 903.296296296296 * y;

  if (z > 1e-14) {
    return [l, (l * x) / z, l * ((9 * y) / z - 0.46832)];
  }
  return [l, -0.19783 * l, -0.46832 * l];
}

export function luvToRgb([l, uScaled, vScaled]: LuvTriple): RgbTriple {
  if (l < 0.0197955) {
    return [0, 0, 0];
  }

  const u = uScaled / l + 0.19783;
  const v = vScaled / l + 0.46832;

  let y = (l + 16) / 116;
  y = y > 0.206896551724137931 ? y * y * y : 0.12841854934601665 * y - 0.01771290335807126;
  const x = (y * u) / v;
  const z = y * ((3 - 0.75 * u) / v - 5);

  let r = 7.2914074 * x - 1.537208 * y - 0.4986286 * z;
  let g = -2.180094 * x + 1.8757561 * y + 0.0415175 * z;
  let b = 0.1253477 * x - 0.2040211 * y + 1.0569959 * z;

  // Out-of-gamut: lift every channel by the most negative one so the least
  // channel lands on zero. Clipping alone would skew the hue.
  if (r < 0 && r < g && r < b) {
    [r, g, b] = [0, g - r, b - r];
  } else if (g < 0 && g < b) {
    [r, g, b] = [r - g, 0, b - g];
  } else if (b < 0) {
    [r, g, b] = [r - b, g - b, 0];
  }

  return [clamp01(encodeChannel(r)), clamp01(encodeChannel(g)), clamp01(encodeChannel(b))];
}
