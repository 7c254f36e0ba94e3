/**
 * Closed-form stepping of a damped harmonic oscillator.
 *
 * Every coordinate independently follows
 *
 *   f²(x − g) + 2·d·f·x' + x'' = 0
 *
 * so advancing by `dt` is a fixed linear map on (offset, velocity). The map
 * only depends on (d, f, dt), which lets the linear and rotation solvers share
 * one set of coefficients per step.
 */

/** Below this, `sin(x)/x`-style quotients switch to their Maclaurin series. */
export const SERIES_EPSILON = 1e-5;

/**
 * Transition for one step:
 *   offset'   = offset·pp + velocity·pv
 *   velocity' = offset·vp + velocity·vv
 */
export interface OscillatorCoefficients {
  pp: number;
  pv: number;
  vp: number;
  vv: number;
}

/**
 * @param d Damping ratio (≥ 0).
 * @param f Undamped frequency in Hz (≥ 0, finite).
 * @param dt Elapsed time in seconds (≥ 0).
 */
export function oscillatorCoefficients(d: number, f: number, dt: number): OscillatorCoefficients {
  const w = f * 2 * Math.PI;

  if (d === 1) {
    return criticallyDamped(w, dt);
  }
  if (d < 1) {
    return underdamped(d, w, dt);
  }
  return overdamped(d, w, dt);
}

function criticallyDamped(w: number, dt: number): OscillatorCoefficients {
  const q = Math.exp(-w * dt);
  const k = dt * q;

  const c0 = q + k * w;
  const c2 = q - k * w;
  const c3 = k * w * w;

  return { pp: c0, pv: k, vp: -c3, vv: c2 };
}

function underdamped(d: number, w: number, dt: number): OscillatorCoefficients {
  const q = Math.exp(-d * w * dt);
  const c = Math.sqrt(1 - d * d);

  const i = Math.cos(dt * w * c);
  const j = Math.sin(dt * w * c);

  // z = sin(a·c)/c with a = dt·w. As d → 1, c → 0 and the quotient cancels
  // badly, so expand around c = 0:
  //   z ≈ a − a³c²/6 + a⁵c⁴/120
  // written in Horner form.
  let z: number;
  if (c > SERIES_EPSILON) {
    z = j / c;
  } else {
    const a = dt * w;
    z = a + ((a * a * (c * c) * (c * c)) / 20 - c * c) * ((a * a * a) / 6);
  }

  // y = sin(dt·b)/b with b = w·c has the same problem as f → 0.
  let y: number;
  if (w * c > SERIES_EPSILON) {
    y = j / (w * c);
  } else {
    const b = w * c;
    y = dt + ((dt * dt * (b * b) * (b * b)) / 20 - b * b) * ((dt * dt * dt) / 6);
  }

  return {
    pp: (i + z * d) * q,
    pv: y * q,
    vp: -z * w * q,
    vv: (i - z * d) * q,
  };
}

function overdamped(d: number, w: number, dt: number): OscillatorCoefficients {
  const c = Math.sqrt(d * d - 1);
  const s = w * c;

  // Slow and fast decay rates. d − c is written as 1/(d + c), which does not
  // cancel to zero for large d.
  const r1 = -w / (d + c);
  const r2 = -w * (d + c);

  const e1 = Math.exp(r1 * dt);
  const e2 = Math.exp(r2 * dt);

  // Solving offset = A + B, velocity = A·r1 + B·r2 gives every coefficient in
  // terms of k = (e1 − e2)/(r1 − r2), where r1 − r2 = 2·w·c. k is
  // e^(−d·w·dt)·sinh(s·dt)/s, which needs the series form as s → 0.
  let k: number;
  if (s > SERIES_EPSILON) {
    k = (e1 - e2) / (2 * s);
  } else {
    const q = Math.exp(-d * w * dt);
    const dt2 = dt * dt;
    k = q * (dt + (dt * dt2 * s * s) / 6 + (dt * dt2 * dt2 * s * s * s * s) / 120);
  }

  const vv = (e1 + e2) / 2 - d * w * k;

  return {
    pp: e1 - r1 * k,
    pv: k,
    vp: r1 * (e1 - vv),
    vv,
  };
}
