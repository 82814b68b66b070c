// ═══════════════════════════════════════════════════════════════════
// SPRING MATH - closed-form damped harmonic oscillator
//
// For a spring released at (p0, v0) toward target x, after `elapsed`
// seconds every channel obeys
//
//   position = a·p0 + (1 - a)·x + (sine / speed)·v0
//   velocity = -b·p0 + b·x + (cosH - damperSin)·v0
//
// with the coefficients below. damper < 1 oscillates, damper == 1 is
// critically damped, damper > 1 is overdamped; the three branches meet
// continuously at damper == 1.
// ═══════════════════════════════════════════════════════════════════

export interface SpringCoefficients {
  a: number;
  b: number;
  sine: number;
  cosH: number;
  damperSin: number;
  /** Weight of v0 in the position: sine / speed (its limit, `elapsed`, when speed is 0) */
  velocityGain: number;
}

/** Channel vectors of one evaluated spring state */
export interface SpringState {
  position: number[];
  velocity: number[];
}

export function springCoefficients(damper: number, speed: number, elapsed: number): SpringCoefficients {
  const t = speed * elapsed;
  const damperSquared = damper * damper;
  let h: number;
  let sine: number;
  let cosine: number;

  if (damperSquared < 1) {
    h = Math.sqrt(1 - damperSquared);
    const ep = Math.exp(-damper * t) / h;
    cosine = ep * Math.cos(h * t);
    sine = ep * Math.sin(h * t);
  } else if (damperSquared === 1) {
    h = 1;
    const ep = Math.exp(-damper * t);
    cosine = ep;
    sine = ep * t;
  } else {
    h = Math.sqrt(damperSquared - 1);
    const u = Math.exp((-damper + h) * t) / (2 * h);
    const v = Math.exp((-damper - h) * t) / (2 * h);
    cosine = u + v;
    sine = u - v;
  }

  const cosH = h * cosine;
  const damperSin = damper * sine;
  return {
    a: cosH + damperSin,
    b: speed * sine,
    sine,
    cosH,
    damperSin,
    velocityGain: speed === 0 ? elapsed : sine / speed,
  };
}

/** Applies the coefficients to every channel independently */
export function blendChannels(
  c: SpringCoefficients,
  position0: readonly number[], velocity0: readonly number[], target: readonly number[],
): SpringState {
  const position: number[] = [];
  const velocity: number[] = [];
  const restitution = c.cosH - c.damperSin;

  for (let i = 0; i < position0.length; i++) {
    position.push(c.a * position0[i] + (1 - c.a) * target[i] + c.velocityGain * velocity0[i]);
    velocity.push(-c.b * position0[i] + c.b * target[i] + restitution * velocity0[i]);
  }

  return { position, velocity };
}

/** Euclidean length of the listed channels of `a - b` (or of `a` alone) */
export function channelDistance(
  a: readonly number[], b: readonly number[] | null, channels: readonly number[],
): number {
  let sum = 0;
  for (const i of channels) {
    const d = a[i] - (b ? b[i] : 0);
    sum += d * d;
  }
  return Math.sqrt(sum);
}
