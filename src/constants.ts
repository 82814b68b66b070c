// ═══════════════════════════════════════════════════════════════════
// MOTION CONSTANTS
// Defaults shared by the spring and spline engines. Runtime overrides
// live in config.ts.
// ═══════════════════════════════════════════════════════════════════

/** Rest threshold used by Spring.isAnimating() when none is given */
export const DEFAULT_EPSILON = 1e-4;

/** Damping ratio of a new spring (1 = critically damped) */
export const DEFAULT_DAMPER = 1;

/** Angular speed of a new spring */
export const DEFAULT_SPEED = 1;

/** Curve samples per control point used for spline curve samples */
export const DEFAULT_SEGMENTS_PER_CURVE = 10;

/** Polyline steps per Catmull-Rom segment when measuring arc length (step = 0.01) */
export const ARC_LENGTH_STEPS = 100;

/** Below this spline tangent length, Track alignment falls back to Nodes */
export const MIN_TANGENT_LENGTH = 1e-9;

/** Control points needed before arc-length tables are built */
export const MIN_ARC_LENGTH_POINTS = 3;

/** Ticks per second for the default interval ticker */
export const TICK_RATE = 60;

export const TAU = Math.PI * 2;
