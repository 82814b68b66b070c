// ═══════════════════════════════════════════════════════════════════
// MOTION PRIMITIVES - public entry point
// ═══════════════════════════════════════════════════════════════════

export * from './constants.js';
export { configSchema, loadConfig } from './config.js';
export type { ErrorPolicy, MotionConfig } from './config.js';

export * from './math/index.js';
export * from './spring/index.js';
export * from './spline/index.js';

export { AnimationRegistry } from './registry/AnimationRegistry.js';
export type {
  AnimationRegistryOptions, GroupCallback, SpringInfo,
} from './registry/AnimationRegistry.js';
