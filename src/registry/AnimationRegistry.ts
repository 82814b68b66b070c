// ═══════════════════════════════════════════════════════════════════
// ANIMATION REGISTRY - named springs and splines, grouped callbacks
//
// Springs can be built from a SpringInfo table whose keys are any of
// the spring's property names or aliases:
//   registry.createSpring({ initial: 0, s: 12, d: 0.6, t: 10 }, 'hud');
//
// Group binds call one callback with every spring's position/velocity
// each tick. Springs at rest report (target, zero); the callback keeps
// firing while any spring moves, plus once on the first idle tick.
//
// Lookups of unknown names follow the configured error policy: 'error'
// throws, 'warn' logs and returns undefined.
// ═══════════════════════════════════════════════════════════════════

import { loadConfig } from '../config.js';
import type { ErrorPolicy } from '../config.js';
import { Spring } from '../spring/Spring.js';
import type { SpringClock, SpringHandle } from '../spring/Spring.js';
import type { Springable } from '../spring/SpringValues.js';
import { getDefaultTicker } from '../spring/Ticker.js';
import type { TickSource } from '../spring/Ticker.js';
import { Spline } from '../spline/Spline.js';
import type { Pose } from '../math/Pose.js';

export interface SpringInfo<T extends Springable = Springable> {
  initial?: T;
  i?: T;
  clock?: SpringClock;
  position?: T;
  value?: T;
  p?: T;
  velocity?: T;
  v?: T;
  target?: T;
  t?: T;
  damper?: number;
  d?: number;
  speed?: number;
  s?: number;
}

export type GroupCallback = (positions: Springable[], velocities: Springable[]) => void;

export interface AnimationRegistryOptions {
  errorPolicy?: ErrorPolicy;
  ticker?: TickSource;
}

interface GroupBind {
  springs: readonly SpringHandle[];
  callback: GroupCallback;
  /** Whether every spring was at rest on the previous tick */
  idle: boolean;
}

/** Keys of SpringInfo consumed at construction rather than applied as properties */
const CONSTRUCTION_KEYS = new Set(['initial', 'i', 'clock']);

export class AnimationRegistry {
  readonly errorPolicy: ErrorPolicy;
  private readonly ticker: TickSource;
  private readonly springs = new Map<string, SpringHandle>();
  private readonly splines = new Map<string, Spline>();
  private readonly groups = new Map<string, GroupBind>();
  private disconnect: (() => void) | null = null;

  constructor(options: AnimationRegistryOptions = {}) {
    this.errorPolicy = options.errorPolicy ?? loadConfig().errorPolicy;
    this.ticker = options.ticker ?? getDefaultTicker();
  }

  // ── Springs ────────────────────────────────────────────────

  createSpring(info: SpringInfo<number>, name?: string): Spring<number>;
  createSpring<T extends Springable>(info: SpringInfo<T>, name?: string): Spring<T>;
  createSpring(info: SpringInfo, name?: string): SpringHandle {
    const spring = Spring.create(info.initial ?? info.i ?? 0, info.clock, this.ticker);
    for (const [key, value] of Object.entries(info)) {
      if (CONSTRUCTION_KEYS.has(key) || value === undefined) continue;
      spring.setProperty(key, value);
    }
    if (name !== undefined) this.springs.set(name, spring);
    return spring;
  }

  getSpring(name: string): SpringHandle | undefined {
    const spring = this.springs.get(name);
    if (!spring) this.report(`Spring "${name}" does not exist`);
    return spring;
  }

  removeSpring(name: string): boolean {
    return this.springs.delete(name);
  }

  // ── Splines ────────────────────────────────────────────────

  createSpline(controlPoints: readonly Pose[], name?: string): Spline {
    const spline = new Spline(controlPoints);
    if (name !== undefined) {
      this.splines.set(name, spline);
      spline.onDestroying(() => {
        if (this.splines.get(name) === spline) this.splines.delete(name);
      });
    }
    return spline;
  }

  getSpline(name: string): Spline | undefined {
    const spline = this.splines.get(name);
    if (!spline) this.report(`Spline "${name}" does not exist`);
    return spline;
  }

  // ── Group binds ────────────────────────────────────────────

  bind(springs: readonly SpringHandle[], label: string, callback: GroupCallback): void {
    if (this.groups.has(label)) {
      console.warn(`[AnimationRegistry] Label "${label}" already bound, overwriting`);
    }
    this.groups.set(label, { springs: [...springs], callback, idle: false });
    if (!this.disconnect) this.disconnect = this.ticker.connect(this.onTick);
  }

  unbind(label: string): void {
    this.groups.delete(label);
  }

  private readonly onTick = (): void => {
    if (this.groups.size === 0) {
      this.disconnect?.();
      this.disconnect = null;
      return;
    }

    for (const group of [...this.groups.values()]) {
      const positions: Springable[] = [];
      const velocities: Springable[] = [];
      let idle = true;

      for (const spring of group.springs) {
        const [animating, value] = spring.isAnimating();
        if (animating) {
          idle = false;
          positions.push(value);
          velocities.push(spring.velocity);
        } else {
          positions.push(value);
          velocities.push(spring.zero());
        }
      }

      if (!idle || !group.idle) group.callback(positions, velocities);
      group.idle = idle;
    }
  };

  private report(message: string): void {
    if (this.errorPolicy === 'error') throw new Error(`[AnimationRegistry] ${message}`);
    console.warn(`[AnimationRegistry] ${message}`);
  }
}
