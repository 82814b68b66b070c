// ═══════════════════════════════════════════════════════════════════
// SPRING - closed-form damped spring over any springable kind
//
// State is (position0, velocity0, target) as channel vectors plus the
// time they were captured. Reading position or velocity evaluates the
// closed form at clock() without touching the state; every write first
// commits the evaluated state (time0 = now) and then applies the change.
//
// USAGE:
//   const spring = Spring.create(0, clock, ticker);
//   spring.speed = 12;
//   spring.target = 10;
//   spring.bind('ui', (position) => bar.setWidth(position));
// ═══════════════════════════════════════════════════════════════════

import { DEFAULT_DAMPER, DEFAULT_EPSILON, DEFAULT_SPEED } from '../constants.js';
import { closestAngle } from '../math/Orientation.js';
import { blendChannels, channelDistance, springCoefficients } from './SpringMath.js';
import type { SpringState } from './SpringMath.js';
import { codecFor, describeValue } from './SpringValues.js';
import type { SpringCodec, SpringKind, Springable } from './SpringValues.js';
import { getDefaultTicker } from './Ticker.js';
import type { TickSource } from './Ticker.js';

/** Monotonic time source in seconds */
export type SpringClock = () => number;

export type SpringCallback<T> = (position: T, velocity: T) => void;

export type SpringProperty = 'position' | 'velocity' | 'target' | 'damper' | 'speed' | 'clock' | 'kind';

/** Kind-agnostic view of a spring, for code that handles mixed kinds */
export interface SpringHandle {
  readonly kind: SpringKind;
  readonly position: Springable;
  readonly velocity: Springable;
  readonly target: Springable;
  readonly damper: number;
  readonly speed: number;
  isAnimating(epsilon?: number): [boolean, Springable];
  zero(): Springable;
  getProperty(name: string): unknown;
  setProperty(name: string, value: unknown): void;
  impulse(delta: Springable): void;
  timeSkip(delta: number): void;
}

const PROPERTY_NAMES = new Map<string, SpringProperty>([
  ['position', 'position'], ['value', 'position'], ['p', 'position'],
  ['velocity', 'velocity'], ['v', 'velocity'],
  ['target', 'target'], ['t', 'target'],
  ['damper', 'damper'], ['d', 'damper'],
  ['speed', 'speed'], ['s', 'speed'],
  ['clock', 'clock'],
  ['kind', 'kind'], ['type', 'kind'],
]);

/** Resolves a property name or alias; unknown names are a programming error */
export function resolveSpringProperty(name: string): SpringProperty {
  const property = PROPERTY_NAMES.get(name);
  if (!property) throw new Error(`[Spring] "${name}" is not a valid member of Spring`);
  return property;
}

export function isSpringClock(value: unknown): value is SpringClock {
  return typeof value === 'function';
}

const defaultClock: SpringClock = () => performance.now() / 1000;

export class Spring<T extends Springable> implements SpringHandle {
  private readonly codec: SpringCodec<T>;
  private readonly ticker: TickSource;
  private clockFn: SpringClock;
  private time0: number;
  private position0: number[];
  private velocity0: number[];
  private goal: number[];
  private damperValue = DEFAULT_DAMPER;
  private speedValue = DEFAULT_SPEED;

  // ── Observation ────────────────────────────────────────────
  private readonly callbacks = new Map<string, SpringCallback<T>>();
  private disconnect: (() => void) | null = null;

  constructor(
    codec: SpringCodec<T>, initial: T,
    clock: SpringClock = defaultClock,
    ticker: TickSource = getDefaultTicker(),
  ) {
    this.codec = codec;
    this.clockFn = clock;
    this.ticker = ticker;
    this.position0 = this.encodeInRange(initial, 'initial');
    this.velocity0 = new Array<number>(codec.channelCount).fill(0);
    this.goal = [...this.position0];
    this.time0 = clock();
  }

  /** Creates a spring at rest on `initial`; the value's type fixes the spring's kind */
  static create(initial: number, clock?: SpringClock, ticker?: TickSource): Spring<number>;
  static create<T extends Springable>(initial: T, clock?: SpringClock, ticker?: TickSource): Spring<T>;
  static create(initial: Springable, clock?: SpringClock, ticker?: TickSource): SpringHandle {
    return new Spring(codecFor(initial), initial, clock, ticker);
  }

  // ── Reads (pure in elapsed time) ───────────────────────────

  get position(): T {
    return this.codec.decode(this.advanceTo(this.clockFn(), false).position);
  }

  get velocity(): T {
    return this.codec.decode(this.advanceTo(this.clockFn(), false).velocity);
  }

  get target(): T {
    return this.codec.decode(this.goal);
  }

  get damper(): number {
    return this.damperValue;
  }

  get speed(): number {
    return this.speedValue;
  }

  get clock(): SpringClock {
    return this.clockFn;
  }

  get kind(): SpringKind {
    return this.codec.kind;
  }

  /** Whether a tick subscription is currently feeding bound callbacks */
  get observing(): boolean {
    return this.disconnect !== null;
  }

  /** Position and velocity the spring will have at clock time `now` */
  computePositionVelocity(now: number): { position: T; velocity: T } {
    const state = this.advanceTo(now, false);
    return {
      position: this.codec.decode(state.position),
      velocity: this.codec.decode(state.velocity),
    };
  }

  /** The zero value of this spring's kind */
  zero(): T {
    return this.codec.decode(new Array<number>(this.codec.channelCount).fill(0));
  }

  // ── Writes (commit, then apply) ────────────────────────────

  set position(value: T) {
    const channels = this.encodeInRange(value, 'position');
    this.advanceTo(this.clockFn(), true);
    this.position0 = channels;
    this.wake();
  }

  set velocity(value: T) {
    const channels = this.encode(value, 'velocity');
    this.advanceTo(this.clockFn(), true);
    this.velocity0 = channels;
    this.wake();
  }

  set target(value: T) {
    const channels = this.encodeInRange(value, 'target');
    this.advanceTo(this.clockFn(), true);
    for (const i of this.codec.angleChannels) {
      channels[i] = closestAngle(channels[i], this.position0[i]);
    }
    this.goal = channels;
    this.wake();
  }

  set damper(value: number) {
    if (Number.isNaN(value) || value < 0) {
      throw new RangeError(`[Spring] damper must be a number >= 0, got ${value}`);
    }
    this.advanceTo(this.clockFn(), true);
    this.damperValue = value;
    this.wake();
  }

  set speed(value: number) {
    if (Number.isNaN(value)) throw new RangeError('[Spring] speed must be a number, got NaN');
    this.advanceTo(this.clockFn(), true);
    this.speedValue = Math.max(0, value);
    this.wake();
  }

  set clock(clock: SpringClock) {
    this.advanceTo(this.clockFn(), true);
    this.clockFn = clock;
    this.time0 = clock();
    this.wake();
  }

  /** Adds `delta` to the current velocity */
  impulse(delta: T): void {
    const channels = this.encode(delta, 'impulse');
    this.advanceTo(this.clockFn(), true);
    for (let i = 0; i < channels.length; i++) this.velocity0[i] += channels[i];
    this.wake();
  }

  /** Jumps the simulation `delta` seconds ahead without moving time0 past now */
  timeSkip(delta: number): void {
    const now = this.clockFn();
    const state = this.advanceTo(now + delta, false);
    this.position0 = state.position;
    this.velocity0 = state.velocity;
    this.time0 = now;
    this.wake();
  }

  // ── Named access ───────────────────────────────────────────

  getProperty(name: string): unknown {
    switch (resolveSpringProperty(name)) {
      case 'position': return this.position;
      case 'velocity': return this.velocity;
      case 'target': return this.target;
      case 'damper': return this.damperValue;
      case 'speed': return this.speedValue;
      case 'clock': return this.clockFn;
      case 'kind': return this.codec.kind;
    }
  }

  setProperty(name: string, value: unknown): void {
    const property = resolveSpringProperty(name);
    switch (property) {
      case 'position': this.position = this.expect(value, property); break;
      case 'velocity': this.velocity = this.expect(value, property); break;
      case 'target': this.target = this.expect(value, property); break;
      case 'damper': this.damper = expectNumber(value, property); break;
      case 'speed': this.speed = expectNumber(value, property); break;
      case 'clock':
        if (!isSpringClock(value)) {
          throw new TypeError(`[Spring] clock must be a function, got ${describeValue(value)}`);
        }
        this.clock = value;
        break;
      case 'kind':
        throw new Error(`[Spring] "${name}" is read-only`);
    }
  }

  // ── Rest detection ─────────────────────────────────────────

  /**
   * `[true, position]` while any channel group is further than `epsilon`
   * from the target or moving faster than `epsilon`; otherwise
   * `[false, target]` so callers can snap to the exact resting value.
   */
  isAnimating(epsilon = DEFAULT_EPSILON): [boolean, T] {
    const { animating, state } = this.restState(epsilon);
    return animating
      ? [true, this.codec.decode(state.position)]
      : [false, this.codec.decode(this.goal)];
  }

  /** Resolves with the exact target once the spring comes to rest */
  whenSettled(epsilon = DEFAULT_EPSILON): Promise<T> {
    return new Promise<T>((resolve) => {
      const disconnect = this.ticker.connect(() => {
        const [animating, value] = this.isAnimating(epsilon);
        if (animating) return;
        disconnect();
        resolve(value);
      });
    });
  }

  // ── Callbacks ──────────────────────────────────────────────

  bind(label: string, callback: SpringCallback<T>): void {
    if (this.callbacks.has(label)) {
      console.warn(`[Spring] Label "${label}" already has a bound callback, overwriting`);
    }
    this.callbacks.set(label, callback);
    this.wake();
  }

  /** Removes one label; the tick loop ends by itself once none remain */
  unbind(label: string): void {
    this.callbacks.delete(label);
  }

  private wake(): void {
    if (this.callbacks.size === 0 || this.disconnect) return;
    this.disconnect = this.ticker.connect(this.onTick);
  }

  private stopObserving(): void {
    this.disconnect?.();
    this.disconnect = null;
  }

  private readonly onTick = (): void => {
    if (this.callbacks.size === 0) {
      this.stopObserving();
      return;
    }

    const { animating, state } = this.restState(DEFAULT_EPSILON);
    if (animating) {
      this.emit(this.codec.decode(state.position), this.codec.decode(state.velocity));
      return;
    }

    // Settled: one last emit with the exact resting values, in case the
    // final animating tick landed short of the target.
    this.stopObserving();
    this.emit(this.codec.decode(this.goal), this.zero());
  };

  private emit(position: T, velocity: T): void {
    for (const callback of [...this.callbacks.values()]) {
      callback(position, velocity);
    }
  }

  // ── Internals ──────────────────────────────────────────────

  /** Evaluates the spring at `now`; with `commit` the result becomes the new origin */
  private advanceTo(now: number, commit: boolean): SpringState {
    const coefficients = springCoefficients(this.damperValue, this.speedValue, now - this.time0);
    const state = blendChannels(coefficients, this.position0, this.velocity0, this.goal);
    this.codec.clampPosition(state.position);

    if (commit) {
      this.position0 = [...state.position];
      this.velocity0 = [...state.velocity];
      this.time0 = now;
    }
    return state;
  }

  private restState(epsilon: number): { animating: boolean; state: SpringState } {
    const state = this.advanceTo(this.clockFn(), false);
    const animating = this.codec.restGroups.some((group) =>
      channelDistance(state.position, this.goal, group) > epsilon
      || channelDistance(state.velocity, null, group) > epsilon);
    return { animating, state };
  }

  private expect(value: unknown, property: string): T {
    if (!this.codec.matches(value)) {
      throw new TypeError(
        `[Spring] ${property} must be a ${this.codec.kind} value, got ${describeValue(value)}`,
      );
    }
    return value;
  }

  private encode(value: unknown, property: string): number[] {
    return this.codec.encode(this.expect(value, property));
  }

  /** Positions and targets share the kind's limits, so a target is always reachable */
  private encodeInRange(value: unknown, property: string): number[] {
    const channels = this.encode(value, property);
    this.codec.clampPosition(channels);
    return channels;
  }
}

function expectNumber(value: unknown, property: string): number {
  if (typeof value !== 'number') {
    throw new TypeError(`[Spring] ${property} must be a number, got ${describeValue(value)}`);
  }
  return value;
}
