// ═══════════════════════════════════════════════════════════════════
// SPRING VALUES - the closed set of springable kinds
//
// Each kind has a codec that flattens a value into independent scalar
// channels (the oscillator runs per channel) and rebuilds it. Channel
// groups say which channels are measured together as one magnitude
// when deciding whether a spring has come to rest.
//
//   number        [v]                           (finite only)
//   vector2       [x, y]
//   vector3       [x, y, z]
//   scaleOffset   [scale, offset]
//   scaleOffset2  [x.scale, x.offset, y.scale, y.offset]
//   pose          [x, y, z, pitch, yaw, roll]   (YXZ Euler, radians)
//   color         [r, g, b]                     (position and target clamped 0..1)
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import { Pose } from '../math/Pose.js';
import { ScaleOffset, ScaleOffset2 } from '../math/ScaleOffset.js';
import { fromOrientation, toOrientation } from '../math/Orientation.js';

export interface SpringValueMap {
  number: number;
  vector2: THREE.Vector2;
  vector3: THREE.Vector3;
  scaleOffset: ScaleOffset;
  scaleOffset2: ScaleOffset2;
  pose: Pose;
  color: THREE.Color;
}

export type SpringKind = keyof SpringValueMap;

/** Any value a spring can animate */
export type Springable = SpringValueMap[SpringKind];

export interface SpringCodec<T> {
  readonly kind: SpringKind;
  readonly channelCount: number;
  /** Channel index groups tested as one magnitude by isAnimating() */
  readonly restGroups: readonly (readonly number[])[];
  /** Channels holding angles; targets are unwrapped toward the position on these */
  readonly angleChannels: readonly number[];
  matches(value: unknown): value is T;
  encode(value: T): number[];
  decode(channels: readonly number[]): T;
  /** In-place limits applied to blended positions and to stored positions and targets */
  clampPosition(channels: number[]): void;
}

const noClamp = (): void => {};

const numberCodec: SpringCodec<number> = {
  kind: 'number',
  channelCount: 1,
  restGroups: [[0]],
  angleChannels: [],
  matches: (value): value is number => typeof value === 'number' && Number.isFinite(value),
  encode: (value) => [value],
  decode: (c) => c[0],
  clampPosition: noClamp,
};

const vector2Codec: SpringCodec<THREE.Vector2> = {
  kind: 'vector2',
  channelCount: 2,
  restGroups: [[0, 1]],
  angleChannels: [],
  matches: (value): value is THREE.Vector2 => value instanceof THREE.Vector2,
  encode: (value) => [value.x, value.y],
  decode: (c) => new THREE.Vector2(c[0], c[1]),
  clampPosition: noClamp,
};

const vector3Codec: SpringCodec<THREE.Vector3> = {
  kind: 'vector3',
  channelCount: 3,
  restGroups: [[0, 1, 2]],
  angleChannels: [],
  matches: (value): value is THREE.Vector3 => value instanceof THREE.Vector3,
  encode: (value) => [value.x, value.y, value.z],
  decode: (c) => new THREE.Vector3(c[0], c[1], c[2]),
  clampPosition: noClamp,
};

const scaleOffsetCodec: SpringCodec<ScaleOffset> = {
  kind: 'scaleOffset',
  channelCount: 2,
  restGroups: [[0], [1]],
  angleChannels: [],
  matches: (value): value is ScaleOffset => value instanceof ScaleOffset,
  encode: (value) => [value.scale, value.offset],
  decode: (c) => new ScaleOffset(c[0], c[1]),
  clampPosition: noClamp,
};

const scaleOffset2Codec: SpringCodec<ScaleOffset2> = {
  kind: 'scaleOffset2',
  channelCount: 4,
  restGroups: [[0], [1], [2], [3]],
  angleChannels: [],
  matches: (value): value is ScaleOffset2 => value instanceof ScaleOffset2,
  encode: (value) => [value.x.scale, value.x.offset, value.y.scale, value.y.offset],
  decode: (c) => ScaleOffset2.fromValues(c[0], c[1], c[2], c[3]),
  clampPosition: noClamp,
};

const poseCodec: SpringCodec<Pose> = {
  kind: 'pose',
  channelCount: 6,
  restGroups: [[0, 1, 2], [3, 4, 5]],
  angleChannels: [3, 4, 5],
  matches: (value): value is Pose => value instanceof Pose,
  encode: (value) => [value.position.x, value.position.y, value.position.z, ...toOrientation(value.rotation)],
  decode: (c) => new Pose(new THREE.Vector3(c[0], c[1], c[2]), fromOrientation(c[3], c[4], c[5])),
  clampPosition: noClamp,
};

const colorCodec: SpringCodec<THREE.Color> = {
  kind: 'color',
  channelCount: 3,
  restGroups: [[0, 1, 2]],
  angleChannels: [],
  matches: (value): value is THREE.Color => value instanceof THREE.Color,
  encode: (value) => [value.r, value.g, value.b],
  decode: (c) => new THREE.Color(c[0], c[1], c[2]),
  clampPosition: (c) => {
    for (let i = 0; i < c.length; i++) c[i] = THREE.MathUtils.clamp(c[i], 0, 1);
  },
};

export const SPRING_CODECS: { readonly [K in SpringKind]: SpringCodec<SpringValueMap[K]> } = {
  number: numberCodec,
  vector2: vector2Codec,
  vector3: vector3Codec,
  scaleOffset: scaleOffsetCodec,
  scaleOffset2: scaleOffset2Codec,
  pose: poseCodec,
  color: colorCodec,
};

export const SPRING_KINDS: readonly SpringKind[] = [
  'number', 'vector2', 'vector3', 'scaleOffset', 'scaleOffset2', 'pose', 'color',
];

/** Readable name of a value's type for error messages */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'Object';
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value);
  return typeof value;
}

/** Codec for the kind `value` belongs to; throws for anything unsupported */
export function codecFor(value: unknown): SpringCodec<Springable> {
  for (const kind of SPRING_KINDS) {
    const codec: SpringCodec<Springable> = SPRING_CODECS[kind];
    if (codec.matches(value)) return codec;
  }
  throw new TypeError(
    `[Spring] Unsupported value type "${describeValue(value)}", expected one of: ${SPRING_KINDS.join(', ')}`,
  );
}
