export { Pose } from './Pose.js';
export { ScaleOffset, ScaleOffset2 } from './ScaleOffset.js';
export {
  ORIENTATION_ORDER, closestAngle, fromOrientation, lookAtRotation,
  lookVector, smoothstep, toOrientation,
} from './Orientation.js';
export type { Orientation } from './Orientation.js';
