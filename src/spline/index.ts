export { Spline, SplineAlignment } from './Spline.js';
export type { CurveSample, DestroyingListener } from './Spline.js';
export { catmullRom, derivativeAt, positionAt, windowIndices } from './CatmullRom.js';
export type { CatmullRomTerms } from './CatmullRom.js';
