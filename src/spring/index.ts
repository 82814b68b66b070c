export { Spring, isSpringClock, resolveSpringProperty } from './Spring.js';
export type { SpringCallback, SpringClock, SpringHandle, SpringProperty } from './Spring.js';
export { SPRING_CODECS, SPRING_KINDS, codecFor, describeValue } from './SpringValues.js';
export type { SpringCodec, SpringKind, SpringValueMap, Springable } from './SpringValues.js';
export { blendChannels, channelDistance, springCoefficients } from './SpringMath.js';
export type { SpringCoefficients, SpringState } from './SpringMath.js';
export { IntervalTicker, ManualTicker, getDefaultTicker } from './Ticker.js';
export type { TickListener, TickSource } from './Ticker.js';
