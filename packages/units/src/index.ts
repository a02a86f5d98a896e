export { ddmmff, ddmmss } from './coordinates.js';
export { LEGACY_PI, degToRad, radToDeg, kmhToMs } from './conversions.js';
