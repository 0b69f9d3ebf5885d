/**
 * Math exports
 */

export { Complex, parseFloatStrict } from './complex';
export { Point } from './point';
export { totalCompare } from './total-order';
