/**
 * Random exports
 */

export { mulberry32, timeSeed, createRng, uniform, shuffle, randomWeights, type Rng } from './rng';
