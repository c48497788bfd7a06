import { RandomSource } from '../../src/utils/random.js';

/**
 * A random source that always returns the same value.
 */
export function constantRandom(value: number): RandomSource {
    return () => value;
}

/**
 * A random source that fails the test if consulted.
 */
export const forbiddenRandom: RandomSource = () => {
    throw new Error('random source should not be consulted');
};
