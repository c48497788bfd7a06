/**
 * Source of uniformly distributed numbers in [0, 1), shaped like Math.random.
 */
export type RandomSource = () => number;

/**
 * mulberry32: a small, fast 32-bit generator. Same seed, same stream.
 */
export function createSeededRandom(seed: number): RandomSource {
    let t = seed >>> 0;
    return () => {
        t += 0x6D2B79F5;
        let x = t;
        x = Math.imul(x ^ (x >>> 15), x | 1);
        x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
        return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    };
}

export function pickRandom<T>(items: readonly T[], random: RandomSource): T {
    if (items.length === 0) {
        throw new Error('pickRandom called with empty array');
    }
    return items[Math.floor(random() * items.length)];
}
