import { expect } from 'chai';
import { createSeededRandom, pickRandom } from '../../../src/utils/random.js';
import { constantRandom } from '../../helpers/test-utils.js';

describe('Random utils', () => {
    it('should produce the same stream for the same seed', () => {
        const first = createSeededRandom(123);
        const second = createSeededRandom(123);

        const a = Array.from({ length: 20 }, () => first());
        const b = Array.from({ length: 20 }, () => second());

        expect(a).to.deep.equal(b);
    });

    it('should produce different streams for different seeds', () => {
        const first = createSeededRandom(1);
        const second = createSeededRandom(2);

        expect(Array.from({ length: 5 }, () => first())).to.not.deep.equal(Array.from({ length: 5 }, () => second()));
    });

    it('should stay within [0, 1)', () => {
        const random = createSeededRandom(77);
        for (let i = 0; i < 1000; i++) {
            const value = random();
            expect(value).to.be.at.least(0);
            expect(value).to.be.below(1);
        }
    });

    it('should pick by scaling the draw over the item count', () => {
        expect(pickRandom([ 'a', 'b', 'c', 'd' ], constantRandom(0))).to.equal('a');
        expect(pickRandom([ 'a', 'b', 'c', 'd' ], constantRandom(0.5))).to.equal('c');
        expect(pickRandom([ 'a', 'b', 'c', 'd' ], constantRandom(0.999))).to.equal('d');
    });

    it('should refuse to pick from an empty array', () => {
        expect(() => pickRandom([], constantRandom(0))).to.throw('pickRandom called with empty array');
    });
});
