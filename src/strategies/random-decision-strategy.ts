import { GameEngine } from '../game-engine.js';
import { RandomSource, pickRandom } from '../utils/random.js';
import { DecisionStrategy } from './decision-strategy.js';

/**
 * Random Decision Strategy
 *
 * Chooses uniformly from legal actions.
 *
 * Used for:
 * - Baseline comparison (MCTS vs Random)
 * - Testing
 */
export class RandomDecisionStrategy<State, Action> implements DecisionStrategy<State, Action> {
    constructor(
        private engine: GameEngine<State, Action>,
        private random: RandomSource = Math.random,
    ) {}

    getAction(state: State): Action | null {
        const legalActions = this.engine.legalActions(state);

        if (legalActions.length === 0) {
            return null;
        }

        return pickRandom(legalActions, this.random);
    }
}
