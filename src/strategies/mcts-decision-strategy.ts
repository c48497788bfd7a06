import { GameEngine } from '../game-engine.js';
import { MCTS } from '../modular/mcts.js';
import { MCTSConfig, DEFAULT_MCTS_CONFIG } from '../modular/mcts-config.js';
import { RandomSource } from '../utils/random.js';
import { DecisionStrategy } from './decision-strategy.js';

/**
 * MCTS Decision Strategy
 *
 * Uses Monte Carlo Tree Search to decide actions. Works with any game
 * that provides a GameEngine.
 *
 * A state with a single legal action is answered without searching.
 */
export class MCTSDecisionStrategy<State, Action> implements DecisionStrategy<State, Action> {
    private mcts: MCTS<State, Action>;

    constructor(
        private engine: GameEngine<State, Action>,
        private mctsConfig: MCTSConfig = DEFAULT_MCTS_CONFIG,
        random?: RandomSource,
    ) {
        this.mcts = new MCTS(engine, random);
    }

    getAction(state: State): Action | null {
        if (this.engine.isEnded(state)) {
            return null;
        }

        const legalActions = this.engine.legalActions(state);
        if (legalActions.length === 0) {
            return null;
        }

        if (legalActions.length === 1) {
            return legalActions[0];
        }

        return this.mcts.think(state, this.mctsConfig);
    }
}
