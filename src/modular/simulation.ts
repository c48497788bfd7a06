import { GameEngine, PlayerId } from '../game-engine.js';
import { isWin } from '../utils/outcome-utils.js';
import { RandomSource, pickRandom } from '../utils/random.js';
import { DEFAULT_MCTS_CONFIG, MCTSConfig } from './mcts-config.js';

export type SimulationOptions = Pick<MCTSConfig, 'rolloutPolicy' | 'rolloutExplorationFactor' | 'lookaheadDepthCap'>;

/**
 * MCTS Simulation Phase Implementation
 *
 * Plays a position forward to a terminal state without touching the tree.
 *
 * SEMI-GREEDY POLICY (each cycle):
 * 1. If any legal move ends the game, play the first such move and stop
 * 2. Otherwise, with probability rolloutExplorationFactor play a uniform random move,
 *    else play the move with the lowest lookahead probe score
 * 3. Play one more uniform random move from the resulting position
 *
 * RANDOM POLICY:
 * Uniform random moves until the game ends.
 *
 * A position with no legal moves that the engine does not report as ended stops the
 * playout; the reward is then whatever outcome the engine reports for that state.
 */
export class MCTSSimulation<State, Action> {
    constructor(
        private engine: GameEngine<State, Action>,
    ) {}

    /**
     * @param state - The state to simulate from
     * @param searchingPlayer - The player whose wins the lookahead probe favours
     * @param random - Random stream driving move choice
     * @param options - Rollout policy and its tuning
     * @returns The final state of the playout
     */
    rollout(state: State, searchingPlayer: PlayerId, random: RandomSource, options: SimulationOptions = DEFAULT_MCTS_CONFIG): State {
        if (options.rolloutPolicy === 'random') {
            return this.randomRollout(state, random);
        }

        let currentState = state;

        while (!this.engine.isEnded(currentState)) {
            const actions = this.engine.legalActions(currentState);
            if (actions.length === 0) {
                break;
            }

            for (const action of actions) {
                const nextState = this.engine.nextState(currentState, action);
                if (this.engine.isEnded(nextState)) {
                    return nextState;
                }
            }

            const selectedAction = random() < options.rolloutExplorationFactor
                ? pickRandom(actions, random)
                : this.selectByLookahead(currentState, actions, searchingPlayer, random, options.lookaheadDepthCap);
            currentState = this.engine.nextState(currentState, selectedAction);

            const replies = this.engine.legalActions(currentState);
            if (replies.length === 0) {
                break;
            }
            currentState = this.engine.nextState(currentState, pickRandom(replies, random));
        }

        return currentState;
    }

    /**
     * Plays uniform random moves until the game ends.
     */
    randomRollout(state: State, random: RandomSource): State {
        let currentState = state;

        while (!this.engine.isEnded(currentState)) {
            const actions = this.engine.legalActions(currentState);
            if (actions.length === 0) {
                break;
            }
            currentState = this.engine.nextState(currentState, pickRandom(actions, random));
        }

        return currentState;
    }

    /**
     * Depth-limited random probe of an action. Lower is better for the searching player:
     * a win found at depth d scores -d; anything else (loss, draw, or reaching the depth
     * cap) scores d.
     *
     * @param state - State the action is played from
     * @param action - The action to probe
     * @param depth - Depth of the first application, normally 0
     * @param searchingPlayer - The player whose wins score negatively
     * @param random - Random stream choosing the probe's follow-up moves
     * @param depthCap - Depth at which the probe stops
     */
    testAction(state: State, action: Action, depth: number, searchingPlayer: PlayerId, random: RandomSource, depthCap: number = DEFAULT_MCTS_CONFIG.lookaheadDepthCap): number {
        let currentDepth = depth;
        let testState = this.engine.nextState(state, action);

        while (true) {
            const ended = this.engine.isEnded(testState);
            if (ended || currentDepth >= depthCap) {
                return ended && isWin(this.engine, testState, searchingPlayer) ? -currentDepth : currentDepth;
            }

            const actions = this.engine.legalActions(testState);
            if (actions.length === 0) {
                return currentDepth;
            }

            testState = this.engine.nextState(testState, pickRandom(actions, random));
            currentDepth++;
        }
    }

    /**
     * Picks the action with the lowest probe score; the first one wins ties.
     */
    private selectByLookahead(state: State, actions: readonly Action[], searchingPlayer: PlayerId, random: RandomSource, depthCap: number): Action {
        let bestAction = actions[0];
        let bestScore = Infinity;

        for (const action of actions) {
            const score = this.testAction(state, action, 0, searchingPlayer, random, depthCap);
            if (score < bestScore) {
                bestScore = score;
                bestAction = action;
            }
        }

        return bestAction;
    }
}
