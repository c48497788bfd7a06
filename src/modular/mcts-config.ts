/**
 * How the simulation phase plays a position out.
 * - semi-greedy: takes any immediately terminal move, otherwise mixes uniform random
 *   moves with a short lookahead probe, and adds a random reply every cycle
 * - random: uniform random moves until the game ends
 */
export type RolloutPolicy = 'semi-greedy' | 'random';

export interface MCTSConfig {
    /** Number of select/expand/simulate/backpropagate iterations */
    iterations: number;

    /** Weight of the exploration term in the UCB score */
    explorationConstant: number;

    /** Probability of a uniform random move (vs. the lookahead probe) in a semi-greedy rollout */
    rolloutExplorationFactor: number;

    /** Depth at which a lookahead probe stops */
    lookaheadDepthCap: number;

    rolloutPolicy: RolloutPolicy;

    /** Seeds a fresh random stream for each search; unseeded searches use the controller's source */
    seed?: number;

    /** Optional wall-clock budget; the search stops when either budget is spent */
    timeLimitMs?: number;
}

export const FAST_MCTS_CONFIG: MCTSConfig = {
    iterations: 100,
    explorationConstant: 2.0,
    rolloutExplorationFactor: 0.8,
    lookaheadDepthCap: 20,
    rolloutPolicy: 'semi-greedy',
};

export const THOROUGH_MCTS_CONFIG: MCTSConfig = {
    ...FAST_MCTS_CONFIG,
    iterations: 750,
};

export const DEFAULT_MCTS_CONFIG: MCTSConfig = THOROUGH_MCTS_CONFIG;
