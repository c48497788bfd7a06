import { GameEngine, PlayerId } from '../game-engine.js';
import { MCTSPreconditionError, NoDecidableActionError } from '../errors.js';
import { MCTSNode, MCTSRoot } from '../mcts-node.js';
import { calculateWinRate, createRootNode } from '../utils/mcts-node-utils.js';
import { isWin } from '../utils/outcome-utils.js';
import { RandomSource, createSeededRandom } from '../utils/random.js';
import { printTree } from '../utils/tree-debug.js';
import { MCTSBackpropagation } from './backpropagation.js';
import { MCTSSimulation } from './simulation.js';
import { MCTSExpansion } from './expansion.js';
import { MCTSSelection } from './selection.js';
import { MCTSConfig, DEFAULT_MCTS_CONFIG } from './mcts-config.js';

export type ActionScore<Action> = {
    action: Action;
    winRate: number;
    visits: number;
    wins: number;
};

/**
 * Monte Carlo Tree Search controller.
 *
 * Each search builds a fresh tree rooted at the given state, runs the configured number
 * of select/expand/simulate/backpropagate iterations, and discards the tree once the
 * decision is made. Nothing but the random stream carries over between calls.
 */
export class MCTS<State, Action> {
    private selection: MCTSSelection<State, Action>;

    private expansion: MCTSExpansion<State, Action>;

    private simulation: MCTSSimulation<State, Action>;

    private backpropagation: MCTSBackpropagation<Action>;

    constructor(
        public engine: GameEngine<State, Action>,
        private random: RandomSource = Math.random,
    ) {
        this.selection = new MCTSSelection(engine);
        this.expansion = new MCTSExpansion(engine);
        this.simulation = new MCTSSimulation(engine);
        this.backpropagation = new MCTSBackpropagation();
    }

    /**
     * Chooses the move for the player to act in the given state.
     *
     * @throws MCTSPreconditionError if the state is already terminal
     * @throws NoDecidableActionError if no root child was visited (e.g. zero iterations)
     */
    think(state: State, config: MCTSConfig = DEFAULT_MCTS_CONFIG): Action {
        const root = this.search(state, config);
        const action = this.selectBestAction(root);

        if (action === undefined) {
            throw new NoDecidableActionError(root.visits, root.children.size + root.untriedActions.length);
        }

        if (process.env.LOG_MCTS_SCORES === 'true') {
            console.log(`[MCTS] Action chosen: ${JSON.stringify(action)}`);
        }

        return action;
    }

    /**
     * Runs a search and returns every expanded root action with its statistics,
     * best win rate first.
     */
    getActions(state: State, config: MCTSConfig = DEFAULT_MCTS_CONFIG): ActionScore<Action>[] {
        const root = this.search(state, config);
        return this.getAllActionsWithScores(root);
    }

    /**
     * Runs a search and returns the finished tree.
     *
     * @throws MCTSPreconditionError if the state is already terminal
     * @throws NoDecidableActionError if the engine offers no move from a non-terminal state
     */
    search(state: State, config: MCTSConfig = DEFAULT_MCTS_CONFIG): MCTSRoot<Action> {
        if (this.engine.isEnded(state)) {
            throw new MCTSPreconditionError('Cannot search from a terminal state');
        }

        const legalActions = this.engine.legalActions(state);
        if (legalActions.length === 0) {
            throw new NoDecidableActionError(0, 0);
        }

        const searchingPlayer = this.engine.currentPlayer(state);
        const random = config.seed === undefined ? this.random : createSeededRandom(config.seed);
        const root = createRootNode(legalActions);

        const startTime = Date.now();
        for (let i = 0; i < config.iterations; i++) {
            if (config.timeLimitMs !== undefined && Date.now() - startTime >= config.timeLimitMs) {
                break;
            }
            this.runSingleIteration(root, state, searchingPlayer, config, random);
        }

        if (process.env.DEBUG_TREE === 'true') {
            console.log('\n[TREE-STRUCTURE] Final MCTS tree:');
            printTree(root);
        }

        if (process.env.LOG_MCTS_SCORES === 'true') {
            this.logScores(root);
        }

        return root;
    }

    private runSingleIteration(root: MCTSRoot<Action>, rootState: State, searchingPlayer: PlayerId, config: MCTSConfig, random: RandomSource): void {
        // SELECTION: descend while the node is fully expanded and non-terminal
        const { node: selectedNode, state: selectedState } = this.selection.select(root, rootState, searchingPlayer, config.explorationConstant);

        // EXPANSION: no-op when the selected node is terminal
        const { node: expandedNode, state: expandedState } = this.expansion.expand(selectedNode, selectedState);

        // SIMULATION
        const finalState = this.simulation.rollout(expandedState, searchingPlayer, random, config);

        // BACKPROPAGATION
        const won = isWin(this.engine, finalState, searchingPlayer);
        this.backpropagation.backpropagate(expandedNode, won);
    }

    /**
     * Highest win rate among visited root children; the first one wins ties.
     */
    private selectBestAction(root: MCTSNode<Action>): Action | undefined {
        let bestAction: Action | undefined;
        let bestWinRate = -1;

        for (const child of root.children.values()) {
            if (child.visits > 0) {
                const winRate = child.wins / child.visits;
                if (winRate > bestWinRate) {
                    bestAction = child.parentAction;
                    bestWinRate = winRate;
                }
            }
        }

        return bestAction;
    }

    private getAllActionsWithScores(root: MCTSRoot<Action>): ActionScore<Action>[] {
        const result = [ ...root.children.values() ].map(child => ({
            action: child.parentAction,
            winRate: calculateWinRate(child),
            visits: child.visits,
            wins: child.wins,
        }));

        return result.sort((a, b) => b.winRate - a.winRate);
    }

    private logScores(root: MCTSRoot<Action>): void {
        const actions = this.getAllActionsWithScores(root);
        console.log(`[MCTS] ${actions.length} actions evaluated over ${root.visits} iterations:`);
        actions.slice(0, 5).forEach((a, i) => {
            console.log(`  ${i + 1}. ${JSON.stringify(a.action)} | rate=${a.winRate.toFixed(4)} | visits=${a.visits}`);
        });
    }
}
