import { GameEngine, PlayerId } from '../game-engine.js';
import { MCTSChildNode, MCTSNode } from '../mcts-node.js';
import { getUCBScore, isFullyExpanded, DEFAULT_EXPLORATION_CONSTANT } from '../utils/mcts-node-utils.js';

/**
 * MCTS Selection Phase Implementation
 *
 * Traverses the tree from the root using the UCB selection policy until it reaches
 * a node that can be expanded, a leaf, or a terminal position.
 *
 * PERSPECTIVE:
 * Node statistics always count wins for the searching player. When the player to move
 * is the opponent, UCB scores are mirrored (1 - UCB) so that taking the maximum picks
 * the reply that is worst for the searching player.
 *
 * TERMINATION:
 * Descent continues only while the current node has children, has no untried actions,
 * and its position is not terminal.
 */
export class MCTSSelection<State, Action> {
    constructor(
        private engine: GameEngine<State, Action>,
    ) {}

    /**
     * Selects the node the next expansion should start from.
     *
     * @param root - The root node of the search tree
     * @param rootState - The game state at the root
     * @param searchingPlayer - The player the search is deciding a move for
     * @param explorationConstant - Weight of the UCB exploration term
     * @returns The deepest node reached and the game state at that node
     */
    select(root: MCTSNode<Action>, rootState: State, searchingPlayer: PlayerId, explorationConstant: number = DEFAULT_EXPLORATION_CONSTANT): { node: MCTSNode<Action>, state: State } {
        let currentNode = root;
        let currentState = rootState;

        while (isFullyExpanded(currentNode) && !this.engine.isEnded(currentState)) {
            const isOpponent = this.engine.currentPlayer(currentState) !== searchingPlayer;
            const selectedChild = this.selectBestChild(currentNode, isOpponent, explorationConstant);

            currentState = this.engine.nextState(currentState, selectedChild.parentAction);
            currentNode = selectedChild;
        }

        return { node: currentNode, state: currentState };
    }

    /**
     * Selects the child with the highest UCB score. Equal scores go to the later child.
     */
    private selectBestChild(node: MCTSNode<Action>, isOpponent: boolean, explorationConstant: number): MCTSChildNode<Action> {
        let bestChild: MCTSChildNode<Action> | undefined;
        let bestScore = -Infinity;

        for (const child of node.children.values()) {
            const score = getUCBScore(child, isOpponent, explorationConstant);
            if (score >= bestScore) {
                bestScore = score;
                bestChild = child;
            }
        }

        if (!bestChild) {
            throw new Error('selectBestChild called on a node without children');
        }

        return bestChild;
    }
}
