import { GameEngine } from '../game-engine.js';
import { MCTSNode } from '../mcts-node.js';
import { actionKey, createChildNode } from '../utils/mcts-node-utils.js';

/**
 * MCTS Expansion Phase Implementation
 *
 * Adds one child to the selected node for its first untried action.
 * Untried actions are consumed in the engine's order, so expansion order is
 * reproducible for a given engine.
 */
export class MCTSExpansion<State, Action> {
    constructor(
        private engine: GameEngine<State, Action>,
    ) {}

    /**
     * Expands a node by adding a child for the next untried action.
     *
     * POSTCONDITION:
     * - Returns the new child and the state reached by its action
     * - Or the input node and state unchanged when nothing is left to try
     *   (fully expanded or terminal)
     *
     * @param node - The node to expand (can be root or leaf)
     * @param state - Game state at that node
     */
    expand(node: MCTSNode<Action>, state: State): { node: MCTSNode<Action>, state: State } {
        const action = node.untriedActions.shift();
        if (action === undefined) {
            return { node, state };
        }

        const newState = this.engine.nextState(state, action);
        const newNode = createChildNode(node, action, this.engine.legalActions(newState));

        node.children.set(actionKey(action), newNode);

        return { node: newNode, state: newState };
    }
}
