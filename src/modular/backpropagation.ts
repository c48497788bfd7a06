import { MCTSNode } from '../mcts-node.js';

/**
 * MCTS Backpropagation Phase Implementation
 *
 * Walks the parent chain from the simulated node to the root, recording the
 * playout's outcome on every node along the path.
 *
 * STATISTICS UPDATED:
 * - visits: incremented on every node on the path, root included
 * - wins: incremented on the same nodes when the searching player won the playout
 *
 * Wins are always counted for the searching player; selection mirrors scores on the
 * opponent's turns instead of flipping rewards here.
 */
export class MCTSBackpropagation<Action> {
    /**
     * @param node - The node where simulation started (typically a newly expanded node)
     * @param won - Whether the playout ended in a win for the searching player
     */
    backpropagate(node: MCTSNode<Action>, won: boolean): void {
        let current: MCTSNode<Action> | undefined = node;

        while (current !== undefined) {
            current.visits++;
            if (won) {
                current.wins++;
            }
            current = current.parent;
        }
    }
}
