import { MCTSChildNode, MCTSNode, MCTSRoot } from '../mcts-node.js';

export const DEFAULT_EXPLORATION_CONSTANT = 2.0;

/**
 * Structural identity of an action, used as the key of a node's children.
 * Object keys are sorted, so `{ board, cell }` and `{ cell, board }` share a key.
 */
export function actionKey<Action>(action: Action): string {
    return JSON.stringify(action, (_key, value: unknown) => {
        if (value === null || typeof value !== 'object' || Array.isArray(value)) {
            return value;
        }
        return Object.fromEntries(Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
    });
}

export function createRootNode<Action>(legalActions: readonly Action[]): MCTSRoot<Action> {
    return {
        visits: 0,
        wins: 0,
        parent: undefined,
        parentAction: undefined,
        untriedActions: [ ...legalActions ],
        children: new Map(),
    };
}

export function createChildNode<Action>(parent: MCTSNode<Action>, action: Action, legalActions: readonly Action[]): MCTSChildNode<Action> {
    return {
        visits: 0,
        wins: 0,
        parent,
        parentAction: action,
        untriedActions: [ ...legalActions ],
        children: new Map(),
    };
}

export function isFullyExpanded<Action>(node: MCTSNode<Action>): boolean {
    return node.untriedActions.length === 0 && node.children.size > 0;
}

export function calculateWinRate<Action>(node: MCTSNode<Action>): number {
    return node.visits > 0 ? node.wins / node.visits : 0;
}

/**
 * Calculates the UCB score for a node from the searching player's perspective.
 * UCB = wins / visits + C * sqrt(ln(parent_visits) / visits)
 *
 * Unvisited nodes return Infinity so they are selected first, whoever is to move.
 * When the opponent is choosing, the score is mirrored as 1 - UCB so that taking
 * the maximum favours the opponent's best reply.
 *
 * @param node - The node to score
 * @param isOpponent - Whether the player choosing among the node and its siblings is the opponent
 * @param explorationConstant - Weight of the exploration term
 */
export function getUCBScore<Action>(node: MCTSChildNode<Action>, isOpponent: boolean, explorationConstant: number = DEFAULT_EXPLORATION_CONSTANT): number {
    if (node.visits === 0) {
        return Infinity;
    }

    const exploitation = node.wins / node.visits;
    const exploration = explorationConstant * Math.sqrt(Math.log(node.parent.visits) / node.visits);
    const score = exploitation + exploration;

    return isOpponent ? 1 - score : score;
}
