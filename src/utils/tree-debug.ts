import { MCTSChildNode, MCTSNode } from '../mcts-node.js';
import { calculateWinRate } from './mcts-node-utils.js';

export const printTree = <Action>(node: MCTSNode<Action>, depth: number = 0, prefix: string = ''): void => {
    const indent = '  '.repeat(depth);
    const winRate = calculateWinRate(node).toFixed(4);
    if (node.parent !== undefined) {
        console.log(`${indent}${prefix}action=${JSON.stringify(node.parentAction)}: visits=${node.visits}, wins=${node.wins}, rate=${winRate}, children=${node.children.size}, untried=${node.untriedActions.length}`);
    } else {
        console.log(`${indent}${prefix}ROOT: visits=${node.visits}, wins=${node.wins}, children=${node.children.size}, untried=${node.untriedActions.length}`);
    }

    let idx = 0;
    for (const child of node.children.values()) {
        printTree(child, depth + 1, `[${idx}] `);
        idx++;
    }
};

/**
 * Build the path from root to a given node, returning a readable string.
 * @param node - The node to trace back to root
 * @returns String like `{"board":4,"cell":0} → {"board":0,"cell":8}`
 */
export const getNodePath = <Action>(node: MCTSNode<Action>): string => {
    const pathNodes: MCTSChildNode<Action>[] = [];
    let current: MCTSNode<Action> = node;

    while (current.parent !== undefined) {
        pathNodes.unshift(current);
        current = current.parent;
    }

    return pathNodes.map(n => JSON.stringify(n.parentAction)).join(' → ');
};
