import { GameEngine, PointsValues } from '../../src/game-engine.js';
import { Mark, outcomeFor } from '../../src/adapters/tic-tac-toe/tic-tac-toe-engine.js';

/**
 * A game declared as an explicit tree. Leaves carry the winner (0 for a draw);
 * a branch with no children is a dead end the engine does not report as ended.
 */
export type TreeSpec = { winner: Mark } | { children: TreeSpec[] };

export type TreePath = readonly number[];

export const leaf = (winner: Mark): TreeSpec => ({ winner });

export const branch = (...children: TreeSpec[]): TreeSpec => ({ children });

/**
 * A straight line of single-child branches `length` moves long ending in a leaf.
 */
export const chain = (length: number, winner: Mark): TreeSpec => {
    let node = leaf(winner);
    for (let i = 0; i < length; i++) {
        node = branch(node);
    }
    return node;
};

/**
 * Game engine over a TreeSpec. States are the paths of child indices taken from the root;
 * player 1 moves at even depths and player 2 at odd depths.
 */
export class TreeGameEngine implements GameEngine<TreePath, number> {
    constructor(private tree: TreeSpec) {}

    private nodeAt(path: TreePath): TreeSpec {
        let node = this.tree;
        for (const index of path) {
            if (!('children' in node) || index >= node.children.length) {
                throw new Error(`Invalid path ${JSON.stringify(path)}`);
            }
            node = node.children[index];
        }
        return node;
    }

    legalActions(path: TreePath): readonly number[] {
        const node = this.nodeAt(path);
        return 'children' in node ? node.children.map((_, index) => index) : [];
    }

    nextState(path: TreePath, action: number): TreePath {
        const next = [ ...path, action ];
        this.nodeAt(next);
        return next;
    }

    isEnded(path: TreePath): boolean {
        return 'winner' in this.nodeAt(path);
    }

    currentPlayer(path: TreePath): number {
        return path.length % 2 === 0 ? 1 : 2;
    }

    pointsValues(path: TreePath): PointsValues | undefined {
        const node = this.nodeAt(path);
        return 'winner' in node ? outcomeFor(node.winner) : undefined;
    }
}

/**
 * A game that never ends: the state counts moves, and two moves are always legal.
 */
export class EndlessCounterEngine implements GameEngine<number, number> {
    legalActions(): readonly number[] {
        return [ 0, 1 ];
    }

    nextState(state: number): number {
        return state + 1;
    }

    isEnded(): boolean {
        return false;
    }

    currentPlayer(state: number): number {
        return state % 2 === 0 ? 1 : 2;
    }

    pointsValues(): PointsValues | undefined {
        return undefined;
    }
}

/**
 * Depth-3, branching-2 tree with mixed outcomes.
 */
export const SMALL_BINARY_TREE: TreeSpec = branch(
    branch(
        branch(leaf(1), leaf(2)),
        branch(leaf(2), leaf(2)),
    ),
    branch(
        branch(leaf(1), leaf(0)),
        branch(leaf(2), leaf(1)),
    ),
);
