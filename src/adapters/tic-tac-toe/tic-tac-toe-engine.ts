import { GameEngine, PointsValues } from '../../game-engine.js';

/** 0 marks an empty cell; 1 and 2 are the players' marks */
export type Mark = 0 | 1 | 2;

export type Player = 1 | 2;

export type TicTacToeState = {
    readonly cells: readonly Mark[];
    readonly toMove: Player;
};

export type TicTacToeAction = {
    cell: number;
};

export const WIN_LINES: readonly (readonly [number, number, number])[] = [
    [ 0, 1, 2 ], [ 3, 4, 5 ], [ 6, 7, 8 ],
    [ 0, 3, 6 ], [ 1, 4, 7 ], [ 2, 5, 8 ],
    [ 0, 4, 8 ], [ 2, 4, 6 ],
];

/**
 * The mark holding three in a row on a 3x3 grid, or 0 if none does.
 */
export function findLineWinner(cells: readonly Mark[]): Mark {
    for (const [ a, b, c ] of WIN_LINES) {
        if (cells[a] !== 0 && cells[a] === cells[b] && cells[a] === cells[c]) {
            return cells[a];
        }
    }
    return 0;
}

export function otherPlayer(player: Player): Player {
    return player === 1 ? 2 : 1;
}

export function outcomeFor(winner: Mark): PointsValues {
    if (winner === 0) {
        return { 1: 0, 2: 0 };
    }
    return { [winner]: 1, [otherPlayer(winner)]: -1 };
}

const MARK_SYMBOLS: Readonly<Record<string, Mark>> = { '.': 0, 'X': 1, 'O': 2 };

/**
 * Standard 3x3 tic-tac-toe. Player 1 (X) moves first.
 */
export class TicTacToeEngine implements GameEngine<TicTacToeState, TicTacToeAction> {
    createInitialState(): TicTacToeState {
        return { cells: new Array<Mark>(9).fill(0), toMove: 1 };
    }

    /**
     * Builds a position from three rows of `X`, `O` and `.`, e.g. `[ 'XO.', '.X.', '..O' ]`.
     * The player to move follows from the mark counts.
     */
    fromRows(rows: readonly string[]): TicTacToeState {
        const text = rows.join('');
        if (text.length !== 9) {
            throw new Error(`Expected 9 cells, got ${text.length}`);
        }

        const cells = [ ...text ].map(symbol => {
            const mark = MARK_SYMBOLS[symbol];
            if (mark === undefined) {
                throw new Error(`Unknown cell symbol '${symbol}'`);
            }
            return mark;
        });

        const xCount = cells.filter(mark => mark === 1).length;
        const oCount = cells.filter(mark => mark === 2).length;
        return { cells, toMove: xCount === oCount ? 1 : 2 };
    }

    winner(state: TicTacToeState): Mark {
        return findLineWinner(state.cells);
    }

    legalActions(state: TicTacToeState): readonly TicTacToeAction[] {
        if (this.isEnded(state)) {
            return [];
        }

        const actions: TicTacToeAction[] = [];
        state.cells.forEach((mark, cell) => {
            if (mark === 0) {
                actions.push({ cell });
            }
        });
        return actions;
    }

    nextState(state: TicTacToeState, action: TicTacToeAction): TicTacToeState {
        if (this.isEnded(state)) {
            throw new Error('Cannot play on a finished game');
        }
        if (state.cells[action.cell] !== 0) {
            throw new Error(`Cell ${action.cell} is not empty`);
        }

        const cells = [ ...state.cells ];
        cells[action.cell] = state.toMove;
        return { cells, toMove: otherPlayer(state.toMove) };
    }

    isEnded(state: TicTacToeState): boolean {
        return this.winner(state) !== 0 || !state.cells.includes(0);
    }

    currentPlayer(state: TicTacToeState): Player {
        return state.toMove;
    }

    pointsValues(state: TicTacToeState): PointsValues | undefined {
        if (!this.isEnded(state)) {
            return undefined;
        }
        return outcomeFor(this.winner(state));
    }
}
