import { GameEngine, PointsValues } from '../../game-engine.js';
import { Mark, Player, findLineWinner, otherPlayer, outcomeFor } from '../tic-tac-toe/tic-tac-toe-engine.js';

/**
 * Nested tic-tac-toe: a 3x3 grid of 3x3 sub-boards.
 *
 * Sub-boards and their cells are both indexed 0-8, row by row.
 */
export type UltimateTicTacToeState = {
    /** Cells of each sub-board */
    readonly boards: readonly (readonly Mark[])[];

    /** Winner of each sub-board, 0 while undecided by three in a row */
    readonly owners: readonly Mark[];

    /** Sub-board the player to move is sent to, null for a free move */
    readonly nextBoard: number | null;

    readonly toMove: Player;
};

export type UltimateTicTacToeAction = {
    board: number;
    cell: number;
};

/**
 * Rules:
 * - The first move may go anywhere
 * - A move in cell c sends the opponent to sub-board c, unless that sub-board is
 *   decided (won or full), in which case the opponent may play in any undecided sub-board
 * - Three in a row wins a sub-board; three won sub-boards in a row win the game
 * - The game is drawn when every sub-board is decided without an overall winner
 *
 * Legal actions are ordered by sub-board, then cell.
 */
export class UltimateTicTacToeEngine implements GameEngine<UltimateTicTacToeState, UltimateTicTacToeAction> {
    createInitialState(): UltimateTicTacToeState {
        return {
            boards: Array.from({ length: 9 }, () => new Array<Mark>(9).fill(0)),
            owners: new Array<Mark>(9).fill(0),
            nextBoard: null,
            toMove: 1,
        };
    }

    winner(state: UltimateTicTacToeState): Mark {
        return findLineWinner(state.owners);
    }

    isBoardDecided(state: UltimateTicTacToeState, board: number): boolean {
        return state.owners[board] !== 0 || !state.boards[board].includes(0);
    }

    /**
     * Sub-boards the player to move may play in.
     */
    playableBoards(state: UltimateTicTacToeState): number[] {
        if (state.nextBoard !== null && !this.isBoardDecided(state, state.nextBoard)) {
            return [ state.nextBoard ];
        }

        const boards: number[] = [];
        for (let board = 0; board < 9; board++) {
            if (!this.isBoardDecided(state, board)) {
                boards.push(board);
            }
        }
        return boards;
    }

    legalActions(state: UltimateTicTacToeState): readonly UltimateTicTacToeAction[] {
        if (this.winner(state) !== 0) {
            return [];
        }

        const actions: UltimateTicTacToeAction[] = [];
        for (const board of this.playableBoards(state)) {
            state.boards[board].forEach((mark, cell) => {
                if (mark === 0) {
                    actions.push({ board, cell });
                }
            });
        }
        return actions;
    }

    nextState(state: UltimateTicTacToeState, action: UltimateTicTacToeAction): UltimateTicTacToeState {
        if (this.isEnded(state)) {
            throw new Error('Cannot play on a finished game');
        }
        if (!this.playableBoards(state).includes(action.board)) {
            throw new Error(`Sub-board ${action.board} is not playable`);
        }
        if (state.boards[action.board][action.cell] !== 0) {
            throw new Error(`Cell ${action.cell} of sub-board ${action.board} is not empty`);
        }

        const cells = [ ...state.boards[action.board] ];
        cells[action.cell] = state.toMove;

        const boards = [ ...state.boards ];
        boards[action.board] = cells;

        const owners = [ ...state.owners ];
        owners[action.board] = findLineWinner(cells);

        return {
            boards,
            owners,
            nextBoard: action.cell,
            toMove: otherPlayer(state.toMove),
        };
    }

    isEnded(state: UltimateTicTacToeState): boolean {
        if (this.winner(state) !== 0) {
            return true;
        }
        for (let board = 0; board < 9; board++) {
            if (!this.isBoardDecided(state, board)) {
                return false;
            }
        }
        return true;
    }

    currentPlayer(state: UltimateTicTacToeState): Player {
        return state.toMove;
    }

    pointsValues(state: UltimateTicTacToeState): PointsValues | undefined {
        if (!this.isEnded(state)) {
            return undefined;
        }
        return outcomeFor(this.winner(state));
    }
}
