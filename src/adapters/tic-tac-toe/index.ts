export { TicTacToeEngine, WIN_LINES, findLineWinner, otherPlayer, outcomeFor } from './tic-tac-toe-engine.js';
export type { Mark, Player, TicTacToeState, TicTacToeAction } from './tic-tac-toe-engine.js';
