export { UltimateTicTacToeEngine } from './ultimate-tic-tac-toe-engine.js';
export type { UltimateTicTacToeState, UltimateTicTacToeAction } from './ultimate-tic-tac-toe-engine.js';
