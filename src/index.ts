/*
 * Main entry point for mcts-board-ai package
 * Re-exports all public APIs
 */

export type { GameEngine, PlayerId, PointsValues } from './game-engine.js';
export type { MCTSNode, MCTSRoot, MCTSChildNode } from './mcts-node.js';
export * from './errors.js';
export * from './modular/index.js';
export * from './strategies/index.js';
export * from './adapters/tic-tac-toe/index.js';
export * from './adapters/ultimate-tic-tac-toe/index.js';
export { playMatch } from './utils/match-runner.js';
export type { MatchMove, MatchResult } from './utils/match-runner.js';
export { createSeededRandom } from './utils/random.js';
export type { RandomSource } from './utils/random.js';
export { getUCBScore, calculateWinRate, actionKey } from './utils/mcts-node-utils.js';
export { printTree, getNodePath } from './utils/tree-debug.js';
