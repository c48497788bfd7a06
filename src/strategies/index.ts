export type { DecisionStrategy } from './decision-strategy.js';
export { MCTSDecisionStrategy } from './mcts-decision-strategy.js';
export { RandomDecisionStrategy } from './random-decision-strategy.js';
