import { expect } from 'chai';
import { GameEngine } from '../../src/game-engine.js';
import { IllegalMoveError } from '../../src/errors.js';
import { FAST_MCTS_CONFIG } from '../../src/modular/mcts-config.js';
import { MCTSDecisionStrategy } from '../../src/strategies/mcts-decision-strategy.js';
import { RandomDecisionStrategy } from '../../src/strategies/random-decision-strategy.js';
import { DecisionStrategy } from '../../src/strategies/decision-strategy.js';
import { TicTacToeAction, TicTacToeEngine, TicTacToeState } from '../../src/adapters/tic-tac-toe/tic-tac-toe-engine.js';
import { UltimateTicTacToeAction, UltimateTicTacToeEngine, UltimateTicTacToeState } from '../../src/adapters/ultimate-tic-tac-toe/ultimate-tic-tac-toe-engine.js';
import { MatchResult, playMatch } from '../../src/utils/match-runner.js';
import { actionKey } from '../../src/utils/mcts-node-utils.js';
import { createSeededRandom } from '../../src/utils/random.js';

/**
 * Replays a finished match and checks every move against the engine.
 */
function validateMatch<State, Action>(engine: GameEngine<State, Action>, initialState: State, result: MatchResult<State, Action>): void {
    let state = initialState;
    for (const move of result.moves) {
        expect(engine.currentPlayer(state)).to.equal(move.player);
        expect(engine.legalActions(state).map(actionKey)).to.include(actionKey(move.action));
        state = engine.nextState(state, move.action);
    }
    expect(actionKey(state)).to.equal(actionKey(result.finalState));
}

describe('Full game completion', () => {
    it('should play tic-tac-toe to the end with MCTS against random', function() {
        this.timeout(15000);
        const engine = new TicTacToeEngine();
        const initialState = engine.createInitialState();

        const result = playMatch(engine, initialState, {
            1: new MCTSDecisionStrategy(engine, { ...FAST_MCTS_CONFIG, iterations: 200 }, createSeededRandom(1)),
            2: new RandomDecisionStrategy(engine, createSeededRandom(2)),
        });

        expect(result.completed).to.equal(true);
        expect(result.outcome).to.not.equal(undefined);
        expect(result.moves.length).to.be.within(5, 9);
        validateMatch(engine, initialState, result);
    });

    it('should play nested tic-tac-toe to the end with MCTS against random', function() {
        this.timeout(120000);
        const engine = new UltimateTicTacToeEngine();
        const initialState = engine.createInitialState();

        const result = playMatch(engine, initialState, {
            1: new RandomDecisionStrategy(engine, createSeededRandom(3)),
            2: new MCTSDecisionStrategy(engine, { ...FAST_MCTS_CONFIG, iterations: 10 }, createSeededRandom(4)),
        });

        expect(result.completed).to.equal(true);
        expect(engine.isEnded(result.finalState)).to.equal(true);
        expect(result.outcome).to.deep.equal(engine.pointsValues(result.finalState));
        validateMatch(engine, initialState, result);
    });

    it('should stop at the ply limit and report the game as incomplete', () => {
        const engine = new TicTacToeEngine();

        const result = playMatch(engine, engine.createInitialState(), {
            1: new RandomDecisionStrategy(engine, createSeededRandom(5)),
            2: new RandomDecisionStrategy(engine, createSeededRandom(6)),
        }, 3);

        expect(result.moves).to.have.length(3);
        expect(result.completed).to.equal(false);
        expect(result.outcome).to.equal(undefined);
    });

    it('should reject a strategy that plays an occupied cell', () => {
        const engine = new TicTacToeEngine();
        const cheater: DecisionStrategy<TicTacToeState, TicTacToeAction> = {
            getAction: () => ({ cell: 0 }),
        };

        expect(() => playMatch(engine, engine.createInitialState(), { 1: cheater, 2: cheater })).to.throw(IllegalMoveError);
    });

    it('should accept a legal move whose properties are listed in a different order', () => {
        const engine = new UltimateTicTacToeEngine();
        const reordered: DecisionStrategy<UltimateTicTacToeState, UltimateTicTacToeAction> = {
            getAction: () => ({ cell: 4, board: 0 }),
        };

        const result = playMatch(engine, engine.createInitialState(), { 1: reordered, 2: reordered }, 1);

        expect(result.moves).to.deep.equal([ { player: 1, action: { cell: 4, board: 0 } } ]);
        expect(result.finalState.boards[0][4]).to.equal(1);
    });

    it('should require a strategy for every player to move', () => {
        const engine = new TicTacToeEngine();

        expect(() => playMatch(engine, engine.createInitialState(), {
            1: new RandomDecisionStrategy(engine, createSeededRandom(7)),
        })).to.throw('No strategy registered for player 2');
    });
});
