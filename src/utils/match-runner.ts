import { GameEngine, PlayerId, PointsValues } from '../game-engine.js';
import { IllegalMoveError } from '../errors.js';
import type { DecisionStrategy } from '../strategies/decision-strategy.js';
import { actionKey } from './mcts-node-utils.js';

export type MatchMove<Action> = {
    player: PlayerId;
    action: Action;
};

export type MatchResult<State, Action> = {
    finalState: State;
    moves: MatchMove<Action>[];
    /** Outcome reported by the engine, undefined if the ply limit was reached first */
    outcome: PointsValues | undefined;
    completed: boolean;
};

/**
 * Plays a game to completion, asking the strategy of the player to move for each action.
 *
 * PRECONDITION:
 * - strategies has an entry for every player the engine may report as current
 *
 * POSTCONDITION:
 * - Every recorded move was legal in the state it was played from
 * - completed is true iff the engine reports the final state as ended
 *
 * @param engine - Rules of the game
 * @param initialState - Position to start from
 * @param strategies - One strategy per player
 * @param maxPlies - Safety limit on the number of moves played
 * @throws IllegalMoveError if a strategy answers with a move not in legalActions
 */
export function playMatch<State, Action>(
    engine: GameEngine<State, Action>,
    initialState: State,
    strategies: Readonly<Record<PlayerId, DecisionStrategy<State, Action>>>,
    maxPlies: number = 1000,
): MatchResult<State, Action> {
    let state = initialState;
    const moves: MatchMove<Action>[] = [];

    while (!engine.isEnded(state) && moves.length < maxPlies) {
        const player = engine.currentPlayer(state);
        const strategy = strategies[player];
        if (!strategy) {
            throw new Error(`No strategy registered for player ${player}`);
        }

        const action = strategy.getAction(state);
        if (action === null) {
            break;
        }

        const key = actionKey(action);
        if (!engine.legalActions(state).some(legal => actionKey(legal) === key)) {
            throw new IllegalMoveError(player, action);
        }

        if (process.env.LOG_MATCH_MOVES === 'true') {
            console.log(`[MATCH] ply ${moves.length + 1}: P${player} ${key}`);
        }

        moves.push({ player, action });
        state = engine.nextState(state, action);
    }

    const completed = engine.isEnded(state);
    return {
        finalState: state,
        moves,
        outcome: completed ? engine.pointsValues(state) : undefined,
        completed,
    };
}
