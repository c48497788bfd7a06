import { GameEngine, PlayerId } from '../game-engine.js';
import { MCTSContractError } from '../errors.js';

/**
 * Whether a finished game is a win for the given player.
 *
 * @throws MCTSContractError if the engine reports no outcome (game still in progress)
 */
export function isWin<State, Action>(engine: GameEngine<State, Action>, state: State, player: PlayerId): boolean {
    const outcome = engine.pointsValues(state);
    if (outcome === undefined) {
        throw new MCTSContractError('isWin was called on a non-terminal state');
    }
    return outcome[player] === 1;
}
