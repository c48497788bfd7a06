/**
 * Identity of one of the two fixed players. Engines in this package use 1 and 2.
 */
export type PlayerId = number;

/**
 * Outcome of a finished game, keyed by player. A value of 1 marks a win for that player.
 */
export type PointsValues = Readonly<Record<PlayerId, number>>;

/**
 * GameEngine encapsulates all game-specific rules the search depends on.
 * Generic over State and Action types to work with any deterministic,
 * perfect-information, two-player game.
 *
 * The search treats states as opaque values and never mutates them;
 * every transition must produce a new state.
 *
 * Actions must be plain data: the search identifies them structurally
 * (by JSON serialization with sorted object keys), not by reference.
 */
export interface GameEngine<State, Action> {
    /**
     * All legal moves from the given state.
     * Order is engine-defined but must be stable across calls for the same state.
     * Empty when the state is terminal.
     */
    legalActions(state: State): readonly Action[];

    /**
     * Applies an action and returns the resulting state. Must not mutate the input.
     */
    nextState(state: State, action: Action): State;

    isEnded(state: State): boolean;

    /**
     * The player to move at the given state.
     */
    currentPlayer(state: State): PlayerId;

    /**
     * Outcome of a terminal state, or undefined when the game is still in progress.
     */
    pointsValues(state: State): PointsValues | undefined;
}
