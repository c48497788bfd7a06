/**
 * Generic Decision Strategy Interface
 * Generic over State and Action types to work with any game.
 *
 * Any move-choosing policy (MCTS, Random, ...) implements this interface.
 * Strategies receive the full game state and return one of its legal actions.
 */
export interface DecisionStrategy<State, Action> {
    /**
     * Decide which action to take in the given state.
     *
     * @param state - Current game state, with this strategy's player to move
     * @returns A legal action, or null if the state offers none
     */
    getAction(state: State): Action | null;
}
