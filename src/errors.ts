/**
 * Raised when a game engine is asked for something its contract does not define,
 * such as the outcome of a game that has not ended.
 */
export class MCTSContractError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MCTSContractError';
    }
}

/**
 * Raised when the search is started from a state it cannot decide a move for.
 */
export class MCTSPreconditionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MCTSPreconditionError';
    }
}

/**
 * Raised when a finished search has no visited root child to choose from.
 */
export class NoDecidableActionError extends Error {
    constructor(
        public readonly iterations: number,
        public readonly legalActionCount: number,
    ) {
        super(`No decidable action after ${iterations} iterations (${legalActionCount} legal actions at root)`);
        this.name = 'NoDecidableActionError';
    }
}

/**
 * Raised by the match runner when a strategy answers with a move the engine does not allow.
 */
export class IllegalMoveError extends Error {
    constructor(
        public readonly player: number,
        public readonly action: unknown,
    ) {
        super(`Player ${player} chose illegal action ${JSON.stringify(action)}`);
        this.name = 'IllegalMoveError';
    }
}
