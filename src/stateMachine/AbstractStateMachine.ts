// src/stateMachine/AbstractStateMachine.ts

import type { ILogger } from '../@types/index.ts';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
}

/**
 * A handler may return a state to end the run early in that state.
 */
type StateHandler<S> = () => Promise<S | void> | S | void;

export abstract class AbstractStateMachine<S, O extends IStateMachineOptions> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: Array<{ state: S; handler: StateHandler<S> }>;

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    get currentState(): S {
        return this.state;
    }

    /**
     * Executes the state transitions defined in `stateTransitions` in order.
     * A handler returning a state stops the run in that state; otherwise the machine
     * ends in the completion state. Errors move the machine to the error state and are rethrown.
     *
     * @return Resolves with the state the machine stopped in.
     */
    async run(): Promise<S> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                const terminal = await transition.handler.call(this);
                if (terminal !== undefined) {
                    this.transitionTo(terminal);
                    return this.state;
                }
            }
            this.transitionTo(this.getCompletionState());
            return this.state;
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            this.transitionTo(this.getErrorState(), failure);
            return this.handleError(failure);
        }
    }

    /**
     * Moves to the next state. Entering the error state with an error logs it;
     * any other transition is logged at debug level when verbose.
     *
     * @param nextState - The state to transition to.
     * @param error - Logged when `nextState` is the error state.
     */
    protected transitionTo(nextState: S, error?: Error): void {
        const { logger } = this.options;
        if (nextState === this.getErrorState() && error) {
            logger.error(`Error occurred during "${this.state}": ${error.message}`);
            this.state = this.getErrorState();
        } else {
            if (this.options.verbose) {
                logger.debug(`STATE :: Transitioning from state "${this.state}" -> "${nextState}"`);
            }
            this.state = nextState;
        }
    }

    /**
     * Re-throws the error that stopped the machine.
     */
    protected handleError(error: Error): never {
        throw error;
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
