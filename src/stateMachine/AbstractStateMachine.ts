// src/stateMachine/AbstractStateMachine.ts

import type { ILogger, IProgressBar } from '../@types/index.js';

export interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
    progressBar?: IProgressBar;
}

export abstract class AbstractStateMachine<S, O extends IStateMachineOptions> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: Array<{ state: S; handler: () => Promise<void> | void }>;

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    get currentState(): S {
        return this.state;
    }

    /**
     * Executes the handlers in `stateTransitions` in order, entering each state
     * before its handler runs. On failure the machine moves to the error state
     * and the error is rethrown.
     *
     * @return Resolves once the completion state is reached.
     * @throws Whatever a handler threw, after the error state is entered.
     */
    async run(): Promise<void> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.bind(this)();
            }
            this.transitionTo(this.getCompletionState());
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            this.transitionTo(this.getErrorState(), failure);
            this.handleError(failure);
        }
    }

    /**
     * Moves to `nextState`. Entering the error state with an error logs it;
     * every other transition is logged in verbose mode and ticks the progress bar.
     *
     * @param nextState - State to enter.
     * @param error - Cause, when `nextState` is the error state.
     */
    protected transitionTo(nextState: S, error?: Error): void {
        const { logger } = this.options;
        if (nextState === this.getErrorState() && error) {
            logger.error(`Error occurred during "${String(this.state)}": ${error.message}`);
            this.state = nextState;
        } else {
            if (this.options.verbose) {
                logger.debug(`STATE :: Transitioning from state "${String(this.state)}" -> "${String(nextState)}"`);
            }
            this.options.progressBar?.increment({ state: nextState });
            this.state = nextState;
        }
    }

    /**
     * Stops the progress bar, if any, and rethrows.
     *
     * @param error - The failure that ended the run.
     */
    protected handleError(error: Error): never {
        this.options.progressBar?.stop();
        throw error;
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
