import { InteractionAction } from '../../types/index.js';
import { PageDriver } from '../adapters/PageDriver.js';

/**
 * Context passed to all Commands during execution.
 */
export interface CommandContext {
    driver: PageDriver;
}

/**
 * Command interface for encapsulating page actions.
 * The simulator dispatches hover and click through it without branching on the action.
 */
export interface Command {
    readonly type: InteractionAction;

    /** Locator of the element the action targets */
    readonly locator: string;

    execute(ctx: CommandContext): Promise<void>;
}

export interface CommandOptions {
    timeoutMs: number;
}
