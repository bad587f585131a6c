import { Command, CommandContext, CommandOptions } from './Command.js';

/**
 * Moves the pointer over the element resolved by `locator`.
 */
export class HoverCommand implements Command {
    readonly type = 'hover';

    constructor(
        readonly locator: string,
        private options: CommandOptions
    ) { }

    async execute(ctx: CommandContext): Promise<void> {
        await ctx.driver.hover(this.locator, this.options.timeoutMs);
    }
}
