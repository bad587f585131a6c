import { Command, CommandContext, CommandOptions } from './Command.js';

/**
 * ClickCommand encapsulates a click on the element resolved by `locator`.
 */
export class ClickCommand implements Command {
    readonly type = 'click';

    constructor(
        readonly locator: string,
        private options: CommandOptions
    ) { }

    async execute(ctx: CommandContext): Promise<void> {
        await ctx.driver.click(this.locator, this.options.timeoutMs);
    }
}
