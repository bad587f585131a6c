export type { Command, CommandContext, CommandOptions } from './Command.js';
export { HoverCommand } from './HoverCommand.js';
export { ClickCommand } from './ClickCommand.js';
