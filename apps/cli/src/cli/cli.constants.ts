export const CLI_COMMANDS = Symbol("CLI_COMMANDS");
