export const CLI_COMMANDS = Symbol("CLI_COMMANDS");

export const CLI_LOGGER_SCOPE = "cli";

export const HELP_COMMAND = "help";

export const PROGRAM_NAME = "repokit";
