import type { CommandModule } from 'yargs';

/**
 * A CLI command. Each file in this directory default-exports one.
 */
export type Command<T = object> = CommandModule<object, T>;
