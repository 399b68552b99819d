export { runNotesCli, EXIT_CONFIG, EXIT_NOTE_ERROR, EXIT_OK, EXIT_USAGE } from './cli';
export type { RunNotesCliOptions } from './cli';
export { loadConfig, NOTES_DIR_ENV_VAR } from './config';
export type { NotekeeperConfig } from './config';
export { createCliLogger } from './logger';
export { createReadlinePrompter } from './prompt';
export type { Prompter, SelectOptions } from './prompt';
