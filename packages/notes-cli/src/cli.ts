import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import {
  formatNoteLink,
  formatTagChoice,
  isNotesError,
  NotesError,
  NoteStore,
  parseNoteInput,
  type RenameResult,
} from '@notekeeper/core';

import { loadConfig, NOTES_DIR_ENV_VAR, type NotekeeperConfig } from './config';
import { createCliLogger, type OutputStream } from './logger';
import { createReadlinePrompter, type Prompter } from './prompt';

export const EXIT_OK = 0;
export const EXIT_UNKNOWN_ERROR = 1;
export const EXIT_USAGE = 2;
export const EXIT_CONFIG = 3;
export const EXIT_NOTE_ERROR = 4;

const VERSION = '0.1.0';

export const MISSING_CONFIG_MESSAGE =
  `Notes directory not configured. Pass --dir, set ${NOTES_DIR_ENV_VAR}, ` +
  'or create notekeeper.config.(json|yaml|yml).';

export interface RunNotesCliOptions {
  argv?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdout?: OutputStream;
  stderr?: OutputStream;
  prompter?: Prompter;
  clock?: () => Date;
}

type GlobalArgs = {
  dir?: string | undefined;
  json?: boolean | undefined;
  verbose?: boolean | undefined;
};

interface ExitError extends Error {
  exitCode: number;
}

/**
 * Parse `argv`, run one command against the configured notes directory and
 * resolve to the process exit code.
 */
export async function runNotesCli(options: RunNotesCliOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const prompter =
    options.prompter ?? createReadlinePrompter({ input: process.stdin, output: process.stderr });

  const notice = (message: string) => {
    stderr.write(`${message}\n`);
  };

  const print = (argv: GlobalArgs, value: unknown, lines: string[]) => {
    if (argv.json === true) {
      stdout.write(`${JSON.stringify(value, null, 2)}\n`);
      return;
    }
    for (const line of lines) {
      stdout.write(`${line}\n`);
    }
  };

  const printRename = (argv: GlobalArgs, result: RenameResult) => {
    if (!result.renamed) {
      notice(`Unchanged: ${result.from}`);
    }
    print(argv, result, [result.to]);
  };

  const openStore = (argv: GlobalArgs): NoteStore => {
    const config = resolveConfig({
      ...(argv.dir !== undefined ? { dir: argv.dir } : {}),
      cwd,
      env,
    });
    const logger = createCliLogger({ stream: stderr, verbose: argv.verbose === true });
    logger.debug?.(`[config] notes directory ${config.notesDir} (from ${config.source})`);
    return new NoteStore({
      notesDir: config.notesDir,
      logger,
      cwd,
      ...(options.clock ? { clock: options.clock } : {}),
    });
  };

  try {
    const parser = yargs(options.argv ?? hideBin(process.argv))
      .scriptName('notekeeper')
      .version(VERSION)
      .usage('Usage: $0 <command> [options]')
      .option('dir', {
        alias: 'd',
        type: 'string',
        describe: `Notes directory (defaults to ${NOTES_DIR_ENV_VAR} or the config file).`,
      })
      .option('json', {
        type: 'boolean',
        default: false,
        describe: 'Output JSON',
      })
      .option('verbose', {
        alias: 'v',
        type: 'boolean',
        default: false,
        describe: 'Log each filesystem change to stderr',
      })
      .exitProcess(false)
      .fail((msg: string | undefined, err: Error | undefined) => {
        if (err) {
          throw err;
        }
        throwExitError(EXIT_USAGE, msg ?? 'Invalid command usage. Run with --help for usage.');
      });

    parser
      .command(
        'find [query..]',
        'List notes whose filename contains every query term.',
        (args) => args.positional('query', { type: 'string', array: true }),
        async (argv) => {
          const store = openStore(argv);
          const notes = await store.findNotes((argv.query ?? []).join(' '));
          print(argv, notes, notes.map((note) => note.filename));
        },
      )
      .command(
        'new <input..>',
        'Create a note from "title, tag, tag".',
        (args) =>
          args
            .positional('input', { type: 'string', array: true, demandOption: true })
            .option('tag', {
              alias: 't',
              type: 'string',
              array: true,
              describe: 'Additional tag (repeatable).',
            })
            .option('content', {
              type: 'string',
              describe: 'Initial note content.',
            }),
        async (argv) => {
          const store = openStore(argv);
          const { title, tags } = parseNoteInput(argv.input.join(' '));
          const note = await store.createNote({
            title,
            tags: [...tags, ...(argv.tag ?? [])],
            ...(argv.content !== undefined ? { content: argv.content } : {}),
          });
          print(argv, note, [store.filePath(note.filename)]);
        },
      )
      .command(
        'link <note>',
        'Print a Markdown link to a note.',
        (args) => args.positional('note', { type: 'string', demandOption: true }),
        async (argv) => {
          const store = openStore(argv);
          const filename = store.resolveNoteFilename(argv.note);
          const link = formatNoteLink(filename);
          if (!link) {
            throw new NotesError('not_a_note', `Not in a note file: ${argv.note}`);
          }
          print(argv, { filename, link }, [link]);
        },
      )
      .command(
        'retitle <note> [title..]',
        'Rename a note, keeping its id and tags.',
        (args) =>
          args
            .positional('note', { type: 'string', demandOption: true })
            .positional('title', { type: 'string', array: true }),
        async (argv) => {
          const store = openStore(argv);
          const filename = store.resolveNoteFilename(argv.note);
          const title = argv.title?.join(' ').trim() || (await prompter.input('Enter a new title: '));
          if (!title) {
            notice('No title entered');
            return;
          }
          printRename(argv, await store.retitle(filename, title));
        },
      )
      .command(
        'search <query..>',
        'Search note contents.',
        (args) =>
          args
            .positional('query', { type: 'string', array: true, demandOption: true })
            .option('limit', {
              type: 'number',
              describe: 'Maximum number of matching lines.',
            }),
        async (argv) => {
          const store = openStore(argv);
          const hits = await store.search(argv.query.join(' '), {
            ...(argv.limit !== undefined ? { limit: argv.limit } : {}),
          });
          print(argv, hits, hits.map((hit) => `${hit.filename}:${hit.line}: ${hit.text}`));
        },
      )
      .command(
        'toggle-tag <note> [tag]',
        'Add a tag to a note, or remove it if already set.',
        (args) =>
          args
            .positional('note', { type: 'string', demandOption: true })
            .positional('tag', { type: 'string' }),
        async (argv) => {
          const store = openStore(argv);
          const filename = store.resolveNoteFilename(argv.note);

          let tag = argv.tag;
          if (tag === undefined) {
            const choices = await store.tagChoices(filename);
            if (choices.length === 0) {
              notice('No tags to choose from');
              return;
            }
            const selected = await prompter.select(choices, {
              prompt: 'Select a tag to toggle',
              format: formatTagChoice,
            });
            if (!selected) {
              notice('No tag selected');
              return;
            }
            tag = selected.tag;
          }

          printRename(argv, await store.toggleTag(filename, tag));
        },
      )
      .command(
        'tags',
        'List every tag used in the notes directory.',
        (args) => args,
        async (argv) => {
          const store = openStore(argv);
          const tags = await store.collectTags();
          print(argv, tags, tags);
        },
      );

    parser.demandCommand(1, 'You must specify a command').strict().help();

    await parser.parseAsync();
    return EXIT_OK;
  } catch (error: unknown) {
    return handleCliError(error, stderr);
  }
}

function resolveConfig(options: {
  dir?: string;
  cwd: string;
  env: NodeJS.ProcessEnv;
}): NotekeeperConfig {
  let config: NotekeeperConfig | undefined;
  try {
    config = loadConfig(options);
  } catch (err) {
    throwExitError(EXIT_CONFIG, err instanceof Error ? err.message : String(err));
  }
  if (!config) {
    throwExitError(EXIT_CONFIG, MISSING_CONFIG_MESSAGE);
  }
  return config;
}

function throwExitError(code: number, message: string): never {
  const error = new Error(message) as ExitError;
  error.exitCode = code;
  throw error;
}

function handleCliError(error: unknown, stderr: OutputStream): number {
  if (isExitError(error)) {
    stderr.write(`${error.message}\n`);
    return error.exitCode;
  }

  if (isNotesError(error)) {
    stderr.write(`Warning: ${error.message}\n`);
    return EXIT_NOTE_ERROR;
  }

  const message = error instanceof Error ? error.message : String(error);
  stderr.write(`Unexpected error: ${message}\n`);
  return EXIT_UNKNOWN_ERROR;
}

function isExitError(error: unknown): error is ExitError {
  return (
    typeof error === 'object' && error !== null && typeof (error as ExitError).exitCode === 'number'
  );
}
