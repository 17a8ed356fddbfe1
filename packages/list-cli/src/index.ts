import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import type { Logger } from '@listsync/sync-core';
import {
  BookmarkRegistry,
  FsFileVersionStore,
  ListSyncEngine,
  LocalFileStorage,
  SnapshotStore,
  loadSyncConfig,
} from '@listsync/sync-core';

import type { CliContext, OutputFn } from './commands';
import {
  addCommand,
  bookmarksCommand,
  checkCommand,
  cleanupCommand,
  createCommand,
  deleteCommand,
  labelCommand,
  listsCommand,
  resolveCommand,
  restoreCommand,
  showCommand,
  statusCommand,
  syncCommand,
} from './commands';

export * from './commands';

const EXIT_OK = 0;
const EXIT_ERROR = 1;

export interface RunListCliOptions {
  argv?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  output?: OutputFn;
  errorOutput?: OutputFn;
  now?: () => Date;
}

function createCliLogger(errorOutput: OutputFn, verbose: boolean): Logger {
  const quiet = () => undefined;
  return {
    info: verbose ? errorOutput : quiet,
    warn: errorOutput,
    error: errorOutput,
    debug: verbose ? errorOutput : quiet,
  };
}

export function createCliContext(options: {
  cwd: string;
  env: NodeJS.ProcessEnv;
  output: OutputFn;
  logger: Logger;
  now: () => Date;
}): CliContext {
  const config = loadSyncConfig({ cwd: options.cwd, env: options.env });
  const storage = new LocalFileStorage();
  const versions = new FsFileVersionStore();
  const bookmarks = new BookmarkRegistry({ dataDir: config.dataDir, logger: options.logger });
  const engine = new ListSyncEngine({
    storage,
    versions,
    settings: {
      cacheTtlMs: config.cacheTtlMs,
      timestampToleranceMs: config.timestampToleranceMs,
      materializeTimeoutMs: config.materializeTimeoutMs,
      materializePollIntervalMs: config.materializePollIntervalMs,
      materializeMaxPollIntervalMs: config.materializeMaxPollIntervalMs,
    },
    bookmarks,
    snapshots: new SnapshotStore({ dataDir: config.dataDir, logger: options.logger }),
    logger: options.logger,
    now: options.now,
  });
  return {
    config,
    engine,
    bookmarks,
    versions,
    cwd: options.cwd,
    output: options.output,
    now: options.now,
  };
}

/**
 * Runs the `listsync` command line and returns the exit code. Failures are
 * written as `Error: <message>`.
 */
export async function runListCli(options: RunListCliOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const output = options.output ?? ((line: string) => process.stdout.write(`${line}\n`));
  const errorOutput =
    options.errorOutput ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = options.now ?? (() => new Date());

  let context: CliContext | undefined;
  const getContext = (verbose: boolean): CliContext => {
    if (!context) {
      const logger = createCliLogger(errorOutput, verbose);
      context = createCliContext({ cwd, env, output, logger, now });
    }
    return context;
  };

  try {
    await yargs(options.argv ?? hideBin(process.argv))
      .scriptName('listsync')
      .usage('Usage: $0 <command> [options]')
      .option('verbose', {
        type: 'boolean',
        default: false,
        describe: 'Log sync activity to stderr',
      })
      .command(
        'create <file>',
        'Create a list file (a bare id creates it in the private lists directory).',
        (args) =>
          args
            .positional('file', { type: 'string', demandOption: true })
            .option('name', { type: 'string', demandOption: true, describe: 'List name' })
            .option('icon', { type: 'string', describe: 'Icon name' })
            .option('presets', {
              type: 'boolean',
              default: false,
              describe: 'Start with the common grocery labels',
            }),
        async (argv) => {
          await createCommand(getContext(argv.verbose), {
            file: argv.file,
            name: argv.name,
            ...(argv.icon ? { icon: argv.icon } : {}),
            presets: argv.presets,
          });
        },
      )
      .command(
        'show <file>',
        'Print a list grouped by label.',
        (args) =>
          args
            .positional('file', { type: 'string', demandOption: true })
            .option('all', {
              type: 'boolean',
              default: false,
              describe: 'Include hidden labels and deleted items',
            })
            .option('json', { type: 'boolean', default: false, describe: 'Output JSON' }),
        async (argv) => {
          await showCommand(getContext(argv.verbose), {
            file: argv.file,
            all: argv.all,
            json: argv.json,
          });
        },
      )
      .command(
        'add <file> <note>',
        'Add an item.',
        (args) =>
          args
            .positional('file', { type: 'string', demandOption: true })
            .positional('note', { type: 'string', demandOption: true })
            .option('quantity', { type: 'number', describe: 'Item quantity (default 1)' })
            .option('label', { type: 'string', describe: 'Label name or id' }),
        async (argv) => {
          await addCommand(getContext(argv.verbose), {
            file: argv.file,
            note: argv.note,
            ...(argv.quantity !== undefined ? { quantity: argv.quantity } : {}),
            ...(argv.label ? { label: argv.label } : {}),
          });
        },
      )
      .command(
        'check <file> <itemId>',
        'Toggle the checked state of an item.',
        (args) =>
          args
            .positional('file', { type: 'string', demandOption: true })
            .positional('itemId', { type: 'string', demandOption: true }),
        async (argv) => {
          await checkCommand(getContext(argv.verbose), { file: argv.file, itemId: argv.itemId });
        },
      )
      .command(
        'delete <file> <itemId>',
        'Move an item to the recently deleted section.',
        (args) =>
          args
            .positional('file', { type: 'string', demandOption: true })
            .positional('itemId', { type: 'string', demandOption: true }),
        async (argv) => {
          await deleteCommand(getContext(argv.verbose), { file: argv.file, itemId: argv.itemId });
        },
      )
      .command(
        'restore <file> <itemId>',
        'Restore a deleted item.',
        (args) =>
          args
            .positional('file', { type: 'string', demandOption: true })
            .positional('itemId', { type: 'string', demandOption: true }),
        async (argv) => {
          await restoreCommand(getContext(argv.verbose), { file: argv.file, itemId: argv.itemId });
        },
      )
      .command(
        'label <file> <name>',
        'Create a label.',
        (args) =>
          args
            .positional('file', { type: 'string', demandOption: true })
            .positional('name', { type: 'string', demandOption: true })
            .option('color', { type: 'string', describe: 'Hex color such as #4CAF50' }),
        async (argv) => {
          await labelCommand(getContext(argv.verbose), {
            file: argv.file,
            name: argv.name,
            ...(argv.color ? { color: argv.color } : {}),
          });
        },
      )
      .command(
        'cleanup <file>',
        'Purge deleted items past the retention period.',
        (args) =>
          args
            .positional('file', { type: 'string', demandOption: true })
            .option('days', { type: 'number', describe: 'Retention in days' }),
        async (argv) => {
          await cleanupCommand(getContext(argv.verbose), {
            file: argv.file,
            ...(argv.days !== undefined ? { days: argv.days } : {}),
          });
        },
      )
      .command(
        'sync <file>',
        'Merge the file with its latest on-disk content.',
        (args) => args.positional('file', { type: 'string', demandOption: true }),
        async (argv) => {
          await syncCommand(getContext(argv.verbose), { file: argv.file });
        },
      )
      .command(
        'resolve <file>',
        'Fold conflict copies into the file.',
        (args) => args.positional('file', { type: 'string', demandOption: true }),
        async (argv) => {
          await resolveCommand(getContext(argv.verbose), { file: argv.file });
        },
      )
      .command(
        'status <file>',
        'Show file details.',
        (args) => args.positional('file', { type: 'string', demandOption: true }),
        async (argv) => {
          await statusCommand(getContext(argv.verbose), { file: argv.file });
        },
      )
      .command(
        'lists',
        'List the private lists.',
        (args) => args,
        async (argv) => {
          await listsCommand(getContext(argv.verbose));
        },
      )
      .command(
        'bookmarks',
        'Show remembered list files.',
        (args) =>
          args.option('prune', {
            type: 'boolean',
            default: false,
            describe: 'Forget bookmarks whose file is gone or trashed',
          }),
        async (argv) => {
          await bookmarksCommand(getContext(argv.verbose), { prune: argv.prune });
        },
      )
      .demandCommand(1, 'You must specify a command')
      .strict()
      .exitProcess(false)
      .fail((message: string | undefined, err: Error | undefined) => {
        throw err ?? new Error(message ?? 'Invalid command usage. Run with --help for usage.');
      })
      .help()
      .parseAsync();
    return EXIT_OK;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    errorOutput(`Error: ${message}`);
    return EXIT_ERROR;
  }
}
