import { ArchiveSession } from '../session/ArchiveSession';
import { SessionOptions } from '../types';
import { VERSION } from '../config/default';
import { ValidationError } from '../utils/errors';
import { logger, parseLogLevel } from '../utils/logger';
import { CliContext, Command } from './context';
import { runUpload, UPLOAD_USAGE } from './commands/upload';
import { runDownload, DOWNLOAD_USAGE } from './commands/download';
import { runMetadata, METADATA_USAGE } from './commands/metadata';
import { runSearch, SEARCH_USAGE } from './commands/search';
import { runDelete, DELETE_USAGE } from './commands/delete';
import { runList, LIST_USAGE } from './commands/list';

export const MAIN_USAGE = `usage:
    archive [--config-file=<file>] [--log-level=<level>] <command> [<args>...]
    archive --help
    archive --version

commands:
    upload      Upload files to an item.
    download    Download files from an item.
    metadata    Read or modify item metadata.
    search      Search the archive.
    delete      Delete files from an item.
    list        List the files in an item.

options:
    -c, --config-file=<file>   Use this config file.
    -l, --log-level=<level>    debug, info, warning, error or silent.
    -h, --help                 Show this help, or a command's help.
    -v, --version              Print the version.`;

interface CommandEntry {
  run: Command;
  usage: string;
}

const COMMANDS: Record<string, CommandEntry> = {
  upload: { run: runUpload, usage: UPLOAD_USAGE },
  download: { run: runDownload, usage: DOWNLOAD_USAGE },
  metadata: { run: runMetadata, usage: METADATA_USAGE },
  search: { run: runSearch, usage: SEARCH_USAGE },
  delete: { run: runDelete, usage: DELETE_USAGE },
  list: { run: runList, usage: LIST_USAGE },
};

export interface RunCliOptions {
  sessionOptions?: SessionOptions;
  stdin?: NodeJS.ReadableStream;
  write?: (line: string) => void;
}

interface GlobalArgs {
  configFile?: string;
  logLevel?: string;
  help: boolean;
  version: boolean;
  command?: string;
  rest: string[];
}

/** Options that come before the command name; everything after belongs to the command. */
function parseGlobalArgs(argv: string[]): GlobalArgs {
  const parsed: GlobalArgs = { help: false, version: false, rest: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const [flag, inline] = arg.includes('=') ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)] : [arg, undefined];
    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined) {
        throw new ValidationError(`${flag} requires a value`);
      }
      i++;
      return next;
    };

    if (flag === '-c' || flag === '--config-file') {
      parsed.configFile = takeValue();
    } else if (flag === '-l' || flag === '--log-level') {
      parsed.logLevel = takeValue();
    } else if (arg === '-h' || arg === '--help') {
      parsed.help = true;
    } else if (arg === '-v' || arg === '--version') {
      parsed.version = true;
    } else if (arg.startsWith('-')) {
      throw new ValidationError(`Unknown option: ${arg}`);
    } else {
      parsed.command = arg;
      parsed.rest = argv.slice(i + 1);
      break;
    }
  }

  return parsed;
}

function isParseArgsError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  );
}

/**
 * Run one CLI invocation and resolve to its exit code. Command output goes
 * through `write` (stdout by default); diagnostics go through the logger.
 */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const write = options.write ?? ((line: string) => process.stdout.write(`${line}\n`));
  let usage = MAIN_USAGE;

  try {
    const globals = parseGlobalArgs(argv);

    if (globals.version) {
      write(VERSION);
      return 0;
    }
    if (!globals.command) {
      write(MAIN_USAGE);
      return globals.help ? 0 : 1;
    }

    const entry = COMMANDS[globals.command];
    if (!entry) {
      throw new ValidationError(`Unknown command: ${globals.command}`);
    }
    usage = entry.usage;

    if (globals.help || globals.rest.includes('-h') || globals.rest.includes('--help')) {
      write(entry.usage);
      return 0;
    }

    const session = await ArchiveSession.create({
      ...options.sessionOptions,
      configFile: globals.configFile ?? options.sessionOptions?.configFile,
    });

    if (globals.logLevel) {
      const level = parseLogLevel(globals.logLevel);
      if (level === undefined) {
        throw new ValidationError(`Unknown log level: ${globals.logLevel}`);
      }
      logger.setLogLevel(level);
    }

    const context: CliContext = {
      session,
      stdin: options.stdin ?? process.stdin,
      write,
    };
    return await entry.run(globals.rest, context);
  } catch (error) {
    if (error instanceof ValidationError || isParseArgsError(error)) {
      logger.error(error.message);
      logger.info(usage);
      return 1;
    }
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}
