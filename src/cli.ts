import { UsageError } from './errors.js';

export const COMMANDS = ['check', 'retrieve', 'update', 'delete', 'purge'] as const;
export type Command = (typeof COMMANDS)[number];

export type CliArgs =
  | { help: true }
  | { help: false; cmd: Command; file: string; fromTime?: string; toTime?: string };

const COMMAND_NAMES: ReadonlySet<string> = new Set(COMMANDS);

function isCommand(s: string): s is Command {
  return COMMAND_NAMES.has(s);
}

export function usage(prog = 'suppress'): string {
  return [
    '',
    'NAME',
    `   ${prog}`,
    '   Manage a SparkPost customer suppression list.',
    '',
    'SYNOPSIS',
    `   ${prog} cmd supp_list [from_time to_time]`,
    '',
    'MANDATORY PARAMETERS',
    '    cmd                  check|retrieve|update|delete|purge',
    '    supp_list            .CSV format file, containing as a minimum the email recipients',
    '',
    'OPTIONAL PARAMETERS',
    '    from_time            } for retrieve only',
    '    to_time              } Format YYYY-MM-DDTHH:MM',
    '',
    'COMMANDS',
    '    check                Validates the format of a file, checking that email addresses are well-formed, but does not upload them.',
    '    retrieve             Gets your current suppression-list contents from SparkPost back into a file.',
    '    update               Uploads file contents to SparkPost.  Also checks the file as "check" does.',
    '    delete               Removes the file contents from SparkPost.  Also checks the file as "check" does.',
    '    purge                Saves the whole suppression list into the file, then deletes every entry in it.',
    '',
    'CONFIGURATION',
    '    Read from the environment or a .env file: SPARKPOST_API_KEY (mandatory), SPARKPOST_HOST, TIMEZONE,',
    '    PROPERTIES, BATCH_SIZE, TYPE_DEFAULT, DESCRIPTION_DEFAULT, FILE_CHARACTER_ENCODINGS, DELETE_THREADS, SUBACCOUNT.',
    ''
  ].join('\n');
}

export function parseArgs(argv: string[]): CliArgs {
  if (argv.includes('-h') || argv.includes('--help')) return { help: true };
  const [cmd, file, fromTime, toTime, ...rest] = argv;
  if (!cmd || !file) throw new UsageError('Missing arguments.');
  if (!isCommand(cmd)) throw new UsageError(`Unknown command: ${cmd}`);
  if (rest.length) throw new UsageError(`Unexpected argument: ${rest[0]}`);
  if (fromTime !== undefined) {
    if (cmd !== 'retrieve') throw new UsageError('from_time and to_time apply to retrieve only');
    if (toTime === undefined) throw new UsageError('to_time is required with from_time');
    return { help: false, cmd, file, fromTime, toTime };
  }
  return { help: false, cmd, file };
}
