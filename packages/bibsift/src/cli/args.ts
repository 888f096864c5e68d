import { EXPORT_FORMATS, type ExportFormat } from '../export/types.js';

export type CliCommand = 'serve' | 'extract' | 'batch';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface CliArgs {
  showHelp: boolean;
  showVersion: boolean;
  command: CliCommand;
  files: string[];
  formats?: ExportFormat[];
  output?: string;
  outputDir?: string;
  minConfidence?: number;
  concurrency?: number;
}

const COMMANDS = new Set<string>(['serve', 'extract', 'batch']);
const FORMAT_SET = new Set<string>(EXPORT_FORMATS);

const VALUE_OPTIONS = ['--format', '--output', '--output-dir', '--min-confidence', '--concurrency'] as const;
type ValueOption = (typeof VALUE_OPTIONS)[number];

const OPTION_COMMANDS: Record<ValueOption, CliCommand[]> = {
  '--format': ['extract', 'batch'],
  '--output': ['extract'],
  '--output-dir': ['batch'],
  '--min-confidence': ['extract', 'batch'],
  '--concurrency': ['batch']
};

const isCommand = (value: string): value is CliCommand => COMMANDS.has(value);
const isExportFormat = (value: string): value is ExportFormat => FORMAT_SET.has(value);
const isValueOption = (value: string): value is ValueOption => VALUE_OPTIONS.some((option) => option === value);

const parseFormats = (value: string): ExportFormat[] => {
  const formats = value
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);

  if (formats.length === 0) {
    throw new CliUsageError('Expected at least one format after --format.');
  }

  return formats.map((format) => {
    if (!isExportFormat(format)) {
      throw new CliUsageError(`Invalid format "${format}". Expected one of: ${EXPORT_FORMATS.join(', ')}.`);
    }
    return format;
  });
};

const parseMinConfidence = (value: string): number => {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new CliUsageError(`Invalid --min-confidence "${value}". Expected a number between 0 and 1.`);
  }
  return parsed;
};

const parseConcurrency = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new CliUsageError(`Invalid --concurrency "${value}". Expected a positive integer.`);
  }
  return parsed;
};

export const CLI_USAGE = `bibsift: reference extraction and quality scoring

Usage:
  bibsift [serve]
  bibsift extract <file> [--format <list>] [--output <base>] [--min-confidence <n>]
  bibsift batch <file...> [--output-dir <dir>] [--format <list>] [--min-confidence <n>] [--concurrency <n>]
  bibsift --help
  bibsift --version

Commands:
  serve                 Run the MCP server over stdio (default)
  extract               Extract references from one document and print a JSON summary
  batch                 Extract references from several documents into an output directory

Options:
  --format <list>       Comma-separated export formats: ${EXPORT_FORMATS.join(', ')}
  --output <base>       Base path for export files, without extension
                        (default: <BIBSIFT_OUTPUT_DIR>/references_<name>)
  --output-dir <dir>    Batch output directory (default: BIBSIFT_OUTPUT_DIR)
  --min-confidence <n>  Confidence threshold between 0 and 1 (default: BIBSIFT_MIN_CONFIDENCE)
  --concurrency <n>     Documents processed in parallel (default: BIBSIFT_BATCH_CONCURRENCY)
  -h, --help            Show help
  -v, --version         Print package version`;

const applyOption = (args: CliArgs, option: ValueOption, value: string): void => {
  switch (option) {
    case '--format': {
      args.formats = parseFormats(value);
      return;
    }
    case '--output': {
      args.output = value;
      return;
    }
    case '--output-dir': {
      args.outputDir = value;
      return;
    }
    case '--min-confidence': {
      args.minConfidence = parseMinConfidence(value);
      return;
    }
    case '--concurrency': {
      args.concurrency = parseConcurrency(value);
      return;
    }
  }
};

const validate = (args: CliArgs, usedOptions: ValueOption[]): void => {
  for (const option of usedOptions) {
    if (!OPTION_COMMANDS[option].includes(args.command)) {
      throw new CliUsageError(`Option ${option} is not valid for the ${args.command} command.`);
    }
  }

  if (args.command === 'serve' && args.files.length > 0) {
    throw new CliUsageError(`Unknown argument "${args.files[0] ?? ''}".`);
  }

  if (args.command === 'extract' && args.files.length !== 1) {
    throw new CliUsageError('The extract command takes exactly one file.');
  }

  if (args.command === 'batch' && args.files.length === 0) {
    throw new CliUsageError('The batch command needs at least one file.');
  }
};

export const parseCliArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = {
    showHelp: false,
    showVersion: false,
    command: 'serve',
    files: []
  };
  const usedOptions: ValueOption[] = [];
  let commandSeen = false;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index]?.trim();

    if (!arg) {
      continue;
    }

    if (arg === '-h' || arg === '--help') {
      args.showHelp = true;
      continue;
    }

    if (arg === '-v' || arg === '--version') {
      args.showVersion = true;
      continue;
    }

    if (arg.startsWith('--')) {
      const separator = arg.indexOf('=');
      const name = separator === -1 ? arg : arg.slice(0, separator);

      if (!isValueOption(name)) {
        throw new CliUsageError(`Unknown argument "${arg}".`);
      }

      let value: string | undefined;
      if (separator === -1) {
        value = argv[index + 1];
        index += 1;
      } else {
        value = arg.slice(separator + 1);
      }

      if (!value) {
        throw new CliUsageError(`Missing value after ${name}.`);
      }

      applyOption(args, name, value);
      usedOptions.push(name);
      continue;
    }

    if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown argument "${arg}".`);
    }

    if (!commandSeen && args.files.length === 0 && isCommand(arg)) {
      args.command = arg;
      commandSeen = true;
      continue;
    }

    args.files.push(arg);
  }

  if (!args.showHelp && !args.showVersion) {
    validate(args, usedOptions);
  }

  return args;
};
