import { config } from './config.js';
import type { CliCommand, Result } from './types.js';

export const USAGE = `Usage: hoarder-to-linkwarden <hoarder-export.json> -o <linkwarden-import.json> [options]

Convert a Hoarder export JSON into Linkwarden's import format.

Options:
  -o, --output <file>           Where to write the Linkwarden JSON file (required)
  --user-id <int>               Linkwarden user id for the collection and links (default: ${config.defaults.userId})
  --collection-color <color>    Color for the generated collection, e.g. #0ea5e9
  -h, --help                    Show this help

Example:
  hoarder-to-linkwarden hoarder_export.json -o linkwarden_import.json --collection-color '#0ea5e9'`;

type ValueOption = 'output' | 'userId' | 'collectionColor';

const VALUE_OPTIONS = new Map<string, ValueOption>([
  ['-o', 'output'],
  ['--output', 'output'],
  ['--user-id', 'userId'],
  ['--collection-color', 'collectionColor'],
]);

function usageError(message: string): Result<CliCommand> {
  return { ok: false, error: { type: 'usage', message } };
}

function parseUserId(raw: string): number | null {
  if (!/^[+-]?\d+$/.test(raw.trim())) {
    return null;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Parse `process.argv` (node and script path included).
 */
export function parseConvertArgs(argv: string[]): Result<CliCommand> {
  const values: Partial<Record<ValueOption, string>> = {};
  const positionals: string[] = [];

  for (let i = 2; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      return { ok: true, value: { kind: 'help' } };
    }

    if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const option = VALUE_OPTIONS.get(flag);

    if (option) {
      if (eq !== -1) {
        values[option] = arg.slice(eq + 1);
        continue;
      }
      const value = argv[i + 1];
      if (value === undefined) {
        return usageError(`${flag} requires a value`);
      }
      values[option] = value;
      i += 1;
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      return usageError(`Unknown option: ${arg}`);
    }
    positionals.push(arg);
  }

  if (positionals.length === 0) {
    return usageError('Missing path to the Hoarder export');
  }
  if (positionals.length > 1) {
    return usageError(`Unexpected argument: ${positionals[1]}`);
  }
  if (!values.output) {
    return usageError('Missing required option --output');
  }

  let userId = config.defaults.userId;
  if (values.userId !== undefined) {
    const parsed = parseUserId(values.userId);
    if (parsed === null) {
      return usageError(`--user-id must be an integer, got '${values.userId}'`);
    }
    userId = parsed;
  }

  return {
    ok: true,
    value: {
      kind: 'convert',
      options: {
        inputPath: positionals[0],
        outputPath: values.output,
        userId,
        collectionColor: values.collectionColor ?? config.defaults.collectionColor,
      },
    },
  };
}
