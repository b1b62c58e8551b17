import { CliUsageError } from '../errors';

export type OutputFormat = 'json' | 'text';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'example' }
  | { kind: 'compute'; configPath: string; format: OutputFormat; strict: boolean };

export const USAGE = `Usage: unit-economics --config <path> [--format json|text] [--strict]
       unit-economics --example
       unit-economics --help

  --config <path>   JSON configuration with jewelry, yoga, retail and tax sections
  --format <fmt>    json (default) or text
  --strict          fail on out-of-range assumptions instead of warning
  --example         print the example configuration
`;

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'json' || value === 'text';
}

/**
 * Parse command-line arguments (without the node and script entries).
 * Accepts both `--flag value` and `--flag=value`.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  let configPath: string | undefined;
  let format: OutputFormat = 'json';
  let strict = false;
  let example = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const [flag = '', inline] = arg.split(/=(.*)/s, 2);
    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new CliUsageError(`${flag} requires a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '--help':
      case '-h':
        return { kind: 'help' };
      case '--example':
        example = true;
        break;
      case '--strict':
        strict = true;
        break;
      case '--config':
        configPath = takeValue();
        break;
      case '--format': {
        const value = takeValue();
        if (!isOutputFormat(value)) {
          throw new CliUsageError(`Unknown format "${value}" (expected json or text)`);
        }
        format = value;
        break;
      }
      default:
        throw new CliUsageError(`Unknown argument "${arg}"`);
    }
  }

  if (example) return { kind: 'example' };
  if (!configPath) throw new CliUsageError('--config is required');
  return { kind: 'compute', configPath, format, strict };
}
