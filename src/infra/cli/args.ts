import type { Env } from '../config/env';
import { cliOptionsSchema, type CliOptions } from '../config/schema';
import { describeSchemaIssues } from '../../domain/model/schemas';

export const USAGE = [
  'Usage: ml-trade-query [options]',
  '',
  'Options:',
  '  --pair <pair>            Trading pair (default: SOLUSDC)',
  '  --limit <n>              Number of trades to fetch (default: 20)',
  '  --database-url <url>     Database service URL (default: http://localhost:8080)',
  '  --stats                  Show ML trade statistics',
  '  --status                 Show ML system status',
  '  --verify                 Verify trade data integrity',
  '  --details                Show detailed trade information',
  '  --summary                Summarize fetched trades locally',
  '  --export <csv|json>      Export trades to file',
  '  --output <name>          Output filename for export (extension is added)',
  '  --help                   Show this message'
].join('\n');

const BOOLEAN_FLAGS = ['stats', 'status', 'verify', 'details', 'summary'] as const;
const VALUE_FLAGS = ['pair', 'limit', 'database-url', 'export', 'output'] as const;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type ParsedArgs = { help: true } | { help: false; options: CliOptions };

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

export function parseArgs(argv: string[], env: Env): ParsedArgs {
  const flags = new Set<string>();
  const argMap = new Map<string, string>();

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      return { help: true };
    }

    if (!arg.startsWith('--')) {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }

    const [name, inlineValue] = arg.slice(2).split(/=(.*)/s, 2);
    if (isOneOf(BOOLEAN_FLAGS, name)) {
      if (inlineValue !== undefined) {
        throw new UsageError(`--${name} does not take a value`);
      }
      flags.add(name);
      continue;
    }

    if (!isOneOf(VALUE_FLAGS, name)) {
      throw new UsageError(`Unknown option: --${name}`);
    }

    const value = inlineValue ?? argv[i + 1];
    if (value === undefined || (inlineValue === undefined && value.startsWith('--'))) {
      throw new UsageError(`--${name} requires a value`);
    }
    if (inlineValue === undefined) {
      i += 1;
    }

    argMap.set(name, value);
  }

  const parsed = cliOptionsSchema.safeParse({
    pair: argMap.get('pair') ?? env.ML_QUERY_PAIR,
    limit: argMap.get('limit'),
    database_url: argMap.get('database-url') ?? env.DATABASE_URL,
    stats: flags.has('stats'),
    status: flags.has('status'),
    verify: flags.has('verify'),
    details: flags.has('details'),
    summary: flags.has('summary'),
    export: argMap.get('export'),
    output: argMap.get('output')
  });

  if (!parsed.success) {
    throw new UsageError(`Invalid options: ${describeSchemaIssues(parsed.error)}`);
  }

  return { help: false, options: parsed.data };
}
