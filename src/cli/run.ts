/**
 * Command dispatch for the feedback-copilot CLI.
 *
 *   ingest <file.csv> [--concurrency N]  embed and store every row of a CSV export
 *   search <question> [filters]   print the evidence listing
 *   analyze <question> [filters]  grounded PM analysis
 *   brief <question> [filters]    grounded weekly brief
 *   stats                         record count and embedding dimension
 *
 * Filters: --top-k N --country XX --platform NAME --min-rating N
 */

import minimist from 'minimist';
import type { Container } from '../container.js';
import type { QueryFilter } from '../types/models.js';
import { InvalidInputError } from '../errors.js';
import { renderEvidenceListing } from '../grounding/serialize.js';
import { readFeedbackCsv } from './readFeedbackCsv.js';

export interface CliIO {
  readFile(path: string): Promise<string>;
  out(text: string): void;
  signal?: AbortSignal;
}

export const USAGE = [
  'Usage: feedback-copilot <command> [options]',
  '',
  'Commands:',
  '  ingest <file.csv> [--concurrency N]',
  '  search <question> [--top-k N] [--country XX] [--platform NAME] [--min-rating N]',
  '  analyze <question> [filters]',
  '  brief <question> [filters]',
  '  stats',
].join('\n');

/** Returns the process exit code. */
export async function runCli(
  argv: string[],
  container: Container,
  io: CliIO
): Promise<number> {
  const args = minimist(argv, {
    string: ['country', 'platform', 'top-k', 'min-rating', 'concurrency'],
    boolean: ['help'],
    alias: { h: 'help', k: 'top-k' },
  });
  const [command, ...rest] = args._.map(String);

  if (args.help || !command) {
    io.out(USAGE);
    return args.help ? 0 : 1;
  }

  switch (command) {
    case 'ingest': {
      const file = rest[0];
      if (!file) throw new InvalidInputError('ingest needs a CSV file path');

      const concurrency = readIntFlag(args, 'concurrency');
      if (concurrency !== undefined && concurrency < 1) {
        throw new InvalidInputError('--concurrency must be at least 1');
      }

      const rows = readFeedbackCsv(await io.readFile(file));
      const report = await container.ingestionService.ingest(rows, {
        signal: io.signal,
        concurrency,
      });

      io.out(`Stored ${report.stored} of ${rows.length} rows.`);
      for (const failure of report.failures) {
        io.out(`  row ${failure.index + 1}: ${failure.error.code} ${failure.error.message}`);
      }
      return rows.length > 0 && report.stored === 0 ? 1 : 0;
    }

    case 'search': {
      const evidence = await container.retrievalService.retrieve(
        readFilter(args, rest),
        { signal: io.signal }
      );
      io.out(renderEvidenceListing(evidence));
      return 0;
    }

    case 'analyze':
    case 'brief': {
      const evidence = await container.retrievalService.retrieve(
        readFilter(args, rest),
        { signal: io.signal }
      );
      const result =
        command === 'analyze'
          ? await container.synthesisService.analyze(evidence)
          : await container.synthesisService.weeklyBrief(evidence);

      io.out(result.text);
      if (!result.grounded) {
        io.out(`\nWarning: cites evidence not retrieved: ${result.ungrounded.map((id) => `#${id}`).join(', ')}`);
      }
      return 0;
    }

    case 'stats': {
      const stats = await container.feedbackStore.stats();
      io.out(`Records: ${stats.records}`);
      io.out(`Embedding dimension: ${stats.dimension ?? 'not established'}`);
      return 0;
    }

    default:
      io.out(`Unknown command "${command}"\n\n${USAGE}`);
      return 1;
  }
}

function readFilter(args: minimist.ParsedArgs, rest: string[]): QueryFilter {
  return {
    queryText: rest.join(' '),
    topK: readIntFlag(args, 'top-k'),
    country: readStringFlag(args, 'country'),
    platform: readStringFlag(args, 'platform'),
    minRating: readIntFlag(args, 'min-rating'),
  };
}

function readStringFlag(args: minimist.ParsedArgs, name: string): string | undefined {
  const value: unknown = args[name];
  if (Array.isArray(value)) {
    throw new InvalidInputError(`--${name} given more than once`);
  }
  return typeof value === 'string' ? value : undefined;
}

function readIntFlag(args: minimist.ParsedArgs, name: string): number | undefined {
  const raw = readStringFlag(args, name);
  if (raw === undefined || raw === '') return undefined;
  if (!/^-?\d+$/.test(raw)) {
    throw new InvalidInputError(`--${name} must be an integer, got "${raw}"`);
  }
  return Number(raw);
}
