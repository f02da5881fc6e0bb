/**
 * Ingestion pipeline: raw rows → validated records → embeddings → store.
 *
 * Per-row problems (invalid row, gateway still down after retries, dimension
 * mismatch) are recorded and the batch continues. Anything else is treated
 * as pipeline-wide: no new rows start and the error propagates once
 * in-flight rows settle.
 *
 * Re-ingesting the same rows stores them again; there is no dedup.
 */

import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { FeedbackStore } from './FeedbackStore.js';
import type { RawFeedbackRow } from '../types/models.js';
import {
  AppError,
  DimensionMismatchError,
  GatewayUnavailableError,
  InvalidInputError,
} from '../errors.js';
import { parseFeedbackRow } from './FeedbackRowParser.js';

const MAX_BACKOFF_MS = 8_000;

export interface IngestionOptions {
  /** Rows embedded at once. Default: 1 (sequential). */
  concurrency?: number;
  /** Retries after a GatewayUnavailableError. Default: 3. */
  maxRetries?: number;
  /** First backoff delay; doubles per retry, capped at 8s. Default: 500. */
  retryBaseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface IngestFailure {
  /** Position of the row in the input batch. */
  index: number;
  row: RawFeedbackRow;
  error: AppError;
}

export interface IngestReport {
  stored: number;
  /** Ids of stored rows, in input order. */
  ids: number[];
  /** Failed rows, in input order. */
  failures: IngestFailure[];
}

type RowOutcome =
  | { ok: true; id: number }
  | { ok: false; failure: IngestFailure };

export class IngestionService {
  private readonly concurrency: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly feedbackStore: FeedbackStore,
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly logProvider: ILogProvider,
    options: IngestionOptions = {}
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.maxRetries = Math.max(0, options.maxRetries ?? 3);
    this.retryBaseDelayMs = Math.max(0, options.retryBaseDelayMs ?? 500);
    this.sleep = options.sleep ?? defaultSleep;
  }

  async ingest(
    rows: RawFeedbackRow[],
    options: { signal?: AbortSignal; concurrency?: number } = {}
  ): Promise<IngestReport> {
    const { signal } = options;
    const concurrency =
      options.concurrency === undefined ? this.concurrency : Math.max(1, options.concurrency);
    const outcomes: Array<RowOutcome | undefined> = new Array(rows.length);
    const state: { nextIndex: number; stopped: boolean; error: unknown } = {
      nextIndex: 0,
      stopped: false,
      error: undefined,
    };

    const worker = async (): Promise<void> => {
      while (!state.stopped && state.nextIndex < rows.length) {
        if (signal?.aborted) {
          state.stopped = true;
          state.error ??= signal.reason;
          return;
        }
        const index = state.nextIndex++;
        try {
          outcomes[index] = await this.ingestRow(rows[index], index);
        } catch (err) {
          state.stopped = true;
          state.error ??= err;
          return;
        }
      }
    };

    const workerCount = Math.min(concurrency, rows.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (state.stopped) throw state.error;

    const report: IngestReport = { stored: 0, ids: [], failures: [] };
    for (const outcome of outcomes) {
      if (!outcome) continue;
      if (outcome.ok) {
        report.ids.push(outcome.id);
      } else {
        report.failures.push(outcome.failure);
      }
    }
    report.stored = report.ids.length;

    this.logProvider.info('Ingestion batch complete', {
      rows: rows.length,
      stored: report.stored,
      failed: report.failures.length,
    });

    return report;
  }

  // ── Private ──

  private async ingestRow(row: RawFeedbackRow, index: number): Promise<RowOutcome> {
    try {
      const record = parseFeedbackRow(row);
      const embedding = await this.embedWithRetry(record.text, index);
      const id = await this.feedbackStore.insert({ ...record, embedding });
      return { ok: true, id };
    } catch (err) {
      if (!isRowLevelError(err)) throw err;

      this.logProvider.warn('Feedback row rejected', {
        index,
        code: err.code,
        error: err.message,
      });
      return { ok: false, failure: { index, row, error: err } };
    }
  }

  private async embedWithRetry(text: string, index: number): Promise<number[]> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.embeddingProvider.generate(text);
      } catch (err) {
        if (!(err instanceof GatewayUnavailableError) || attempt >= this.maxRetries) {
          throw err;
        }

        const delay = Math.min(this.retryBaseDelayMs * 2 ** attempt, MAX_BACKOFF_MS);
        this.logProvider.warn('Embedding gateway unavailable, retrying', {
          index,
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
          delayMs: delay,
          error: err.message,
        });
        await this.sleep(delay);
      }
    }
  }
}

function isRowLevelError(
  err: unknown
): err is InvalidInputError | GatewayUnavailableError | DimensionMismatchError {
  return (
    err instanceof InvalidInputError ||
    err instanceof GatewayUnavailableError ||
    err instanceof DimensionMismatchError
  );
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
