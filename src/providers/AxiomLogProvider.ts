/**
 * Axiom log provider.
 * Buffers events and ships them in batches to Axiom's ingest API, tagged with
 * a service name. Shipping never blocks callers: a failed flush keeps the
 * batch for the next attempt, up to maxBuffered events (oldest dropped).
 */

import type { ILogProvider, LogEvent } from './ILogProvider.js';

export interface AxiomLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  dataset: string;
  /** Added to every event as `service`. Default: 'feedback-copilot'. */
  service?: string;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000. 0 disables. */
  flushIntervalMs?: number;
  /** Upper bound on retained events while Axiom is unreachable. Default: 1000. */
  maxBuffered?: number;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider implements ILogProvider {
  private buffer: Array<LogEvent & { service: string }> = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly service: string;
  private readonly flushThreshold: number;
  private readonly maxBuffered: number;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private readonly enabled: boolean;
  /** Failed flush attempts since the last success. */
  failedFlushes = 0;

  constructor(options: AxiomLogProviderOptions) {
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.service = options.service ?? 'feedback-copilot';
    this.flushThreshold = options.flushThreshold ?? 50;
    this.maxBuffered = options.maxBuffered ?? 1000;
    this.enabled = Boolean(this.apiToken);

    const flushIntervalMs = options.flushIntervalMs ?? 10_000;
    if (this.enabled && flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, flushIntervalMs);
      // Don't hold the process open for the timer
      this.flushTimer.unref();
    }
  }

  get pending(): number {
    return this.buffer.length;
  }

  log(event: LogEvent): void {
    if (!this.enabled) return;

    this.buffer.push({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      service: this.service,
    });
    if (this.buffer.length > this.maxBuffered) {
      this.buffer.splice(0, this.buffer.length - this.maxBuffered);
    }

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  async flush(): Promise<void> {
    if (!this.enabled || this.buffer.length === 0) return;

    const batch = [...this.buffer];

    try {
      const response = await fetch(`${AXIOM_INGEST_URL}/${this.dataset}/ingest`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(batch),
      });

      if (response.ok) {
        // Events logged during the request stay buffered
        this.buffer.splice(0, batch.length);
        this.failedFlushes = 0;
      } else {
        this.failedFlushes++;
      }
    } catch {
      // Logging must not take the caller down; the batch stays for the next flush
      this.failedFlushes++;
    }
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }
}
