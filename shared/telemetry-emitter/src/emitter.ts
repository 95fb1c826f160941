/**
 * TelemetryEmitter - Singleton telemetry event emitter
 *
 * Non-blocking HTTP client that posts telemetry events to an ingest endpoint.
 *
 * - Singleton, shared by every runner in the process
 * - Fire-and-forget: `emit` never blocks and never throws
 * - Exponential backoff retry, 2 retries by default
 * - Endpoint configurable through TELEMETRY_INGEST_URL
 */

import { request } from 'undici';
import type { TelemetryEvent, TelemetryEmitterConfig, EventType } from './types.js';

const DEFAULT_INGEST_URL = 'http://localhost:3100/ingest';

type EventOptions = { operation?: string };

export class TelemetryEmitter {
  private static instance: TelemetryEmitter | null = null;
  private readonly ingestUrl: string;
  private readonly maxRetries: number;
  private readonly initialRetryDelay: number;
  private readonly timeout: number;
  private readonly inFlight = new Set<Promise<void>>();

  private constructor(config: TelemetryEmitterConfig = {}) {
    this.ingestUrl = config.ingestUrl
      || process.env.TELEMETRY_INGEST_URL
      || DEFAULT_INGEST_URL;
    this.maxRetries = config.maxRetries ?? 2;
    this.initialRetryDelay = config.initialRetryDelay ?? 100;
    this.timeout = config.timeout ?? 5000;
  }

  /**
   * Get the singleton instance. The config only applies on first call.
   */
  public static getInstance(config?: TelemetryEmitterConfig): TelemetryEmitter {
    if (!TelemetryEmitter.instance) {
      TelemetryEmitter.instance = new TelemetryEmitter(config);
    }
    return TelemetryEmitter.instance;
  }

  /**
   * Reset the singleton instance (useful for testing)
   */
  public static resetInstance(): void {
    TelemetryEmitter.instance = null;
  }

  /**
   * Emit an event without waiting for delivery.
   */
  public emit(event: TelemetryEvent): void {
    const pending = this.sendWithRetry(event).catch((error: unknown) => {
      console.debug('[TelemetryEmitter] Failed to send event:', {
        error: error instanceof Error ? error.message : String(error),
        event: {
          source: event.source,
          eventType: event.eventType,
          correlationId: event.correlationId,
        },
      });
    });

    this.inFlight.add(pending);
    void pending.finally(() => this.inFlight.delete(pending));
  }

  /**
   * Wait until every event emitted so far has been delivered or dropped.
   */
  public async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private async sendWithRetry(event: TelemetryEvent): Promise<void> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        await this.sendEvent(event);
        return;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt === this.maxRetries) {
          throw lastError;
        }

        // 100ms, 200ms, ...
        const delay = this.initialRetryDelay * Math.pow(2, attempt);

        console.debug(`[TelemetryEmitter] Retry ${attempt + 1}/${this.maxRetries} after ${delay}ms:`, {
          error: lastError.message,
          source: event.source,
          eventType: event.eventType,
        });

        await this.sleep(delay);
      }
    }
  }

  private async sendEvent(event: TelemetryEvent): Promise<void> {
    const response = await request(this.ingestUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(event),
      bodyTimeout: this.timeout,
      headersTimeout: this.timeout,
    });

    // Drain the body so the socket is released
    await response.body.text();

    if (response.statusCode >= 400) {
      throw new Error(`HTTP ${response.statusCode}: ${response.statusCode >= 500 ? 'Server Error' : 'Client Error'}`);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private emitTyped(
    eventType: EventType,
    source: string,
    correlationId: string,
    metadata: Record<string, unknown>,
    options?: EventOptions
  ): void {
    this.emit({
      correlationId,
      source,
      ...(options?.operation !== undefined && { operation: options.operation }),
      eventType,
      timestamp: Date.now(),
      metadata,
    });
  }

  public emitRunStart(
    source: string,
    correlationId: string,
    metadata: Record<string, unknown> = {},
    options?: EventOptions
  ): void {
    this.emitTyped('run_start', source, correlationId, metadata, options);
  }

  public emitAttempt(
    source: string,
    correlationId: string,
    metadata: Record<string, unknown> = {},
    options?: EventOptions
  ): void {
    this.emitTyped('attempt', source, correlationId, metadata, options);
  }

  public emitRunComplete(
    source: string,
    correlationId: string,
    metadata: Record<string, unknown> = {},
    options?: EventOptions
  ): void {
    this.emitTyped('run_complete', source, correlationId, metadata, options);
  }

  /**
   * Emit an error event. Error objects are flattened to name, message, stack.
   */
  public emitError(
    source: string,
    correlationId: string,
    error: unknown,
    metadata: Record<string, unknown> = {},
    options?: EventOptions
  ): void {
    const errorMetadata = {
      ...metadata,
      error: error instanceof Error ? {
        message: error.message,
        name: error.name,
        stack: error.stack,
      } : { message: String(error) },
    };

    this.emitTyped('error', source, correlationId, errorMetadata, options);
  }

  /**
   * Get the current configuration (useful for debugging)
   */
  public getConfig(): Readonly<{
    ingestUrl: string;
    maxRetries: number;
    initialRetryDelay: number;
    timeout: number;
  }> {
    return {
      ingestUrl: this.ingestUrl,
      maxRetries: this.maxRetries,
      initialRetryDelay: this.initialRetryDelay,
      timeout: this.timeout,
    };
  }
}
