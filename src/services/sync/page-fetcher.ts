/**
 * Page Fetcher - streams every record of one entity type from the source,
 * page by page, under the shared rate limiter.
 *
 * Always starts at offset 0: every run is a full resync.
 */

import { syncLogger } from "../../logger.js";
import { SourceError } from "../../source/client.js";
import { sleep as defaultSleep } from "../../source/rate-limiter.js";
import { TimeoutError, withTimeout } from "../../utils/async.js";
import {
  AuthError,
  SourceNotFoundError,
  SyncCancelledError,
  TransientExternalError,
  errorMessage,
} from "./errors.js";

import type { RetryConfig } from "../../config.js";
import type { FetchPageRequest, SourceClient } from "../../source/client.js";
import type { RateLimiter, Sleep } from "../../source/rate-limiter.js";
import type { MappingEntry, RawRecord, SourceFilter } from "../../types/index.js";

export interface FetchAllOptions {
  filter?: SourceFilter;
  pageSize: number;
  maxPages?: number;
  signal?: AbortSignal;
}

export interface PageFetcherOptions {
  rateLimiter: RateLimiter;
  retry: RetryConfig;
  timeoutMs: number;
  sleep?: Sleep;
}

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Map a client failure onto the sync error taxonomy. Only
 * TransientExternalError is retried by the fetcher.
 */
export function classifySourceError(error: unknown): Error {
  if (error instanceof SourceError) {
    switch (error.kind) {
      case "unauthorized":
        return new AuthError(error.message, { cause: error });
      case "not_found":
        return new SourceNotFoundError(error.message, { cause: error });
      case "rate_limited":
      case "transport":
        return new TransientExternalError(error.message, {
          retryAfterMs: error.retryAfterMs,
          cause: error,
        });
      case "invalid_request":
        return error;
    }
  }
  if (error instanceof TimeoutError) {
    return new TransientExternalError(error.message, { cause: error });
  }
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Delay before retry number `attempt` (0-based).
 * A larger server-provided Retry-After wins.
 */
export function backoffDelay(
  attempt: number,
  retry: RetryConfig,
  retryAfterMs?: number
): number {
  const exponential = Math.min(
    retry.initialBackoffMs * retry.backoffMultiplier ** attempt,
    retry.maxBackoffMs
  );
  return retryAfterMs !== undefined && retryAfterMs > exponential
    ? retryAfterMs
    : exponential;
}

/**
 * Fields to request from the source: the whitelist plus the id and every
 * relation field.
 */
export function requestedFields(mapping: MappingEntry): string[] {
  const fields = new Set(mapping.fields);
  fields.add(mapping.idField);
  for (const rule of mapping.relations) {
    fields.add(rule.field);
  }
  return [...fields];
}

// ============================================================================
// Fetcher
// ============================================================================

export class PageFetcher {
  private readonly sleep: Sleep;

  constructor(
    private readonly client: SourceClient,
    private readonly options: PageFetcherOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async *fetchAll(
    entityType: string,
    mapping: MappingEntry,
    options: FetchAllOptions
  ): AsyncGenerator<RawRecord> {
    const fields = requestedFields(mapping);
    let offset = 0;
    let pages = 0;
    let total = 0;

    syncLogger.info(
      { entityType, module: mapping.sourceModule, pageSize: options.pageSize },
      "Fetching records from source"
    );

    while (options.maxPages === undefined || pages < options.maxPages) {
      const records = await this.fetchPageWithRetry(
        {
          entityType,
          module: mapping.sourceModule,
          fields,
          filter: options.filter,
          offset,
          limit: options.pageSize,
        },
        options.signal
      );
      pages++;
      total += records.length;
      offset += records.length;

      syncLogger.debug(
        { entityType, page: pages, records: records.length },
        "Fetched page"
      );

      yield* records;

      if (records.length < options.pageSize) {
        break;
      }
    }

    syncLogger.info({ entityType, pages, total }, "Finished fetching records");
  }

  private async fetchPageWithRetry(
    request: FetchPageRequest,
    signal?: AbortSignal
  ): Promise<RawRecord[]> {
    const { retry, rateLimiter, timeoutMs } = this.options;

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted === true) {
        throw new SyncCancelledError();
      }

      await rateLimiter.acquire();

      try {
        return await withTimeout(
          this.client.fetchPage(request, signal),
          timeoutMs,
          `Fetch ${request.module} at offset ${String(request.offset)}`
        );
      } catch (error) {
        if (signal?.aborted) {
          throw new SyncCancelledError();
        }

        const classified = classifySourceError(error);
        const retryable = classified instanceof TransientExternalError;
        if (!retryable || attempt + 1 >= retry.maxAttempts) {
          syncLogger.error(
            {
              entityType: request.entityType,
              offset: request.offset,
              attempts: attempt + 1,
              error: errorMessage(classified),
            },
            "Source request failed"
          );
          throw classified;
        }

        const delay = backoffDelay(attempt, retry, classified.retryAfterMs);
        syncLogger.warn(
          {
            entityType: request.entityType,
            offset: request.offset,
            attempt: attempt + 1,
            delay,
            error: classified.message,
          },
          "Transient source error, retrying"
        );
        await this.sleep(delay);
      }
    }
  }
}
