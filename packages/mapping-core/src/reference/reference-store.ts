/**
 * Reference Store
 *
 * Owns the active index snapshot. A reload pulls the full glossary, builds
 * a new snapshot off to the side and swaps the active pointer only when the
 * build succeeded; readers never observe a partial generation.
 */

import { GlossaryNotLoadedError, errorMessage, silentLogger } from '@rdg-mapper/core';
import type { IGlossarySource, Logger, MappingEventListener, ReloadEvent } from '@rdg-mapper/core';
import type { Normalizer } from '../normalization/normalizer.js';
import { withRetries } from '../runtime/retry.js';
import type { RetryConfig } from '../runtime/retry.js';
import { IndexSnapshot, toReferenceEntity } from './index-snapshot.js';

export interface ReferenceStoreOptions {
  source: IGlossarySource;
  normalizer: Normalizer;
  /** Retry policy for `loadGlossary()` (default: 3 attempts) */
  retry?: RetryConfig;
  /** Fallback ids to verify against each new generation */
  fallbackIds?: readonly string[];
  listener?: MappingEventListener;
  logger?: Logger;
}

export interface ReferenceStoreStatus {
  loaded: boolean;
  generationId: number | null;
  entityCount: number;
  builtAt: string | null;
  source: string;
  lastError: string | null;
  autoReloadMs: number | null;
}

export class ReferenceStore {
  private readonly source: IGlossarySource;
  private readonly normalizer: Normalizer;
  private readonly retry: RetryConfig;
  private readonly fallbackIds: readonly string[];
  private readonly listener?: MappingEventListener;
  private readonly logger: Logger;

  private active: IndexSnapshot | null = null;
  private nextGeneration = 1;
  private inFlight: Promise<IndexSnapshot> | null = null;
  private lastError: string | null = null;
  private timer: NodeJS.Timeout | null = null;
  private autoReloadMs: number | null = null;

  constructor(options: ReferenceStoreOptions) {
    this.source = options.source;
    this.normalizer = options.normalizer;
    this.retry = options.retry ?? { attempts: 3 };
    this.fallbackIds = options.fallbackIds ?? [];
    this.listener = options.listener;
    this.logger = (options.logger ?? silentLogger).child({ component: 'reference-store' });
  }

  /**
   * The active snapshot.
   *
   * @throws GlossaryNotLoadedError before the first successful reload
   */
  current(): IndexSnapshot {
    if (!this.active) {
      throw new GlossaryNotLoadedError();
    }
    return this.active;
  }

  get isLoaded(): boolean {
    return this.active !== null;
  }

  /**
   * Load the glossary and swap it in. Concurrent calls share one reload.
   * On failure the previous snapshot stays active and the error is rethrown.
   */
  reload(): Promise<IndexSnapshot> {
    if (!this.inFlight) {
      this.inFlight = this.doReload().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** Reload every `intervalMs`; failures are logged and the prior snapshot stays */
  startAutoReload(intervalMs: number): void {
    this.stopAutoReload();
    this.autoReloadMs = intervalMs;
    this.timer = setInterval(() => {
      this.reload().catch((err: unknown) => {
        this.logger.error('Scheduled glossary reload failed', { error: errorMessage(err) });
      });
    }, intervalMs);
    this.timer.unref();
  }

  stopAutoReload(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.autoReloadMs = null;
  }

  status(): ReferenceStoreStatus {
    return {
      loaded: this.active !== null,
      generationId: this.active?.generationId ?? null,
      entityCount: this.active?.size ?? 0,
      builtAt: this.active?.builtAt.toISOString() ?? null,
      source: this.source.name,
      lastError: this.lastError,
      autoReloadMs: this.autoReloadMs,
    };
  }

  private async doReload(): Promise<IndexSnapshot> {
    const startTime = Date.now();
    const generationId = this.nextGeneration;

    try {
      const entries = await withRetries(() => this.source.loadGlossary(), this.retry, {
        onRetry: (err, ctx) =>
          this.logger.warn('Glossary load failed, retrying', {
            source: this.source.name,
            attempt: ctx.attempt,
            attempts: ctx.attempts,
            error: errorMessage(err),
          }),
      });

      const entities = entries.map((entry) => toReferenceEntity(entry, this.normalizer));
      const snapshot = IndexSnapshot.build(entities, { generationId });

      this.nextGeneration++;
      this.active = snapshot;
      this.lastError = null;

      const durationMs = Date.now() - startTime;
      this.logger.info('Glossary loaded', {
        source: this.source.name,
        generationId,
        entityCount: snapshot.size,
        durationMs,
      });
      this.checkFallbackIds(snapshot);
      this.emit({ outcome: 'success', generationId, entityCount: snapshot.size, durationMs });

      return snapshot;
    } catch (err) {
      const message = errorMessage(err);
      this.lastError = message;

      const durationMs = Date.now() - startTime;
      this.logger.error('Glossary reload failed; keeping previous snapshot', {
        source: this.source.name,
        activeGenerationId: this.active?.generationId ?? null,
        error: message,
      });
      this.emit({ outcome: 'failure', durationMs, error: message });

      throw err;
    }
  }

  private checkFallbackIds(snapshot: IndexSnapshot): void {
    const missing = this.fallbackIds.filter((id) => !snapshot.has(id));
    if (missing.length > 0) {
      this.logger.warn('Configured fallback ids are not in the glossary', {
        generationId: snapshot.generationId,
        missing,
      });
    }
  }

  private emit(event: ReloadEvent): void {
    try {
      this.listener?.onReload?.(event);
    } catch (err) {
      this.logger.warn('Reload listener failed', { error: errorMessage(err) });
    }
  }
}
