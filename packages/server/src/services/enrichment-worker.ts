import { differenceInSeconds } from 'date-fns';
import { setImmediate as nextTick } from 'timers/promises';
import { ClassifierUnavailableError, errorMessage } from '../errors.js';
import type { Classification, TransactionClassifier } from './llm-classifier.js';
import { isTerminal, type ProgressStatus, type ProgressTracker } from './progress-service.js';
import { normalizeTags } from './tag-service.js';
import type { EnrichmentStore } from './transaction-store.js';

export interface ProcessingJob {
  fileHash: string;
  filename: string;
  total: number;
  processed: number;
  status: ProgressStatus;
  startedAt: string;
  completedAt: string | null;
  elapsedSeconds: number;
  error: string | null;
}

export interface EnrichmentWorkerOptions {
  // A job with no completed row for this long is marked as failed
  watchdogMs?: number;
  // How long finished jobs stay visible to pollers
  jobRetentionMs?: number;
}

interface JobState {
  fileHash: string;
  filename: string;
  total: number;
  processed: number;
  status: ProgressStatus;
  startedAt: Date;
  completedAt: Date | null;
  error: string | null;
  controller: AbortController;
  watchdog: NodeJS.Timeout | null;
  eviction: NodeJS.Timeout | null;
}

/**
 * Background LLM categorization, one job per uploaded file.
 *
 * Remaining work is whatever the store still holds at fast-path status, so a
 * job that dies halfway is resumed by simply enqueueing the file again. Each
 * row is committed on its own.
 */
export class EnrichmentWorker {
  private readonly jobs = new Map<string, JobState>();
  private readonly running = new Map<string, Promise<void>>();
  private readonly watchdogMs: number;
  private readonly jobRetentionMs: number;

  constructor(
    private readonly store: EnrichmentStore,
    private readonly classifier: TransactionClassifier,
    private readonly progress: ProgressTracker,
    options: EnrichmentWorkerOptions = {}
  ) {
    this.watchdogMs = options.watchdogMs ?? 120_000;
    this.jobRetentionMs = options.jobRetentionMs ?? 300_000;
  }

  /**
   * Starts a job for the file. Returns false, doing nothing, when a job for
   * the same file is already queued or processing.
   */
  enqueue(fileHash: string, filename: string): boolean {
    const existing = this.jobs.get(fileHash);
    if (existing && !isTerminal(existing.status)) {
      console.log(`[Enrichment] Job for ${filename} already ${existing.status}, ignoring request`);
      return false;
    }
    if (existing?.eviction) {
      clearTimeout(existing.eviction);
    }

    const state: JobState = {
      fileHash,
      filename,
      total: 0,
      processed: 0,
      status: 'queued',
      startedAt: new Date(),
      completedAt: null,
      error: null,
      controller: new AbortController(),
      watchdog: null,
      eviction: null,
    };
    this.jobs.set(fileHash, state);
    this.publish(state, 'Queued for categorization');

    const run = this.run(state)
      .catch((err) => {
        this.fail(state, `Enrichment failed: ${errorMessage(err)}`);
      })
      .finally(() => {
        this.running.delete(fileHash);
      });
    this.running.set(fileHash, run);

    return true;
  }

  getJob(fileHash: string): ProcessingJob | null {
    const state = this.jobs.get(fileHash);
    return state ? this.snapshot(state) : null;
  }

  listJobs(): ProcessingJob[] {
    return [...this.jobs.values()].map((state) => this.snapshot(state));
  }

  hasActiveJobs(): boolean {
    return [...this.jobs.values()].some((state) => !isTerminal(state.status));
  }

  /** Resolves once every started job has settled. */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running.values());
    }
  }

  /** Stops in-flight jobs; rows already committed stay enriched. */
  async shutdown(): Promise<void> {
    for (const state of this.jobs.values()) {
      if (!isTerminal(state.status)) {
        state.controller.abort();
        this.fail(state, 'Server shutting down');
      }
      if (state.eviction) {
        clearTimeout(state.eviction);
      }
    }
    await this.whenIdle();
  }

  private async run(state: JobState): Promise<void> {
    // Hand control back so the caller's response goes out first
    await nextTick();
    if (isTerminal(state.status)) return;

    const rows = this.store.unenrichedTransactions(state.fileHash);
    state.total = rows.length;
    state.status = 'processing';
    this.armWatchdog(state);
    this.publish(state, `Categorizing ${rows.length} transactions`);
    console.log(`[Enrichment] ${state.filename}: ${rows.length} transactions to categorize`);

    const { signal } = state.controller;

    for (const row of rows) {
      if (signal.aborted) return;

      let classification: Classification | null = null;
      try {
        classification = await this.classifier.classify(row, { signal });
      } catch (err) {
        if (signal.aborted) return;
        if (err instanceof ClassifierUnavailableError) {
          this.fail(state, err.message);
          return;
        }
        // One bad answer: the row keeps its fast-path category
        console.warn(`[Enrichment] Keeping fast-path category for "${row.description}": ${errorMessage(err)}`);
      }

      // The watchdog may have given up on us while we were waiting
      if (signal.aborted) return;

      if (classification) {
        this.store.updateTransactionEnrichment(
          row.id,
          classification.category,
          normalizeTags([...row.tags, ...classification.tags])
        );
      }

      state.processed++;
      this.armWatchdog(state);
      this.publish(state, `Categorized ${state.processed} of ${state.total} transactions`);
    }

    this.complete(state);
  }

  private armWatchdog(state: JobState) {
    if (state.watchdog) {
      clearTimeout(state.watchdog);
    }
    state.watchdog = setTimeout(() => {
      if (isTerminal(state.status)) return;
      console.error(`[Enrichment] ${state.filename}: no progress in ${this.watchdogMs}ms, giving up`);
      state.controller.abort();
      this.fail(state, `Enrichment stalled: no progress for ${Math.round(this.watchdogMs / 1000)}s`);
    }, this.watchdogMs);
    state.watchdog.unref();
  }

  private complete(state: JobState) {
    this.settle(state, 'complete', null);
    console.log(`[Enrichment] ${state.filename}: categorized ${state.processed}/${state.total}`);
    this.publish(state, `Categorization complete: ${state.processed} transactions processed`);
  }

  private fail(state: JobState, message: string) {
    if (isTerminal(state.status)) return;
    this.settle(state, 'error', message);
    console.error(`[Enrichment] ${state.filename}: ${message} (${state.processed}/${state.total} done)`);
    this.publish(state, message);
  }

  private settle(state: JobState, status: 'complete' | 'error', error: string | null) {
    state.status = status;
    state.error = error;
    state.completedAt = new Date();
    if (state.watchdog) {
      clearTimeout(state.watchdog);
      state.watchdog = null;
    }
    state.eviction = setTimeout(() => {
      if (this.jobs.get(state.fileHash) === state) {
        this.jobs.delete(state.fileHash);
      }
    }, this.jobRetentionMs);
    state.eviction.unref();
  }

  private publish(state: JobState, message: string) {
    this.progress.publish({
      fileHash: state.fileHash,
      status: state.status,
      processed: state.processed,
      total: state.total,
      message,
    });
  }

  private snapshot(state: JobState): ProcessingJob {
    return {
      fileHash: state.fileHash,
      filename: state.filename,
      total: state.total,
      processed: state.processed,
      status: state.status,
      startedAt: state.startedAt.toISOString(),
      completedAt: state.completedAt ? state.completedAt.toISOString() : null,
      elapsedSeconds: differenceInSeconds(state.completedAt ?? new Date(), state.startedAt),
      error: state.error,
    };
  }
}
