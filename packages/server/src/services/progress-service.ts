import { EventEmitter } from 'events';
import { errorMessage } from '../errors.js';

export type ProgressStatus = 'queued' | 'processing' | 'complete' | 'error';

export interface ProgressEvent {
  fileHash: string;
  status: ProgressStatus;
  processed: number;
  total: number;
  message: string;
  timestamp: string;
}

export type ProgressListener = (event: ProgressEvent) => void;

export function isTerminal(status: ProgressStatus): boolean {
  return status === 'complete' || status === 'error';
}

/**
 * Latest progress per file hash, plus push delivery to subscribers.
 * Subscribers come and go (SSE reconnects) without affecting publishers.
 */
export class ProgressTracker {
  private readonly latest = new Map<string, { event: ProgressEvent; expiresAt: number }>();
  private readonly emitter = new EventEmitter();

  constructor(
    private readonly ttlMs = 900_000,
    private readonly now: () => number = Date.now
  ) {
    this.emitter.setMaxListeners(0);
  }

  publish(update: Omit<ProgressEvent, 'timestamp'>): ProgressEvent {
    const current = this.now();
    const event: ProgressEvent = { ...update, timestamp: new Date(current).toISOString() };

    this.prune(current);
    this.latest.set(event.fileHash, { event, expiresAt: current + this.ttlMs });
    this.emitter.emit(event.fileHash, event);
    return event;
  }

  get(fileHash: string): ProgressEvent | null {
    this.prune(this.now());
    return this.latest.get(fileHash)?.event ?? null;
  }

  subscribe(fileHash: string, listener: ProgressListener): () => void {
    const safeListener = (event: ProgressEvent) => {
      try {
        listener(event);
      } catch (err) {
        console.error(`[Progress] Listener for ${fileHash.substring(0, 8)} failed:`, errorMessage(err));
      }
    };
    this.emitter.on(fileHash, safeListener);
    return () => {
      this.emitter.off(fileHash, safeListener);
    };
  }

  listenerCount(fileHash: string): number {
    return this.emitter.listenerCount(fileHash);
  }

  private prune(current: number) {
    for (const [fileHash, entry] of this.latest) {
      if (entry.expiresAt <= current) {
        this.latest.delete(fileHash);
      }
    }
  }
}
