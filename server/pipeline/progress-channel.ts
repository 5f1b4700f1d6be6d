import type { PipelineStage, ProgressEvent } from '@shared/schema';

type Waiter = (event: ProgressEvent) => void;

/**
 * In-memory FIFO between the orchestrator (producer) and the stream observers
 * (consumers). Each event is delivered once, to the longest-waiting pull.
 * Events are not persisted; a restart loses whatever was queued.
 */
export class ProgressChannel {
  private readonly queue: ProgressEvent[] = [];
  private readonly waiters: Waiter[] = [];

  push(event: ProgressEvent): void {
    const deliver = this.waiters.shift();
    if (deliver) {
      deliver(event);
      return;
    }
    this.queue.push(event);
  }

  completed(step: PipelineStage): void {
    this.push({ tag: step, step, status: 'completed', at: new Date().toISOString() });
  }

  failed(step: PipelineStage): void {
    this.push({ tag: `failed_${step}`, step, status: 'failed', at: new Date().toISOString() });
  }

  /**
   * Oldest queued event, or the next one pushed within `timeoutMs`. Resolves
   * null on timeout or when `signal` aborts. Concurrent pulls wait
   * independently.
   */
  pull(timeoutMs: number, signal?: AbortSignal): Promise<ProgressEvent | null> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (signal?.aborted) return Promise.resolve(null);

    return new Promise<ProgressEvent | null>((resolve) => {
      const finish = (event: ProgressEvent | null) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        resolve(event);
      };
      const waiter: Waiter = (event) => finish(event);
      const onAbort = () => finish(null);
      const timer = setTimeout(() => finish(null), timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  get size(): number {
    return this.queue.length;
  }
}
