import type { JobMessage } from './types.js';

/**
 * Unbounded single-consumer channel from job tasks to the registry owner.
 */
export class CompletionBus {
  private queue: JobMessage[] = [];
  private waiter: ((message: JobMessage | undefined) => void) | undefined;
  private closed = false;

  get size(): number {
    return this.queue.length;
  }

  send(message: JobMessage): void {
    if (this.closed) {
      throw new Error(`Completion bus is closed; dropped ${message.type} message for job ${message.jobId}`);
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(message);
      return;
    }
    this.queue.push(message);
  }

  /**
   * Every message sent so far, without waiting
   */
  drain(): JobMessage[] {
    const messages = this.queue;
    this.queue = [];
    return messages;
  }

  /**
   * The next message; undefined once the bus is closed and empty
   */
  next(): Promise<JobMessage | undefined> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve(undefined);
    if (this.waiter) {
      return Promise.reject(new Error('Completion bus already has a consumer waiting'));
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.(undefined);
  }
}
