/**
 * Poller
 *
 * Base for the watchers: runs poll() in a setTimeout loop until disposed.
 * A failed poll is logged and retried after the back-off delay.
 */

import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { TypedEmitter, type EventMap } from '../supervisor/emitter.js';
import type { ApiClient } from '../supervisor/types.js';

export interface PollerOptions {
  /** Target time between the starts of two polls */
  intervalMs?: number;
  /** Delay after a failed poll */
  backoffMs?: number;
}

export abstract class Poller<Events extends EventMap<Events>> extends TypedEmitter<Events> {
  protected readonly client: ApiClient;
  private readonly name: string;
  private readonly intervalMs: number;
  private readonly backoffMs: number;

  private running = false;
  private disposed = false;
  private timeoutId: ReturnType<typeof setTimeout> | null = null;
  private inFlight: AbortController | null = null;

  constructor(name: string, client: ApiClient, intervalMs: number, backoffMs: number) {
    super();
    this.name = name;
    this.client = client;
    this.intervalMs = intervalMs;
    this.backoffMs = backoffMs;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  start(): void {
    if (this.running || this.disposed) return;
    this.running = true;
    logger.debug(`${this.name} started`);
    this.timeoutId = setTimeout(this.loop, 0);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.running = false;
    if (this.timeoutId) {
      clearTimeout(this.timeoutId);
      this.timeoutId = null;
    }
    this.inFlight?.abort();
    this.inFlight = null;
    this.removeAllListeners();
    logger.debug(`${this.name} disposed`);
  }

  /**
   * Run a single poll. Rejects when the poll fails.
   */
  async pollOnce(): Promise<void> {
    if (this.disposed) return;

    const controller = new AbortController();
    this.inFlight = controller;
    try {
      await this.poll(controller.signal);
    } finally {
      if (this.inFlight === controller) this.inFlight = null;
    }
  }

  protected abstract poll(signal: AbortSignal): Promise<void>;

  private readonly loop = async (): Promise<void> => {
    this.timeoutId = null;
    if (!this.running) return;

    const startTime = Date.now();
    let delay: number;
    try {
      await this.pollOnce();
      delay = Math.max(0, this.intervalMs - (Date.now() - startTime));
    } catch (error) {
      if (!this.running) return;
      logger.warn(`${this.name} poll failed, retrying in ${this.backoffMs}ms: ${errorMessage(error)}`);
      delay = this.backoffMs;
    }

    if (this.running) {
      this.timeoutId = setTimeout(this.loop, delay);
    }
  };
}
