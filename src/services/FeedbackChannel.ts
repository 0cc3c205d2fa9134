/**
 * FeedbackChannel - serialized, debounced announcements
 *
 * Messages go through an rxjs Subject drained by `concatMap`, so exactly one
 * announcement runs at a time and each finishes before the next starts.
 * Repeating the last message inside the debounce interval is a no-op.
 *
 * The announcer (speech synthesis, a notification sink) is pluggable and may
 * be unavailable, in which case messages are dropped.
 */

import { defer, firstValueFrom, from, race, Subject, type Subscription, timer } from 'rxjs';
import { concatMap, map } from 'rxjs/operators';
import type { Pluggable } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'FeedbackChannel' });

export interface Announcer {
  /** Resolves once the message has been fully delivered */
  announce(message: string): Promise<void>;
}

export type AnnouncerSlot = Pluggable<Announcer>;

export interface FeedbackChannelOptions {
  /** Identical messages inside this interval are dropped (default 4) */
  debounceSeconds?: number;
  /** Clock in milliseconds, injectable for tests */
  now?: () => number;
}

export interface StopOptions {
  /** How long to wait for queued messages before tearing down (default 5000) */
  timeoutMs?: number;
}

const DEFAULT_OPTIONS: Required<FeedbackChannelOptions> = {
  debounceSeconds: 4.0,
  now: () => Date.now(),
};

export class FeedbackChannel {
  private readonly options: Required<FeedbackChannelOptions>;
  private readonly queue$ = new Subject<string>();
  private readonly subscription: Subscription;
  private idleWaiters: (() => void)[] = [];
  private pending = 0;
  private lastMessage: string | null = null;
  private lastEnqueuedAt = Number.NEGATIVE_INFINITY;
  private accepting = true;

  constructor(
    private readonly announcer: AnnouncerSlot,
    options: FeedbackChannelOptions = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.subscription = this.queue$
      .pipe(concatMap((message) => defer(() => this.deliver(message))))
      .subscribe();
  }

  /**
   * Queue a message for announcement.
   *
   * @returns false when the message was dropped (empty, duplicate within the
   *   debounce interval, announcer unavailable or channel stopped)
   */
  enqueue(message: string): boolean {
    if (!this.accepting || message.length === 0) return false;

    if (this.announcer.status === 'unavailable') {
      logger.debug('Announcer unavailable, dropping message', {
        action: 'enqueue',
        reason: this.announcer.reason,
      });
      return false;
    }

    const now = this.options.now();
    const debounceMs = this.options.debounceSeconds * 1000;
    if (message === this.lastMessage && now - this.lastEnqueuedAt < debounceMs) {
      return false;
    }

    this.lastMessage = message;
    this.lastEnqueuedAt = now;
    this.pending++;
    this.queue$.next(message);
    return true;
  }

  /** Messages queued or being announced */
  get pendingCount(): number {
    return this.pending;
  }

  /**
   * Resolves once every queued message has been announced
   */
  whenIdle(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting messages, let the queue drain up to the timeout, then
   * tear the worker down.
   *
   * @returns true if the queue drained before the timeout
   */
  async stop({ timeoutMs = 5000 }: StopOptions = {}): Promise<boolean> {
    this.accepting = false;

    const drained = await firstValueFrom(
      race(
        from(this.whenIdle()).pipe(map(() => true)),
        timer(timeoutMs).pipe(map(() => false))
      )
    );

    if (!drained) {
      logger.warn('Stopped with messages still queued', {
        action: 'stop',
        pending: this.pending,
      });
    }

    this.subscription.unsubscribe();
    this.queue$.complete();
    return drained;
  }

  private async deliver(message: string): Promise<void> {
    try {
      if (this.announcer.status === 'available') {
        await this.announcer.value.announce(message);
      }
    } catch (error) {
      logger.error('Announcement failed', error, { action: 'announce', message });
    } finally {
      this.pending--;
      if (this.pending === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    }
  }
}
