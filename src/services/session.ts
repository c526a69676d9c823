/**
 * A simulation session: one exclusively owned engine model plus lifecycle metadata.
 */

import type { EngineModel, SessionInfo } from '../types.js';

export type Clock = () => number;

// Monotonic, but on the wall-clock scale so timestamps stay presentable.
export const monotonicClock: Clock = () => performance.timeOrigin + performance.now();

export type ExclusiveResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'released' };

export class Session {
  readonly createdAt: number;
  private lastAccess: number;
  private lock: Promise<void> = Promise.resolve();
  private released = false;

  constructor(
    readonly id: string,
    private readonly model: EngineModel,
    readonly sourcePath: string,
    now: number
  ) {
    this.createdAt = now;
    this.lastAccess = now;
  }

  get lastAccessedAt(): number {
    return this.lastAccess;
  }

  get isReleased(): boolean {
    return this.released;
  }

  touch(now: number): void {
    this.lastAccess = now;
  }

  isExpired(now: number, ttlMs: number): boolean {
    return now - this.lastAccess > ttlMs;
  }

  /**
   * Run `fn` against the model while holding the session lock.
   * Calls queue in arrival order; a call that reaches the front after
   * release does not run.
   */
  async runExclusive<T>(fn: (model: EngineModel) => Promise<T>): Promise<ExclusiveResult<T>> {
    const previous = this.lock;
    let unlock: () => void = () => {};
    this.lock = new Promise<void>(resolve => {
      unlock = resolve;
    });

    await previous;
    try {
      if (this.released) {
        return { status: 'released' };
      }
      return { status: 'ok', value: await fn(this.model) };
    } finally {
      unlock();
    }
  }

  /**
   * Wait for the in-flight call, then release the model. Idempotent.
   */
  async dispose(): Promise<void> {
    await this.runExclusive(async model => {
      this.released = true;
      await model.release();
    });
  }

  info(): SessionInfo {
    return {
      sessionId: this.id,
      sourcePath: this.sourcePath,
      createdAt: this.createdAt,
      lastAccessedAt: this.lastAccess
    };
  }
}
