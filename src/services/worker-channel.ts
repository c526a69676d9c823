/**
 * Newline-delimited JSON request/response channel to one engine worker.
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { z } from 'zod';
import { Errors, SimError, errorMessage } from '../errors/index.js';
import { ReplyEnvelopeSchema } from '../schemas/worker.js';
import { logger } from '../utils/logger.js';

/**
 * The parts of a worker process the channel needs.
 */
export interface WorkerProcess {
  stdin: Writable;
  stdout: Readable;
  kill(): void;
  /**
   * Called once when the process exits or fails to start.
   */
  onExit(listener: (code: number | null) => void): void;
}

interface PendingRequest {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: SimError) => void;
  timer: NodeJS.Timeout;
}

export class WorkerChannel {
  private nextId = 1;
  private pending: Map<number, PendingRequest> = new Map();
  private exitCode: number | null | undefined = undefined;
  private readonly exited: Promise<void>;

  constructor(
    private readonly worker: WorkerProcess,
    private readonly timeoutMs: number
  ) {
    let markExited: () => void = () => {};
    this.exited = new Promise<void>(resolve => {
      markExited = resolve;
    });

    worker.stdin.on('error', (error: Error) => {
      logger.warn('Engine worker stdin error', { error: error.message });
    });

    const lines = createInterface({ input: worker.stdout });
    lines.on('line', line => this.handleLine(line));

    worker.onExit(code => {
      this.exitCode = code;
      lines.close();
      this.rejectAll(code);
      markExited();
    });
  }

  get isAlive(): boolean {
    return this.exitCode === undefined;
  }

  /**
   * Send one request and validate its result against `schema`.
   */
  request<S extends z.ZodTypeAny>(
    method: string,
    params: Record<string, unknown>,
    schema: S
  ): Promise<z.output<S>> {
    if (!this.isAlive) {
      return Promise.reject(Errors.engineCallFailed(method, `engine worker has exited (code ${this.exitCode})`));
    }

    const id = this.nextId++;
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(Errors.workerTimeout(method, this.timeoutMs));
        // The worker is still busy with a request nobody waits for.
        this.worker.kill();
      }, this.timeoutMs);

      this.pending.set(id, { method, resolve, reject, timer });
      this.worker.stdin.write(`${JSON.stringify({ id, method, params })}\n`);
    }).then(result => {
      const parsed = schema.safeParse(result);
      if (!parsed.success) {
        throw Errors.workerProtocol(`invalid "${method}" reply: ${parsed.error.message}`);
      }
      return parsed.data;
    });
  }

  /**
   * Ask the worker to stop, then kill it if it is still running after `graceMs`.
   */
  async close(graceMs: number): Promise<void> {
    if (this.isAlive) {
      this.worker.stdin.write(`${JSON.stringify({ id: this.nextId++, method: 'shutdown', params: {} })}\n`);
      this.worker.stdin.end();

      let timer: NodeJS.Timeout | undefined;
      const graceExpired = new Promise<boolean>(resolve => {
        timer = setTimeout(() => resolve(true), graceMs);
      });
      const timedOut = await Promise.race([this.exited.then(() => false), graceExpired]);
      clearTimeout(timer);

      if (timedOut) {
        logger.warn('Engine worker did not exit in time, killing it', { graceMs });
        this.worker.kill();
      }
    }
    await this.exited;
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;

    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch (error) {
      logger.debug('Ignoring non-protocol worker output', { line: trimmed.slice(0, 200), error: errorMessage(error) });
      return;
    }

    const envelope = ReplyEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      logger.warn('Malformed engine worker reply', { error: envelope.error.message });
      return;
    }

    const reply = envelope.data;
    const pending = this.pending.get(reply.id);
    if (!pending) {
      logger.debug('Reply for unknown request id', { id: reply.id });
      return;
    }

    this.pending.delete(reply.id);
    clearTimeout(pending.timer);

    if (reply.error) {
      pending.reject(Errors.engineCallFailed(pending.method, reply.error.message));
    } else {
      pending.resolve(reply.result);
    }
  }

  private rejectAll(code: number | null): void {
    for (const [id, pending] of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(Errors.engineCallFailed(pending.method, `engine worker exited (code ${code})`));
      this.pending.delete(id);
    }
  }
}
