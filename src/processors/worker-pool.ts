/**
 * Band Worker Pool
 *
 * Fixed set of worker threads that run Sobel kernel passes over row bands
 * of SharedArrayBuffer-backed planes. Workers are spawned lazily and a
 * crashed worker is replaced on its next use.
 */

import os from 'os';
import { Worker } from 'worker_threads';

import { createChildLogger } from '../utils/logger.js';
import { ProcessingError, toError } from '../utils/errors.js';
import { grayscaleRows, sobelRows } from './sobel.js';
import type { ProcessingPath } from '../types/pipeline.types.js';

const logger = createChildLogger({ service: 'band-worker-pool' });

export interface GrayscaleBandTask {
  kind: 'grayscale';
  pixels: SharedArrayBuffer;
  channels: number;
  gray: SharedArrayBuffer;
  width: number;
  startRow: number;
  endRow: number;
}

export interface SobelBandTask {
  kind: 'sobel';
  gray: SharedArrayBuffer;
  edges: SharedArrayBuffer;
  width: number;
  height: number;
  startRow: number;
  endRow: number;
}

export type BandTask = GrayscaleBandTask | SobelBandTask;

export interface BandWorkerPoolOptions {
  /** Number of worker threads (default: available hardware parallelism) */
  size?: number;
  /** Processing path reported in errors raised by this pool (default: 'fast') */
  path?: ProcessingPath;
}

interface TaskReply {
  id: number;
  ok: boolean;
  error?: string;
}

interface PendingTask {
  resolve: () => void;
  reject: (error: Error) => void;
}

interface WorkerSlot {
  worker: Worker;
  pending: Map<number, PendingTask>;
}

const WORKER_SOURCE = `
const { parentPort } = require('node:worker_threads');
${grayscaleRows.toString()}
${sobelRows.toString()}
parentPort.on('message', ({ id, task }) => {
  try {
    if (task.kind === 'grayscale') {
      grayscaleRows(new Uint8Array(task.pixels), task.channels, task.width, new Uint8Array(task.gray), task.startRow, task.endRow);
    } else {
      sobelRows(new Uint8Array(task.gray), task.width, task.height, new Uint8Array(task.edges), task.startRow, task.endRow);
    }
    parentPort.postMessage({ id, ok: true });
  } catch (error) {
    parentPort.postMessage({ id, ok: false, error: error instanceof Error ? error.message : String(error) });
  }
});
`;

function isTaskReply(value: unknown): value is TaskReply {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'number' &&
    'ok' in value &&
    typeof value.ok === 'boolean'
  );
}

export class BandWorkerPool {
  public readonly size: number;
  public readonly path: ProcessingPath;
  private readonly slots: Array<WorkerSlot | null>;
  private nextTaskId = 0;
  private closed = false;

  constructor(options: BandWorkerPoolOptions = {}) {
    this.size = Math.max(1, Math.floor(options.size ?? os.availableParallelism()));
    this.path = options.path ?? 'fast';
    this.slots = new Array<WorkerSlot | null>(this.size).fill(null);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Run one task per band, spread round-robin over the workers, and wait for
   * every task to settle before resolving or rejecting.
   */
  async run(tasks: BandTask[]): Promise<void> {
    if (this.closed) {
      throw new ProcessingError('Worker pool is closed', this.path);
    }

    const outcomes = await Promise.allSettled(
      tasks.map((task, index) => this.dispatch(index % this.size, task))
    );

    const failure = outcomes.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (failure) {
      throw failure.reason instanceof ProcessingError
        ? failure.reason
        : new ProcessingError('Band task failed', this.path, toError(failure.reason));
    }
  }

  /**
   * Terminate all workers. Tasks still queued on a worker are rejected.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const terminations: Promise<number>[] = [];
    for (let index = 0; index < this.slots.length; index++) {
      const slot = this.slots[index];
      if (!slot) continue;
      this.slots[index] = null;
      this.rejectPending(slot, new ProcessingError('Worker pool closed', this.path));
      terminations.push(slot.worker.terminate());
    }

    await Promise.all(terminations);
    logger.debug({ path: this.path, size: this.size }, 'Worker pool closed');
  }

  private dispatch(index: number, task: BandTask): Promise<void> {
    const slot = this.ensureSlot(index);
    const id = ++this.nextTaskId;

    return new Promise<void>((resolve, reject) => {
      slot.pending.set(id, { resolve, reject });
      slot.worker.postMessage({ id, task });
    });
  }

  private ensureSlot(index: number): WorkerSlot {
    const existing = this.slots[index];
    if (existing) return existing;

    const worker = new Worker(WORKER_SOURCE, { eval: true });
    worker.unref();
    const slot: WorkerSlot = { worker, pending: new Map() };

    worker.on('message', (message: unknown) => {
      if (!isTaskReply(message)) {
        logger.warn({ worker: index }, 'Ignoring malformed worker reply');
        return;
      }
      const pending = slot.pending.get(message.id);
      if (!pending) return;
      slot.pending.delete(message.id);
      if (message.ok) {
        pending.resolve();
      } else {
        pending.reject(new ProcessingError(message.error ?? 'Band task failed', this.path));
      }
    });

    worker.on('error', (error) => {
      logger.error({ path: this.path, worker: index, error: error.message }, 'Edge worker crashed');
      this.retireSlot(index, slot, new ProcessingError('Edge worker crashed', this.path, error));
    });

    worker.on('exit', (code) => {
      this.retireSlot(index, slot, new ProcessingError(`Edge worker exited with code ${code}`, this.path));
    });

    this.slots[index] = slot;
    logger.debug({ worker: index }, 'Edge worker started');
    return slot;
  }

  private retireSlot(index: number, slot: WorkerSlot, error: ProcessingError): void {
    if (this.slots[index] === slot) {
      this.slots[index] = null;
    }
    this.rejectPending(slot, error);
  }

  private rejectPending(slot: WorkerSlot, error: ProcessingError): void {
    for (const pending of slot.pending.values()) {
      pending.reject(error);
    }
    slot.pending.clear();
  }
}
