/**
 * Worker Manager Service
 * Runs pipeline jobs on worker threads, at most maxWorkers at a time;
 * jobs beyond that wait in FIFO order
 */
import { Worker } from 'worker_threads';
import os from 'os';
import path from 'path';
import { PipelineConfig } from '../config/pipeline.config';
import { Backdrop } from './backdrop-registry.service';
import { PipelineOutcome, PipelineRequest, PipelineStage } from './pipeline.service';
import { deserializeError } from './pipeline.errors';
import { PipelineWorkerData, PipelineWorkerMessage } from '../workers/pipeline.worker';

export interface WorkerJobOptions {
  onStage?: (stage: PipelineStage) => void;
}

interface PendingJob {
  jobId: string;
  start: () => void;
  reject: (error: Error) => void;
}

export class WorkerManagerService {
  private activeWorkers: Map<string, Worker> = new Map();
  private pending: PendingJob[] = [];
  readonly maxWorkers: number;

  constructor(private readonly config: PipelineConfig) {
    this.maxWorkers = config.maxWorkers > 0 ? config.maxWorkers : Math.max(1, os.availableParallelism());
  }

  /**
   * Execute a pipeline job in a worker thread.
   * Pipeline failures resolve as a failed outcome; thread crashes reject.
   */
  executePipelineJob(
    jobId: string,
    backdrop: Backdrop,
    request: Omit<PipelineRequest, 'onStage'>,
    options: WorkerJobOptions = {}
  ): Promise<PipelineOutcome> {
    return new Promise((resolve, reject) => {
      const start = () => this.startWorker(jobId, { config: this.config, backdrop, request }, options, resolve, reject);

      if (this.activeWorkers.size < this.maxWorkers) {
        start();
      } else {
        console.log(`[WorkerManager] Job ${jobId} queued (${this.pending.length + 1} waiting)`);
        this.pending.push({ jobId, start, reject });
      }
    });
  }

  private startWorker(
    jobId: string,
    data: PipelineWorkerData,
    options: WorkerJobOptions,
    resolve: (outcome: PipelineOutcome) => void,
    reject: (error: Error) => void
  ): void {
    // Compiled builds ship .js; running from sources needs ts-node in the worker
    const fromSources = path.extname(__filename) === '.ts';
    const workerPath = path.join(__dirname, `../workers/pipeline.worker${fromSources ? '.ts' : '.js'}`);

    console.log(`[WorkerManager] Starting worker for job ${jobId}`);

    const worker = new Worker(workerPath, {
      workerData: data,
      execArgv: fromSources ? ['-r', 'ts-node/register'] : [],
    });

    this.activeWorkers.set(jobId, worker);
    let settled = false;

    worker.on('message', (message: PipelineWorkerMessage) => {
      if (message.type === 'stage') {
        options.onStage?.(message.stage);
      } else if (message.type === 'result') {
        console.log(`[WorkerManager] Job ${jobId} completed successfully`);
        settled = true;
        this.terminateWorker(jobId);
        resolve({ ok: true, result: message.result });
      } else {
        console.warn(`[WorkerManager] Job ${jobId} failed: ${message.error.message}`);
        settled = true;
        this.terminateWorker(jobId);
        resolve({ ok: false, error: deserializeError(message.error), failedAt: message.failedAt });
      }
    });

    worker.on('error', (error) => {
      console.error(`[WorkerManager] Worker error for job ${jobId}:`, error);
      settled = true;
      this.terminateWorker(jobId);
      reject(error);
    });

    worker.on('exit', (code) => {
      if (!settled) {
        settled = true;
        const error = `Worker stopped with exit code ${code}`;
        console.error(`[WorkerManager] ${error}`);
        this.release(jobId);
        reject(new Error(error));
      }
    });
  }

  /**
   * Frees a slot and starts the next queued job
   */
  private release(jobId: string): void {
    this.activeWorkers.delete(jobId);
    while (this.activeWorkers.size < this.maxWorkers) {
      const next = this.pending.shift();
      if (!next) break;
      next.start();
    }
  }

  /**
   * Terminate a specific worker
   */
  terminateWorker(jobId: string): void {
    const worker = this.activeWorkers.get(jobId);
    if (worker) {
      this.release(jobId);
      worker.terminate().catch((error: unknown) => {
        console.error(`[WorkerManager] Failed to terminate worker ${jobId}:`, error);
      });
    }
  }

  /**
   * Terminate all active workers and drop queued jobs
   */
  terminateAll(): void {
    console.log(
      `[WorkerManager] Terminating ${this.activeWorkers.size} active workers, ` +
      `dropping ${this.pending.length} queued jobs`
    );
    const dropped = this.pending;
    this.pending = [];
    for (const job of dropped) {
      job.reject(new Error(`Job ${job.jobId} cancelled: worker manager shutting down`));
    }
    for (const jobId of Array.from(this.activeWorkers.keys())) {
      this.terminateWorker(jobId);
    }
  }

  getActiveWorkerCount(): number {
    return this.activeWorkers.size;
  }

  getQueuedJobCount(): number {
    return this.pending.length;
  }
}
