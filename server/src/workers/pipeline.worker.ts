/**
 * Worker thread for one compositing job, so large canvases do not block
 * the main event loop
 */
import { parentPort, workerData } from 'worker_threads';
import { PipelineConfig } from '../config/pipeline.config';
import { Backdrop, BackdropRegistry } from '../services/backdrop-registry.service';
import { PipelineRequest, PipelineService, PipelineStage, CompositeResult } from '../services/pipeline.service';
import { SerializedError, serializeError } from '../services/pipeline.errors';

export interface PipelineWorkerData {
  config: PipelineConfig;
  backdrop: Backdrop;                             // Only the selected one crosses the boundary
  request: Omit<PipelineRequest, 'onStage'>;
}

export interface PipelineWorkerStage {
  type: 'stage';
  stage: PipelineStage;
}

export interface PipelineWorkerResult {
  type: 'result';
  result: CompositeResult;
}

export interface PipelineWorkerFailure {
  type: 'failure';
  error: SerializedError;
  failedAt: PipelineStage;
}

export type PipelineWorkerMessage = PipelineWorkerStage | PipelineWorkerResult | PipelineWorkerFailure;

export type PostMessage = (message: PipelineWorkerMessage) => void;

/**
 * Runs one job against a single-entry registry and reports through post
 */
export async function performJob(data: PipelineWorkerData, post: PostMessage): Promise<void> {
  const registry = new BackdropRegistry([data.backdrop]);
  const pipeline = new PipelineService(registry, data.config);

  const outcome = await pipeline.run({
    ...data.request,
    onStage: stage => post({ type: 'stage', stage }),
  });

  if (outcome.ok) {
    post({ type: 'result', result: outcome.result });
  } else {
    post({ type: 'failure', error: serializeError(outcome.error), failedAt: outcome.failedAt });
  }
}

// Main worker execution
if (parentPort) {
  const port = parentPort;
  const post: PostMessage = message => port.postMessage(message);
  const data: PipelineWorkerData = workerData;
  performJob(data, post).catch((error: unknown) => {
    const failure = error instanceof Error ? error : new Error(String(error));
    post({ type: 'failure', error: serializeError(failure), failedAt: 'received' });
  });
}
