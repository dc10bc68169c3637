/**
 * Pipeline error taxonomy
 * Every failure a pipeline stage can raise is one of these; nothing is
 * downgraded to a fallback image.
 */

export type PipelineErrorKind =
  | 'empty-foreground'
  | 'invalid-placement'
  | 'compositing'
  | 'out-of-bounds'
  | 'not-found';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Cutout has no pixel above the alpha threshold. Terminal, never retried. */
export class EmptyForegroundError extends PipelineError {
  readonly kind = 'empty-foreground';
}

/** A caller-supplied placement override is outside its declared range. */
export class InvalidPlacementError extends PipelineError {
  readonly kind = 'invalid-placement';

  constructor(readonly field: string, message: string) {
    super(message);
  }
}

/** Placed foreground does not fit on the canvas. */
export class CompositingError extends PipelineError {
  readonly kind = 'compositing';
}

export class OutOfBoundsError extends PipelineError {
  readonly kind = 'out-of-bounds';
}

export class BackdropNotFoundError extends PipelineError {
  readonly kind = 'not-found';

  constructor(readonly backdropId: string) {
    super(`Backdrop not found: ${backdropId}`);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Plain form of an error, for crossing a worker thread boundary
 */
export interface SerializedError {
  name: string;
  message: string;
  kind?: PipelineErrorKind;
  field?: string;
  backdropId?: string;
}

export function serializeError(error: Error): SerializedError {
  const serialized: SerializedError = { name: error.name, message: error.message };
  if (isPipelineError(error)) {
    serialized.kind = error.kind;
  }
  if (error instanceof InvalidPlacementError) {
    serialized.field = error.field;
  }
  if (error instanceof BackdropNotFoundError) {
    serialized.backdropId = error.backdropId;
  }
  return serialized;
}

export function deserializeError(serialized: SerializedError): Error {
  switch (serialized.kind) {
    case 'empty-foreground':
      return new EmptyForegroundError(serialized.message);
    case 'invalid-placement':
      return new InvalidPlacementError(serialized.field ?? 'unknown', serialized.message);
    case 'compositing':
      return new CompositingError(serialized.message);
    case 'out-of-bounds':
      return new OutOfBoundsError(serialized.message);
    case 'not-found':
      return new BackdropNotFoundError(serialized.backdropId ?? 'unknown');
    default: {
      const error = new Error(serialized.message);
      error.name = serialized.name;
      return error;
    }
  }
}
