import {
  BackdropNotFoundError,
  EmptyForegroundError,
  InvalidPlacementError,
  deserializeError,
  isPipelineError,
  serializeError,
} from '../services/pipeline.errors';

describe('pipeline errors', () => {
  it('should tag each error with its kind and class name', () => {
    const error = new EmptyForegroundError('nothing there');

    expect(error.kind).toBe('empty-foreground');
    expect(error.name).toBe('EmptyForegroundError');
    expect(error).toBeInstanceOf(Error);
    expect(isPipelineError(error)).toBe(true);
    expect(isPipelineError(new Error('plain'))).toBe(false);
  });

  it('should rebuild typed errors after crossing a thread boundary', () => {
    const placement = deserializeError(serializeError(new InvalidPlacementError('anchorX', 'anchorX must be in [0, 1]')));
    const missing = deserializeError(serializeError(new BackdropNotFoundError('studio_pink')));

    expect(placement).toBeInstanceOf(InvalidPlacementError);
    expect(placement instanceof InvalidPlacementError && placement.field).toBe('anchorX');
    expect(missing).toBeInstanceOf(BackdropNotFoundError);
    expect(missing.message).toBe('Backdrop not found: studio_pink');
  });

  it('should keep the name and message of untyped errors', () => {
    const original = new TypeError('bad input');

    const rebuilt = deserializeError(serializeError(original));

    expect(isPipelineError(rebuilt)).toBe(false);
    expect(rebuilt.name).toBe('TypeError');
    expect(rebuilt.message).toBe('bad input');
  });
});
