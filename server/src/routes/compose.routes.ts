import { Router, Request, Response } from 'express';
import { Server as SocketIOServer } from 'socket.io';
import { v4 as uuidv4 } from 'uuid';
import { upload } from '../config/multer';
import { BackdropRegistry } from '../services/backdrop-registry.service';
import { Orientation, isOrientation } from '../services/foreground-analyzer.service';
import { BoundingBox, ImageService, OutputFormat, RgbaImage } from '../services/image.service';
import {
  InvalidPlacementError,
  OutOfBoundsError,
  PipelineErrorKind,
  isPipelineError,
} from '../services/pipeline.errors';
import { PipelineOutcome, PipelineRequest, PipelineService, PipelineStage } from '../services/pipeline.service';
import { PlacementOverrides } from '../services/placement-planner.service';
import { MaskMethod, isMaskMethod } from '../services/region-masker.service';
import { WorkerManagerService } from '../services/worker-manager.service';

export interface ComposeRouterDeps {
  backdrops: BackdropRegistry;
  pipeline: PipelineService;
  imageService: ImageService;
  workerManager?: WorkerManagerService;
  io?: SocketIOServer;
}

type FormFields = Record<string, unknown>;

const TRUE_VALUES = ['true', '1'];
const FALSE_VALUES = ['false', '0'];

/**
 * A form field the route cannot interpret; answered with a plain 400
 */
export class InvalidFieldError extends Error {
  constructor(readonly field: string, message: string) {
    super(message);
    this.name = 'InvalidFieldError';
  }
}

const STATUS_BY_KIND: Record<PipelineErrorKind, number> = {
  'not-found': 404,
  'invalid-placement': 400,
  'out-of-bounds': 400,
  'empty-foreground': 422,
  'compositing': 500,
};

export function statusFor(error: Error): number {
  return isPipelineError(error) ? STATUS_BY_KIND[error.kind] : 500;
}

function field(body: FormFields, name: string): string | undefined {
  const value = body[name];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function optionalNumber(body: FormFields, name: string): number | undefined {
  const value = field(body, name);
  return value === undefined ? undefined : Number(value);
}

function optionalBoolean(body: FormFields, name: string): boolean | undefined {
  const value = field(body, name);
  if (value === undefined) return undefined;
  if (TRUE_VALUES.includes(value)) return true;
  if (FALSE_VALUES.includes(value)) return false;
  throw new InvalidFieldError(name, `${name} must be true, false, 1 or 0, got ${value}`);
}

function outputFormat(body: FormFields): OutputFormat {
  const value = field(body, 'format');
  if (value === undefined || value === 'png') return 'png';
  if (value === 'jpeg') return 'jpeg';
  throw new InvalidFieldError('format', `format must be png or jpeg, got ${value}`);
}

function optionalOrientation(body: FormFields): Orientation | undefined {
  const value = field(body, 'orientation');
  if (value !== undefined && !isOrientation(value)) {
    throw new InvalidFieldError('orientation', `Unknown orientation: ${value}`);
  }
  return value;
}

function optionalMaskMethod(body: FormFields): MaskMethod | undefined {
  const value = field(body, 'maskMethod');
  if (value !== undefined && !isMaskMethod(value)) {
    throw new InvalidFieldError('maskMethod', `Unknown mask method: ${value}`);
  }
  return value;
}

function parsePlacement(body: FormFields): PlacementOverrides {
  const overrides: PlacementOverrides = {
    scaleFactor: optionalNumber(body, 'scale'),
    anchorX: optionalNumber(body, 'anchorX'),
    anchorY: optionalNumber(body, 'anchorY'),
  };

  const verticalReference = field(body, 'verticalReference');
  if (verticalReference !== undefined) {
    if (verticalReference !== 'ground' && verticalReference !== 'center') {
      throw new InvalidPlacementError(
        'verticalReference',
        `verticalReference must be "ground" or "center", got ${verticalReference}`
      );
    }
    overrides.verticalReference = verticalReference;
  }
  return overrides;
}

/**
 * plateRegion arrives as JSON: {"xMin":..,"yMin":..,"xMax":..,"yMax":..}
 */
export function parsePlateRegion(raw: string | undefined): BoundingBox | undefined {
  if (raw === undefined) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new OutOfBoundsError(`plateRegion is not valid JSON: ${raw}`);
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new OutOfBoundsError('plateRegion must be an object with xMin, yMin, xMax, yMax');
  }

  const record: Record<string, unknown> = { ...parsed };
  const { xMin, yMin, xMax, yMax } = record;
  if (typeof xMin !== 'number' || typeof yMin !== 'number' || typeof xMax !== 'number' || typeof yMax !== 'number') {
    throw new OutOfBoundsError('plateRegion must be an object with numeric xMin, yMin, xMax, yMax');
  }
  return { xMin, yMin, xMax, yMax };
}

export function createComposeRouter(deps: ComposeRouterDeps): Router {
  const router = Router();
  const { backdrops, pipeline, imageService, workerManager, io } = deps;

  /**
   * Composite an uploaded cutout onto a registered backdrop
   */
  router.post('/', upload.single('cutout'), async (req: Request, res: Response) => {
    const jobId = uuidv4();
    const body: FormFields = req.body ?? {};

    const file = req.file;
    if (!file) {
      return res.status(400).json({ error: 'No cutout uploaded' });
    }

    const backdropId = field(body, 'backdropId');
    if (!backdropId) {
      return res.status(400).json({ error: 'Missing required "backdropId" parameter' });
    }

    const socketId = field(body, 'socketId');
    const onStage = (stage: PipelineStage) => {
      if (io && socketId) {
        io.to(socketId).emit('pipeline:stage', { jobId, stage });
      }
    };

    try {
      const format = outputFormat(body);
      const shadowDefault = backdrops.has(backdropId) ? backdrops.get(backdropId).shadowByDefault : true;
      const fields = {
        backdropId,
        orientationOverride: optionalOrientation(body),
        placement: parsePlacement(body),
        shadow: optionalBoolean(body, 'shadow') ?? shadowDefault,
        reflection: optionalBoolean(body, 'reflection') ?? false,
        plateRegion: parsePlateRegion(field(body, 'plateRegion')),
        maskMethod: optionalMaskMethod(body),
      };

      let cutout: RgbaImage;
      try {
        cutout = await imageService.decode(file.buffer);
      } catch (decodeError: unknown) {
        const reason = decodeError instanceof Error ? decodeError.message : String(decodeError);
        return res.status(400).json({ error: 'InvalidImage', message: `Could not decode cutout: ${reason}` });
      }

      const request: Omit<PipelineRequest, 'onStage'> = { ...fields, cutout };

      let outcome: PipelineOutcome;
      if (workerManager && backdrops.has(backdropId)) {
        outcome = await workerManager.executePipelineJob(jobId, backdrops.get(backdropId), request, { onStage });
      } else {
        outcome = await pipeline.run({ ...request, onStage });
      }

      if (!outcome.ok) {
        return res.status(statusFor(outcome.error)).json({
          error: outcome.error.name,
          kind: isPipelineError(outcome.error) ? outcome.error.kind : undefined,
          message: outcome.error.message,
          stage: outcome.failedAt,
        });
      }

      const { result } = outcome;
      const mime = format === 'jpeg' ? 'image/jpeg' : 'image/png';
      const [finalBuffer, transparentBuffer] = await Promise.all([
        imageService.encode(result.finalImage, format),
        imageService.encode(result.transparentCutout, 'png'),
      ]);

      res.json({
        id: jobId,
        orientation: result.orientation,
        orientationSource: result.orientationSource,
        scaleUsed: result.scaleUsed,
        backdrop: result.backdropId,
        boundingBox: result.boundingBox,
        placement: result.placement,
        masked: result.maskedRegion !== undefined,
        processingTime: Math.round(result.durationMs) / 1000,
        width: result.finalImage.width,
        height: result.finalImage.height,
        finalImage: `data:${mime};base64,${finalBuffer.toString('base64')}`,
        transparentImage: `data:image/png;base64,${transparentBuffer.toString('base64')}`,
      });
    } catch (caught: unknown) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      if (error instanceof InvalidFieldError) {
        return res.status(400).json({ error: error.message, field: error.field });
      }
      if (!isPipelineError(error)) {
        console.error(`[Compose] Job ${jobId} failed:`, error);
      }
      res.status(statusFor(error)).json({
        error: error.name,
        kind: isPipelineError(error) ? error.kind : undefined,
        message: error.message,
        stage: 'received',
      });
    }
  });

  return router;
}
