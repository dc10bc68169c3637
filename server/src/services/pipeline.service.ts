/**
 * Pipeline Service
 * Runs analyze -> plan -> composite -> (mask) for one cutout and assembles
 * the result record. Stateless apart from the read-only backdrop registry.
 */
import { PipelineConfig } from '../config/pipeline.config';
import { BackdropRegistry } from './backdrop-registry.service';
import { CompositorService, Placement } from './compositor.service';
import { ForegroundAnalyzerService, Orientation } from './foreground-analyzer.service';
import { BoundingBox, ImageService, RgbaImage } from './image.service';
import { OutOfBoundsError } from './pipeline.errors';
import { PlacementOverrides, PlacementPlan, PlacementPlannerService } from './placement-planner.service';
import { MaskMethod, RegionMaskerService, assertRegionWithin } from './region-masker.service';

export type PipelineStage =
  | 'received'
  | 'analyzed'
  | 'planned'
  | 'composited'
  | 'masked'
  | 'done'
  | 'failed';

const TRANSITIONS: Record<PipelineStage, readonly PipelineStage[]> = {
  received: ['analyzed', 'failed'],
  analyzed: ['planned', 'failed'],
  planned: ['composited', 'failed'],
  composited: ['masked', 'done', 'failed'],
  masked: ['done', 'failed'],
  done: [],
  failed: [],
};

export interface PipelineRequest {
  cutout: RgbaImage;
  backdropId: string;
  orientationOverride?: Orientation;
  placement?: PlacementOverrides;
  shadow: boolean;
  reflection: boolean;
  plateRegion?: BoundingBox;     // Cutout coordinates
  maskMethod?: MaskMethod;
  onStage?: (stage: PipelineStage) => void;
}

export interface CompositeResult {
  finalImage: RgbaImage;
  transparentCutout: RgbaImage;  // Trimmed, before compositing
  orientation: Orientation;
  orientationSource: 'classified' | 'override';
  ratio: number;
  boundingBox: BoundingBox;
  plan: PlacementPlan;
  placement: Placement;
  scaleUsed: number;
  backdropId: string;
  maskedRegion?: BoundingBox;    // Canvas coordinates
  durationMs: number;
}

export type PipelineOutcome =
  | { ok: true; result: CompositeResult }
  | { ok: false; error: Error; failedAt: PipelineStage };

export class PipelineService {
  private readonly analyzer: ForegroundAnalyzerService;
  private readonly planner: PlacementPlannerService;
  private readonly compositor: CompositorService;
  private readonly masker: RegionMaskerService;

  constructor(
    private readonly backdrops: BackdropRegistry,
    config: PipelineConfig,
    imageService: ImageService = new ImageService()
  ) {
    this.analyzer = new ForegroundAnalyzerService(config.alphaThreshold);
    this.planner = new PlacementPlannerService(config.groundLevel);
    this.compositor = new CompositorService(imageService, {
      maxHeightFraction: config.maxHeightFraction,
      shadowOpacity: config.shadowOpacity,
      reflectionOpacity: config.reflectionOpacity,
      reflectionMaxPixels: config.reflectionMaxPixels,
    });
    this.masker = new RegionMaskerService({
      minBlockSize: config.maskMinBlockSize,
      blurRadius: config.maskBlurRadius,
    });
  }

  async run(request: PipelineRequest): Promise<PipelineOutcome> {
    let stage: PipelineStage = 'received';
    const advance = (next: PipelineStage) => {
      if (!TRANSITIONS[stage].includes(next)) {
        throw new Error(`Illegal pipeline transition ${stage} -> ${next}`);
      }
      stage = next;
      request.onStage?.(next);
    };

    request.onStage?.(stage);

    try {
      const backdrop = this.backdrops.get(request.backdropId);
      if (request.plateRegion) {
        assertRegionWithin(request.cutout, request.plateRegion);
      }

      const startedAt = performance.now();
      const analysis = this.analyzer.analyze(request.cutout);
      const orientation = request.orientationOverride ?? analysis.orientation;
      advance('analyzed');

      const plan = this.planner.plan(orientation, request.placement, backdrop.floorLevel);
      advance('planned');

      const composite = await this.compositor.composite(analysis.trimmed, plan, backdrop, {
        shadow: request.shadow,
        reflection: request.reflection,
      });
      advance('composited');

      let finalImage = composite.image;
      let maskedRegion: BoundingBox | undefined;
      if (request.plateRegion) {
        maskedRegion = mapToCanvas(request.plateRegion, analysis.boundingBox, analysis.trimmed, composite.placement);
        finalImage = this.masker.maskRegion(finalImage, maskedRegion, request.maskMethod ?? 'pixelate');
        advance('masked');
      }

      advance('done');
      const durationMs = performance.now() - startedAt;

      console.log(
        `[Pipeline] ${request.backdropId}: ${orientation} ratio=${analysis.ratio.toFixed(3)} ` +
        `scale=${composite.scaleUsed.toFixed(3)} in ${durationMs.toFixed(1)}ms`
      );

      return {
        ok: true,
        result: {
          finalImage,
          transparentCutout: analysis.trimmed,
          orientation,
          orientationSource: request.orientationOverride ? 'override' : 'classified',
          ratio: analysis.ratio,
          boundingBox: analysis.boundingBox,
          plan,
          placement: composite.placement,
          scaleUsed: composite.scaleUsed,
          backdropId: request.backdropId,
          maskedRegion,
          durationMs,
        },
      };
    } catch (caught: unknown) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      const failedAt = stage;
      stage = 'failed';
      request.onStage?.('failed');
      console.warn(`[Pipeline] Failed after ${failedAt}: ${error.message}`);
      return { ok: false, error, failedAt };
    }
  }
}

/**
 * Carries a cutout-space region through trim, resize and placement, clamped
 * to the placed car
 */
export function mapToCanvas(
  region: BoundingBox,
  trimBox: BoundingBox,
  trimmed: RgbaImage,
  placement: Placement
): BoundingBox {
  const sx = placement.width / trimmed.width;
  const sy = placement.height / trimmed.height;

  const xMin = Math.max(placement.left, placement.left + Math.floor((region.xMin - trimBox.xMin) * sx));
  const yMin = Math.max(placement.top, placement.top + Math.floor((region.yMin - trimBox.yMin) * sy));
  const xMax = Math.min(
    placement.left + placement.width - 1,
    placement.left + Math.ceil((region.xMax - trimBox.xMin + 1) * sx) - 1
  );
  const yMax = Math.min(
    placement.top + placement.height - 1,
    placement.top + Math.ceil((region.yMax - trimBox.yMin + 1) * sy) - 1
  );

  if (xMin > xMax || yMin > yMax) {
    throw new OutOfBoundsError(
      `Plate region (${region.xMin}, ${region.yMin})-(${region.xMax}, ${region.yMax}) does not overlap the vehicle`
    );
  }

  return { xMin, yMin, xMax, yMax };
}
