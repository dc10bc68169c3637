import { DEFAULT_PIPELINE_CONFIG } from '../config/pipeline.config';
import { BackdropRegistry, STUDIO_PRESETS, renderStudioBackdrop } from '../services/backdrop-registry.service';
import { BoundingBox, RgbaImage, createImage } from '../services/image.service';
import {
  BackdropNotFoundError,
  CompositingError,
  EmptyForegroundError,
  InvalidPlacementError,
  OutOfBoundsError,
} from '../services/pipeline.errors';
import { CompositeResult, PipelineOutcome, PipelineRequest, PipelineService, PipelineStage, mapToCanvas } from '../services/pipeline.service';
import { createCutout, getPixel, isInside, setPixel, solidBackdrop } from './helpers/cutout-generator.helper';

const CAR: BoundingBox = { xMin: 20, yMin: 20, xMax: 79, yMax: 59 };

/**
 * 100x80 cutout with a textured 60x40 car
 */
function texturedCutout(): RgbaImage {
  const image = createImage(100, 80);
  for (let y = CAR.yMin; y <= CAR.yMax; y++) {
    for (let x = CAR.xMin; x <= CAR.xMax; x++) {
      setPixel(image, x, y, [(x * 37 + y * 11) % 256, (x * 5 + y * 53) % 256, (x * y) % 256, 255]);
    }
  }
  return image;
}

function expectSuccess(outcome: PipelineOutcome): CompositeResult {
  if (!outcome.ok) {
    throw new Error(`expected success, failed at ${outcome.failedAt}: ${outcome.error.message}`);
  }
  return outcome.result;
}

describe('PipelineService', () => {
  let pipeline: PipelineService;
  let stages: PipelineStage[];

  const request = (overrides: Partial<PipelineRequest> = {}): PipelineRequest => ({
    cutout: texturedCutout(),
    backdropId: 'plain',
    shadow: false,
    reflection: false,
    onStage: stage => stages.push(stage),
    ...overrides,
  });

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const registry = new BackdropRegistry([solidBackdrop('plain', 200, 100, [100, 100, 100, 255], 0.9)]);
    pipeline = new PipelineService(registry, DEFAULT_PIPELINE_CONFIG);
    stages = [];
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('successful runs', () => {
    it('should classify, plan and composite a side view', async () => {
      const result = expectSuccess(await pipeline.run(request()));

      expect(result.orientation).toBe('side');
      expect(result.orientationSource).toBe('classified');
      expect(result.ratio).toBe(1.5);
      expect(result.boundingBox).toEqual(CAR);
      expect(result.transparentCutout.width).toBe(60);
      expect(result.transparentCutout.height).toBe(40);
      // 90x60 at 0.45 width, capped to half the canvas height
      expect(result.placement).toEqual({ left: 63, top: 40, width: 75, height: 50 });
      expect(result.scaleUsed).toBe(0.375);
      expect(result.plan.anchorY).toBe(0.9);
      expect(result.maskedRegion).toBeUndefined();
      expect(result.backdropId).toBe('plain');
      expect(result.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should report the stages in order', async () => {
      await pipeline.run(request());

      expect(stages).toEqual(['received', 'analyzed', 'planned', 'composited', 'done']);
    });

    it('should leave the backdrop outside the car untouched', async () => {
      const result = expectSuccess(await pipeline.run(request()));

      expect(getPixel(result.finalImage, 10, 10)).toEqual([100, 100, 100, 255]);
      expect(getPixel(result.finalImage, 150, 95)).toEqual([100, 100, 100, 255]);
    });

    it('should honour an orientation override', async () => {
      const result = expectSuccess(await pipeline.run(request({ orientationOverride: 'front-or-back' })));

      expect(result.orientation).toBe('front-or-back');
      expect(result.orientationSource).toBe('override');
      expect(result.placement).toEqual({ left: 78, top: 60, width: 45, height: 30 });
      expect(result.scaleUsed).toBe(0.3);
    });

    it('should produce identical output for identical input', async () => {
      const first = expectSuccess(await pipeline.run(request({ shadow: true, reflection: true })));
      const second = expectSuccess(await pipeline.run(request({ shadow: true, reflection: true })));

      expect(Buffer.compare(Buffer.from(first.finalImage.data), Buffer.from(second.finalImage.data))).toBe(0);
      expect(second.placement).toEqual(first.placement);
      expect(second.plan).toEqual(first.plan);
      expect(second.scaleUsed).toBe(first.scaleUsed);
    });

    it('should not mutate the cutout or the registered backdrop', async () => {
      const cutout = texturedCutout();
      const before = Buffer.from(cutout.data);

      await pipeline.run(request({ cutout, shadow: true }));
      const again = expectSuccess(await pipeline.run(request({ placement: { anchorX: 0.25 } })));

      expect(Buffer.compare(Buffer.from(cutout.data), before)).toBe(0);
      // Previous run's car sat at x 63..137; nothing of it survives
      expect(getPixel(again.finalImage, 130, 60)).toEqual([100, 100, 100, 255]);
    });
  });

  describe('plate masking', () => {
    const plateRegion: BoundingBox = { xMin: 35, yMin: 45, xMax: 64, yMax: 54 };

    it('should map the plate into canvas space and mask only there', async () => {
      const plain = expectSuccess(await pipeline.run(request()));
      stages = [];
      const masked = expectSuccess(await pipeline.run(request({ plateRegion })));

      expect(stages).toEqual(['received', 'analyzed', 'planned', 'composited', 'masked', 'done']);
      expect(masked.maskedRegion).toEqual({ xMin: 81, yMin: 71, xMax: 119, yMax: 83 });

      const region = { xMin: 81, yMin: 71, xMax: 119, yMax: 83 };
      let changedInside = 0;
      for (let y = 0; y < 100; y++) {
        for (let x = 0; x < 200; x++) {
          const a = getPixel(plain.finalImage, x, y);
          const b = getPixel(masked.finalImage, x, y);
          if (isInside(region, x, y)) {
            if (a.some((value, c) => value !== b[c])) changedInside++;
          } else {
            expect(b).toEqual(a);
          }
        }
      }
      expect(changedInside).toBeGreaterThan(0);
    });

    it('should pixelate by default', async () => {
      const result = expectSuccess(await pipeline.run(request({ plateRegion })));

      // First 12px block starts at the region origin
      expect(getPixel(result.finalImage, 92, 82)).toEqual(getPixel(result.finalImage, 81, 71));
    });

    it('should reject a plate region outside the cutout before analysis', async () => {
      const outcome = await pipeline.run(request({ plateRegion: { xMin: 90, yMin: 10, xMax: 100, yMax: 20 } }));

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(OutOfBoundsError);
        expect(outcome.failedAt).toBe('received');
      }
    });

    it('should reject a plate region that misses the car', async () => {
      const outcome = await pipeline.run(request({ plateRegion: { xMin: 0, yMin: 0, xMax: 10, yMax: 10 } }));

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(OutOfBoundsError);
        expect(outcome.failedAt).toBe('composited');
      }
    });
  });

  describe('failures', () => {
    it('should fail an empty cutout at the received stage', async () => {
      const outcome = await pipeline.run(request({ cutout: createImage(50, 50) }));

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(EmptyForegroundError);
        expect(outcome.failedAt).toBe('received');
      }
      expect(stages).toEqual(['received', 'failed']);
    });

    it('should fail an unknown backdrop at the received stage', async () => {
      const outcome = await pipeline.run(request({ backdropId: 'studio_pink' }));

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(BackdropNotFoundError);
        expect(outcome.failedAt).toBe('received');
      }
    });

    it('should fail an invalid override after analysis', async () => {
      const outcome = await pipeline.run(request({ placement: { scaleFactor: 3 } }));

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(InvalidPlacementError);
        expect(outcome.failedAt).toBe('analyzed');
      }
      expect(stages).toEqual(['received', 'analyzed', 'failed']);
    });

    it('should fail a placement that leaves the canvas after planning', async () => {
      const outcome = await pipeline.run(request({ placement: { anchorX: 0.1 } }));

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(CompositingError);
        expect(outcome.failedAt).toBe('planned');
      }
    });
  });

  describe('full-size studio run', () => {
    it('should place a head-on car on the studio floor with a shadow', async () => {
      const preset = STUDIO_PRESETS.find(p => p.id === 'studio_white');
      if (!preset) throw new Error('studio_white preset missing');
      const studio = new PipelineService(new BackdropRegistry([renderStudioBackdrop(preset)]), DEFAULT_PIPELINE_CONFIG);

      const cutout = createCutout(500, 700, { xMin: 50, yMin: 40, xMax: 449, yMax: 639 }, [30, 60, 90, 255]);
      const result = expectSuccess(await studio.run({
        cutout,
        backdropId: 'studio_white',
        shadow: true,
        reflection: false,
        plateRegion: { xMin: 151, yMin: 541, xMax: 348, yMax: 588 },
      }));

      expect(result.orientation).toBe('front-or-back');
      expect(result.placement).toEqual({ left: 852, top: 594, width: 216, height: 324 });
      expect(result.scaleUsed).toBe(0.3);
      expect(result.maskedRegion).toEqual({ xMin: 906, yMin: 864, xMax: 1013, yMax: 890 });
      // Floor pixel 224, darkened under the shadow centre
      expect(getPixel(result.finalImage, 960, 920)).toEqual([129, 129, 129, 255]);
      expect(getPixel(result.finalImage, 100, 920)).toEqual([224, 224, 224, 255]);
    });
  });
});

describe('mapToCanvas', () => {
  const trimmed = createImage(60, 40);
  const placement = { left: 63, top: 40, width: 75, height: 50 };

  it('should scale and offset a region', () => {
    expect(mapToCanvas({ xMin: 20, yMin: 20, xMax: 79, yMax: 59 }, CAR, trimmed, placement))
      .toEqual({ xMin: 63, yMin: 40, xMax: 137, yMax: 89 });
  });

  it('should clamp a partly overlapping region to the car', () => {
    expect(mapToCanvas({ xMin: 0, yMin: 50, xMax: 29, yMax: 79 }, CAR, trimmed, placement))
      .toEqual({ xMin: 63, yMin: 77, xMax: 75, yMax: 89 });
  });

  it('should throw when the region misses the car', () => {
    expect(() => mapToCanvas({ xMin: 85, yMin: 0, xMax: 99, yMax: 10 }, CAR, trimmed, placement))
      .toThrow(OutOfBoundsError);
  });
});
