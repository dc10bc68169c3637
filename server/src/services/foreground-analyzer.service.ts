/**
 * Foreground Analyzer Service
 * Trims transparent margins from a cutout and classifies the vehicle's
 * orientation from the trimmed aspect ratio
 */
import { BoundingBox, CHANNELS, RgbaImage, boxHeight, boxWidth } from './image.service';
import { EmptyForegroundError } from './pipeline.errors';

export type Orientation = 'side' | 'front-or-back' | 'three-quarter';

export const ORIENTATIONS: readonly Orientation[] = ['side', 'front-or-back', 'three-quarter'];

/**
 * Ratio boundaries, both exclusive on the outer classes:
 *   ratio >  SIDE_MIN_RATIO        -> side
 *   ratio <  FRONT_BACK_MAX_RATIO  -> front-or-back
 *   otherwise (closed [0.8, 1.3])  -> three-quarter
 */
export const SIDE_MIN_RATIO = 1.3;
export const FRONT_BACK_MAX_RATIO = 0.8;

export interface ForegroundAnalysis {
  trimmed: RgbaImage;
  boundingBox: BoundingBox;
  ratio: number;
  orientation: Orientation;
}

export function isOrientation(value: unknown): value is Orientation {
  return typeof value === 'string' && ORIENTATIONS.some(orientation => orientation === value);
}

export function classifyRatio(ratio: number): Orientation {
  if (ratio > SIDE_MIN_RATIO) return 'side';
  if (ratio < FRONT_BACK_MAX_RATIO) return 'front-or-back';
  return 'three-quarter';
}

export class ForegroundAnalyzerService {
  /**
   * @param alphaThreshold - alpha values at or below this are anti-aliasing noise
   */
  constructor(private readonly alphaThreshold: number) {}

  analyze(cutout: RgbaImage): ForegroundAnalysis {
    const boundingBox = this.findBounds(cutout);
    const trimmed = crop(cutout, boundingBox);
    const ratio = trimmed.width / trimmed.height;

    return {
      trimmed,
      boundingBox,
      ratio,
      orientation: classifyRatio(ratio),
    };
  }

  /**
   * Tightest box around pixels whose alpha exceeds the threshold
   */
  findBounds(image: RgbaImage): BoundingBox {
    const { width, height, data } = image;
    let xMin = width;
    let yMin = height;
    let xMax = -1;
    let yMax = -1;

    for (let y = 0; y < height; y++) {
      const row = y * width * CHANNELS;
      for (let x = 0; x < width; x++) {
        if (data[row + x * CHANNELS + 3] > this.alphaThreshold) {
          if (x < xMin) xMin = x;
          if (x > xMax) xMax = x;
          if (y < yMin) yMin = y;
          yMax = y;
        }
      }
    }

    if (xMax < 0) {
      throw new EmptyForegroundError(
        `Cutout ${width}x${height} has no pixel with alpha above ${this.alphaThreshold}`
      );
    }

    return { xMin, yMin, xMax, yMax };
  }
}

export function crop(image: RgbaImage, box: BoundingBox): RgbaImage {
  const width = boxWidth(box);
  const height = boxHeight(box);
  const data = new Uint8Array(width * height * CHANNELS);
  const rowBytes = width * CHANNELS;

  for (let y = 0; y < height; y++) {
    const start = ((box.yMin + y) * image.width + box.xMin) * CHANNELS;
    data.set(image.data.subarray(start, start + rowBytes), y * rowBytes);
  }

  return { width, height, data };
}
