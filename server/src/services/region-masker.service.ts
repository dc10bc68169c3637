/**
 * Region Masker Service
 * Irreversibly redacts a rectangle (licence plate) in a finished image.
 * Both methods are idempotent: masking an already masked region is a no-op.
 */
import { BoundingBox, CHANNELS, RgbaImage, boxHeight, boxWidth, cloneImage } from './image.service';
import { OutOfBoundsError } from './pipeline.errors';

export type MaskMethod = 'blur' | 'pixelate';

export const MASK_METHODS: readonly MaskMethod[] = ['blur', 'pixelate'];

export interface MaskerSettings {
  minBlockSize: number;
  blurRadius: number;
}

// A plate is at least three blocks tall and wide, so no glyph survives
const BLOCKS_ACROSS = 3;

export function isMaskMethod(value: unknown): value is MaskMethod {
  return typeof value === 'string' && MASK_METHODS.some(method => method === value);
}

export class RegionMaskerService {
  constructor(private readonly settings: MaskerSettings) {}

  maskRegion(image: RgbaImage, region: BoundingBox, method: MaskMethod): RgbaImage {
    assertRegionWithin(image, region);

    const output = cloneImage(image);
    if (method === 'pixelate') {
      this.pixelate(output, region);
    } else {
      this.blurFill(output, region);
    }
    return output;
  }

  blockSize(region: BoundingBox): number {
    const shortSide = Math.min(boxWidth(region), boxHeight(region));
    return Math.max(this.settings.minBlockSize, Math.ceil(shortSide / BLOCKS_ACROSS));
  }

  /**
   * Each block, anchored at the region origin, becomes its rounded mean
   */
  private pixelate(image: RgbaImage, region: BoundingBox): void {
    const block = this.blockSize(region);

    for (let by = region.yMin; by <= region.yMax; by += block) {
      const yEnd = Math.min(by + block - 1, region.yMax);
      for (let bx = region.xMin; bx <= region.xMax; bx += block) {
        const xEnd = Math.min(bx + block - 1, region.xMax);
        const mean = meanColor(image, { xMin: bx, yMin: by, xMax: xEnd, yMax: yEnd });
        fill(image, { xMin: bx, yMin: by, xMax: xEnd, yMax: yEnd }, () => mean);
      }
    }
  }

  /**
   * Replaces the region with a smooth field interpolated from the smoothed
   * rows and columns just outside it. Nothing inside the region contributes,
   * except when the region is the whole image and becomes its mean colour.
   */
  private blurFill(image: RgbaImage, region: BoundingBox): void {
    const w = boxWidth(region);
    const h = boxHeight(region);
    const radius = this.settings.blurRadius;

    const top = region.yMin > 0
      ? smooth(sampleRow(image, region.yMin - 1, region.xMin, w), radius)
      : null;
    const bottom = region.yMax < image.height - 1
      ? smooth(sampleRow(image, region.yMax + 1, region.xMin, w), radius)
      : null;
    const left = region.xMin > 0
      ? smooth(sampleColumn(image, region.xMin - 1, region.yMin, h), radius)
      : null;
    const right = region.xMax < image.width - 1
      ? smooth(sampleColumn(image, region.xMax + 1, region.yMin, h), radius)
      : null;

    if (!top && !bottom && !left && !right) {
      const mean = meanColor(image, region);
      fill(image, region, () => mean);
      return;
    }

    const value = new Array<number>(CHANNELS);
    fill(image, region, (x, y) => {
      const i = x - region.xMin;
      const j = y - region.yMin;
      const u = (i + 1) / (w + 1);
      const v = (j + 1) / (h + 1);

      let total = 0;
      value.fill(0);
      const add = (edge: Float64Array[] | null, index: number, weight: number) => {
        if (!edge) return;
        for (let c = 0; c < CHANNELS; c++) {
          value[c] += edge[c][index] * weight;
        }
        total += weight;
      };
      add(top, i, 1 - v);
      add(bottom, i, v);
      add(left, j, 1 - u);
      add(right, j, u);

      return value.map(sum => Math.round(sum / total));
    });
  }
}

export function assertRegionWithin(image: { width: number; height: number }, region: BoundingBox): void {
  const { xMin, yMin, xMax, yMax } = region;
  const coords = [xMin, yMin, xMax, yMax];

  if (!coords.every(Number.isInteger)) {
    throw new OutOfBoundsError(`Region coordinates must be integers, got ${coords.join(', ')}`);
  }
  if (xMin > xMax || yMin > yMax) {
    throw new OutOfBoundsError(`Region is inverted: (${xMin}, ${yMin})-(${xMax}, ${yMax})`);
  }
  if (xMin < 0 || yMin < 0 || xMax >= image.width || yMax >= image.height) {
    throw new OutOfBoundsError(
      `Region (${xMin}, ${yMin})-(${xMax}, ${yMax}) is outside image ${image.width}x${image.height}`
    );
  }
}

function meanColor(image: RgbaImage, box: BoundingBox): number[] {
  const sums = [0, 0, 0, 0];
  for (let y = box.yMin; y <= box.yMax; y++) {
    for (let x = box.xMin; x <= box.xMax; x++) {
      const i = (y * image.width + x) * CHANNELS;
      for (let c = 0; c < CHANNELS; c++) sums[c] += image.data[i + c];
    }
  }
  const count = boxWidth(box) * boxHeight(box);
  return sums.map(sum => Math.round(sum / count));
}

function fill(image: RgbaImage, box: BoundingBox, color: (x: number, y: number) => number[]): void {
  for (let y = box.yMin; y <= box.yMax; y++) {
    for (let x = box.xMin; x <= box.xMax; x++) {
      const i = (y * image.width + x) * CHANNELS;
      const value = color(x, y);
      for (let c = 0; c < CHANNELS; c++) image.data[i + c] = value[c];
    }
  }
}

/** Per-channel samples along a row segment */
function sampleRow(image: RgbaImage, y: number, x0: number, length: number): Float64Array[] {
  const channels = Array.from({ length: CHANNELS }, () => new Float64Array(length));
  for (let k = 0; k < length; k++) {
    const i = (y * image.width + x0 + k) * CHANNELS;
    for (let c = 0; c < CHANNELS; c++) channels[c][k] = image.data[i + c];
  }
  return channels;
}

function sampleColumn(image: RgbaImage, x: number, y0: number, length: number): Float64Array[] {
  const channels = Array.from({ length: CHANNELS }, () => new Float64Array(length));
  for (let k = 0; k < length; k++) {
    const i = ((y0 + k) * image.width + x) * CHANNELS;
    for (let c = 0; c < CHANNELS; c++) channels[c][k] = image.data[i + c];
  }
  return channels;
}

/** Box filter with the window clamped to the segment */
function smooth(channels: Float64Array[], radius: number): Float64Array[] {
  return channels.map(samples => {
    const n = samples.length;
    const prefix = new Float64Array(n + 1);
    for (let k = 0; k < n; k++) prefix[k + 1] = prefix[k] + samples[k];

    const out = new Float64Array(n);
    for (let k = 0; k < n; k++) {
      const lo = Math.max(0, k - radius);
      const hi = Math.min(n - 1, k + radius);
      out[k] = (prefix[hi + 1] - prefix[lo]) / (hi - lo + 1);
    }
    return out;
  });
}
