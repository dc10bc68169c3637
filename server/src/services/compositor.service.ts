/**
 * Compositor Service
 * Resizes the trimmed car per the placement plan, draws ground contact
 * (shadow, reflection) and blends the car over a copy of the backdrop
 */
import { Backdrop } from './backdrop-registry.service';
import { CHANNELS, ImageService, RgbaImage, cloneImage } from './image.service';
import { PlacementPlan } from './placement-planner.service';
import { CompositingError } from './pipeline.errors';

export interface CompositeOptions {
  shadow: boolean;
  reflection: boolean;
}

export interface CompositorSettings {
  maxHeightFraction: number;
  shadowOpacity: number;
  reflectionOpacity: number;
  reflectionMaxPixels: number;
}

/**
 * Where the resized car landed on the canvas
 */
export interface Placement {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface CompositeOutput {
  image: RgbaImage;
  placement: Placement;
  scaleUsed: number;         // Effective fraction of the reference dimension
}

// Shadow ellipse relative to placed car width
const SHADOW_WIDTH_RATIO = 0.55;
const SHADOW_ASPECT = 0.12;
const SHADOW_MIN_RADIUS_Y = 3;
// Reflection depth relative to placed car height, before the pixel cap
const REFLECTION_DEPTH_RATIO = 0.35;

export class CompositorService {
  constructor(
    private readonly imageService: ImageService,
    private readonly settings: CompositorSettings
  ) {}

  async composite(
    trimmed: RgbaImage,
    plan: PlacementPlan,
    backdrop: Backdrop,
    options: CompositeOptions
  ): Promise<CompositeOutput> {
    const canvas = backdrop.image;
    const size = this.targetSize(trimmed, plan, canvas);
    const placement = this.place(size, plan, canvas);

    const foreground = await this.imageService.resize(trimmed, size.width, size.height);
    const output = cloneImage(canvas);

    if (options.shadow) {
      this.drawShadow(output, placement);
    }
    if (options.reflection) {
      this.drawReflection(output, foreground, placement);
    }
    blendOver(output, foreground, placement.left, placement.top, 1);

    const scaleUsed = plan.scaleReference === 'width'
      ? size.width / canvas.width
      : size.height / canvas.height;

    return { image: output, placement, scaleUsed };
  }

  /**
   * Resized car dimensions, preserving the trimmed aspect ratio
   */
  targetSize(trimmed: RgbaImage, plan: PlacementPlan, canvas: RgbaImage): { width: number; height: number } {
    const ratio = trimmed.width / trimmed.height;

    if (plan.scaleReference === 'height') {
      const height = Math.max(1, Math.round(canvas.height * plan.scaleFactor));
      return { width: Math.max(1, Math.round(height * ratio)), height };
    }

    let width = Math.max(1, Math.round(canvas.width * plan.scaleFactor));
    let height = Math.max(1, Math.round(width / ratio));

    // Width-referenced cars never exceed the configured share of canvas height
    const maxHeight = Math.round(canvas.height * this.settings.maxHeightFraction);
    if (height > maxHeight) {
      height = Math.max(1, maxHeight);
      width = Math.max(1, Math.round(height * ratio));
    }

    return { width, height };
  }

  /**
   * Top-left position from the anchors. Fails instead of clipping.
   */
  place(size: { width: number; height: number }, plan: PlacementPlan, canvas: RgbaImage): Placement {
    const left = Math.round(plan.anchorX * canvas.width - size.width / 2);
    const top = plan.verticalReference === 'ground'
      ? Math.round(plan.anchorY * canvas.height) - size.height
      : Math.round(plan.anchorY * canvas.height - size.height / 2);

    const placement: Placement = { left, top, width: size.width, height: size.height };

    if (left < 0 || top < 0 || left + size.width > canvas.width || top + size.height > canvas.height) {
      throw new CompositingError(
        `Foreground ${size.width}x${size.height} at (${left}, ${top}) exceeds canvas ` +
        `${canvas.width}x${canvas.height} (scale ${plan.scaleFactor}, anchor ${plan.anchorX}/${plan.anchorY})`
      );
    }

    return placement;
  }

  /**
   * Soft elliptical shadow centred on the ground-contact line. Drawn before
   * the car so the car covers its upper half.
   */
  private drawShadow(canvas: RgbaImage, placement: Placement): void {
    const cx = placement.left + placement.width / 2;
    const cy = placement.top + placement.height;
    const rx = placement.width * SHADOW_WIDTH_RATIO;
    const ry = Math.max(SHADOW_MIN_RADIUS_Y, rx * SHADOW_ASPECT);

    const x0 = Math.max(0, Math.floor(cx - rx));
    const x1 = Math.min(canvas.width - 1, Math.ceil(cx + rx));
    const y0 = Math.max(0, Math.floor(cy - ry));
    const y1 = Math.min(canvas.height - 1, Math.ceil(cy + ry));

    for (let y = y0; y <= y1; y++) {
      const dy = (y + 0.5 - cy) / ry;
      for (let x = x0; x <= x1; x++) {
        const dx = (x + 0.5 - cx) / rx;
        const d2 = dx * dx + dy * dy;
        if (d2 >= 1) continue;

        const falloff = 1 - d2;
        const alpha = this.settings.shadowOpacity * falloff * falloff;
        const i = (y * canvas.width + x) * CHANNELS;
        canvas.data[i] = Math.round(canvas.data[i] * (1 - alpha));
        canvas.data[i + 1] = Math.round(canvas.data[i + 1] * (1 - alpha));
        canvas.data[i + 2] = Math.round(canvas.data[i + 2] * (1 - alpha));
      }
    }
  }

  /**
   * Flipped copy of the car below the ground line, fading linearly to zero
   */
  private drawReflection(canvas: RgbaImage, foreground: RgbaImage, placement: Placement): void {
    const groundY = placement.top + placement.height;
    const depth = Math.min(
      this.settings.reflectionMaxPixels,
      Math.round(placement.height * REFLECTION_DEPTH_RATIO),
      canvas.height - groundY
    );
    if (depth <= 0) return;

    for (let r = 0; r < depth; r++) {
      const fade = this.settings.reflectionOpacity * (1 - r / depth);
      const srcRow = (foreground.height - 1 - r) * foreground.width * CHANNELS;
      const dstRow = ((groundY + r) * canvas.width + placement.left) * CHANNELS;

      for (let x = 0; x < foreground.width; x++) {
        blendPixel(canvas.data, dstRow + x * CHANNELS, foreground.data, srcRow + x * CHANNELS, fade);
      }
    }
  }
}

/**
 * Standard "over": out = fg * a + bg * (1 - a), within the foreground extent only
 */
export function blendOver(
  canvas: RgbaImage,
  foreground: RgbaImage,
  left: number,
  top: number,
  opacity: number
): void {
  for (let y = 0; y < foreground.height; y++) {
    const srcRow = y * foreground.width * CHANNELS;
    const dstRow = ((top + y) * canvas.width + left) * CHANNELS;
    for (let x = 0; x < foreground.width; x++) {
      blendPixel(canvas.data, dstRow + x * CHANNELS, foreground.data, srcRow + x * CHANNELS, opacity);
    }
  }
}

function blendPixel(dst: Uint8Array, di: number, src: Uint8Array, si: number, opacity: number): void {
  const a = (src[si + 3] / 255) * opacity;
  if (a <= 0) return;

  const inv = 1 - a;
  dst[di] = Math.round(src[si] * a + dst[di] * inv);
  dst[di + 1] = Math.round(src[si + 1] * a + dst[di + 1] * inv);
  dst[di + 2] = Math.round(src[si + 2] * a + dst[di + 2] * inv);
  dst[di + 3] = Math.round(255 * (a + (dst[di + 3] / 255) * inv));
}
