import sharp from 'sharp';

/**
 * Raw RGBA pixels, row-major, 4 bytes per pixel, straight alpha
 */
export interface RgbaImage {
  width: number;
  height: number;
  data: Uint8Array;
}

/**
 * Inclusive pixel bounds
 */
export interface BoundingBox {
  xMin: number;
  yMin: number;
  xMax: number;
  yMax: number;
}

export type OutputFormat = 'png' | 'jpeg';

export const CHANNELS = 4;
export const JPEG_QUALITY = 92;

export function createImage(width: number, height: number): RgbaImage {
  return { width, height, data: new Uint8Array(width * height * CHANNELS) };
}

export function cloneImage(image: RgbaImage): RgbaImage {
  return { width: image.width, height: image.height, data: Uint8Array.from(image.data) };
}

export function boxWidth(box: BoundingBox): number {
  return box.xMax - box.xMin + 1;
}

export function boxHeight(box: BoundingBox): number {
  return box.yMax - box.yMin + 1;
}

export class ImageService {
  /**
   * Decode any sharp-readable image into straight RGBA
   */
  async decode(buffer: Buffer): Promise<RgbaImage> {
    const { data, info } = await sharp(buffer)
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return { width: info.width, height: info.height, data: new Uint8Array(data) };
  }

  /**
   * Decode an image and drop any transparency onto black, for backdrops
   */
  async decodeOpaque(buffer: Buffer): Promise<RgbaImage> {
    const { data, info } = await sharp(buffer)
      .flatten({ background: { r: 0, g: 0, b: 0 } })
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return { width: info.width, height: info.height, data: new Uint8Array(data) };
  }

  /**
   * Resample with a lanczos3 kernel. sharp premultiplies alpha internally,
   * so transparent pixels do not bleed colour into the edges.
   */
  async resize(image: RgbaImage, width: number, height: number): Promise<RgbaImage> {
    if (width === image.width && height === image.height) {
      return cloneImage(image);
    }

    const { data, info } = await sharp(Buffer.from(image.data), {
      raw: { width: image.width, height: image.height, channels: CHANNELS },
    })
      .resize(width, height, { kernel: 'lanczos3', fit: 'fill' })
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return { width: info.width, height: info.height, data: new Uint8Array(data) };
  }

  /**
   * Encode for the calling layer. JPEG output is flattened onto white.
   */
  async encode(image: RgbaImage, format: OutputFormat = 'png'): Promise<Buffer> {
    const pipeline = sharp(Buffer.from(image.data), {
      raw: { width: image.width, height: image.height, channels: CHANNELS },
    });

    if (format === 'jpeg') {
      return pipeline
        .flatten({ background: { r: 255, g: 255, b: 255 } })
        .jpeg({ quality: JPEG_QUALITY })
        .toBuffer();
    }

    return pipeline.png().toBuffer();
  }
}
