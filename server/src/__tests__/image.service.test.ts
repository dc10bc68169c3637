import sharp from 'sharp';
import { ImageService } from '../services/image.service';
import { createCutout, getPixel, solidImage } from './helpers/cutout-generator.helper';

describe('ImageService', () => {
  let service: ImageService;

  beforeEach(() => {
    service = new ImageService();
  });

  describe('decode', () => {
    it('should decode a PNG with transparency to straight RGBA', async () => {
      const png = await sharp({
        create: {
          width: 20,
          height: 10,
          channels: 4,
          background: { r: 0, g: 0, b: 255, alpha: 0 },
        },
      })
        .png()
        .toBuffer();

      const image = await service.decode(png);

      expect(image.width).toBe(20);
      expect(image.height).toBe(10);
      expect(image.data.length).toBe(20 * 10 * 4);
      expect(getPixel(image, 5, 5)[3]).toBe(0);
    });

    it('should add an opaque alpha channel to JPEG input', async () => {
      const jpeg = await sharp({
        create: { width: 8, height: 8, channels: 3, background: { r: 10, g: 20, b: 30 } },
      })
        .jpeg()
        .toBuffer();

      const image = await service.decode(jpeg);

      expect(image.data.length).toBe(8 * 8 * 4);
      expect(getPixel(image, 0, 0)[3]).toBe(255);
    });
  });

  describe('encode', () => {
    it('should round-trip pixels losslessly through PNG', async () => {
      const original = createCutout(12, 6, { xMin: 2, yMin: 1, xMax: 9, yMax: 4 }, [200, 100, 50, 180]);

      const decoded = await service.decode(await service.encode(original, 'png'));

      expect(Buffer.compare(Buffer.from(decoded.data), Buffer.from(original.data))).toBe(0);
    });

    it('should write JPEG without alpha', async () => {
      const jpeg = await service.encode(solidImage(16, 16, [0, 0, 0, 255]), 'jpeg');

      const metadata = await sharp(jpeg).metadata();
      expect(metadata.format).toBe('jpeg');
      expect(metadata.hasAlpha).toBe(false);
      expect(metadata.width).toBe(16);
    });
  });

  describe('resize', () => {
    it('should resize to the exact requested size', async () => {
      const resized = await service.resize(solidImage(40, 20, [0, 128, 0, 255]), 90, 45);

      expect(resized.width).toBe(90);
      expect(resized.height).toBe(45);
      expect(resized.data.length).toBe(90 * 45 * 4);
    });

    it('should return a copy when the size is unchanged', async () => {
      const image = solidImage(4, 4, [1, 2, 3, 255]);

      const same = await service.resize(image, 4, 4);
      same.data[0] = 99;

      expect(image.data[0]).toBe(1);
    });
  });
});
