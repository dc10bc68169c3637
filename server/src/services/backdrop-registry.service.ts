/**
 * Backdrop Registry
 * Immutable id -> backdrop lookup, built once and passed to the pipeline.
 * Studio backdrops are synthesized; extra ones can be loaded from a directory.
 */
import { promises as fs } from 'fs';
import path from 'path';
import { CHANNELS, ImageService, RgbaImage, createImage } from './image.service';
import { BackdropNotFoundError } from './pipeline.errors';

export type BackdropCategory = 'studio' | 'showroom' | 'garage' | 'outdoor' | 'custom';

export interface BackdropInfo {
  id: string;
  name: string;
  category: BackdropCategory;
  description: string;
  floorLevel: number;        // Ground line, fraction of canvas height
  shadowByDefault: boolean;
}

export interface Backdrop extends BackdropInfo {
  image: RgbaImage;
}

type Rgb = readonly [number, number, number];

export interface StudioPreset extends BackdropInfo {
  gradient: readonly [Rgb, Rgb];  // Top, bottom
  floor: boolean;                 // Darken the bottom band like a studio floor
}

export interface CanvasSize {
  width: number;
  height: number;
}

export const DEFAULT_CANVAS: CanvasSize = { width: 1920, height: 1080 };

const FLOOR_BAND = 0.3;
const FLOOR_DARKEN = 0.15;

export const STUDIO_PRESETS: readonly StudioPreset[] = [
  {
    id: 'studio_white',
    name: 'Studio White',
    category: 'studio',
    description: 'Clean white catalogue backdrop',
    floorLevel: 0.85,
    shadowByDefault: true,
    gradient: [[255, 255, 255], [240, 240, 240]],
    floor: true,
  },
  {
    id: 'studio_grey',
    name: 'Studio Grey',
    category: 'studio',
    description: 'Neutral grey studio',
    floorLevel: 0.85,
    shadowByDefault: true,
    gradient: [[160, 160, 160], [100, 100, 100]],
    floor: true,
  },
  {
    id: 'studio_black',
    name: 'Studio Black',
    category: 'studio',
    description: 'Dark premium backdrop for sport and luxury listings',
    floorLevel: 0.85,
    shadowByDefault: true,
    gradient: [[50, 50, 55], [15, 15, 18]],
    floor: true,
  },
  {
    id: 'showroom',
    name: 'Showroom',
    category: 'showroom',
    description: 'Cool blue dealership tone',
    floorLevel: 0.85,
    shadowByDefault: true,
    gradient: [[45, 55, 72], [25, 30, 42]],
    floor: true,
  },
  {
    id: 'garage_modern',
    name: 'Modern Garage',
    category: 'garage',
    description: 'Dark workshop with warm tones',
    floorLevel: 0.82,
    shadowByDefault: true,
    gradient: [[55, 50, 48], [30, 28, 26]],
    floor: true,
  },
  {
    id: 'outdoor',
    name: 'Outdoor',
    category: 'outdoor',
    description: 'Open sky gradient',
    floorLevel: 0.85,
    shadowByDefault: false,
    gradient: [[135, 170, 200], [200, 210, 220]],
    floor: false,
  },
];

const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png'];

export class BackdropRegistry {
  private readonly backdrops: ReadonlyMap<string, Backdrop>;

  constructor(backdrops: Iterable<Backdrop>) {
    const map = new Map<string, Backdrop>();
    for (const backdrop of backdrops) {
      if (map.has(backdrop.id)) {
        throw new Error(`Duplicate backdrop id: ${backdrop.id}`);
      }
      map.set(backdrop.id, Object.freeze({ ...backdrop }));
    }
    this.backdrops = map;
  }

  get(id: string): Backdrop {
    const backdrop = this.backdrops.get(id);
    if (!backdrop) {
      throw new BackdropNotFoundError(id);
    }
    return backdrop;
  }

  has(id: string): boolean {
    return this.backdrops.has(id);
  }

  /**
   * Catalog entries without pixel data
   */
  list(category?: BackdropCategory): BackdropInfo[] {
    const result: BackdropInfo[] = [];
    this.backdrops.forEach(({ image: _image, ...info }) => {
      if (!category || info.category === category) {
        result.push(info);
      }
    });
    return result;
  }

  get size(): number {
    return this.backdrops.size;
  }
}

/**
 * Vertical gradient with an optional darkening floor band
 */
export function renderStudioBackdrop(preset: StudioPreset, size: CanvasSize = DEFAULT_CANVAS): Backdrop {
  const { width, height } = size;
  const image = createImage(width, height);
  const [top, bottom] = preset.gradient;
  const floorStart = height - Math.floor(height * FLOOR_BAND);

  for (let y = 0; y < height; y++) {
    const t = y / height;
    let shade = 1;
    if (preset.floor && y >= floorStart) {
      shade = 1 - FLOOR_DARKEN * ((y - floorStart) / (height - floorStart));
    }

    const r = Math.round((top[0] + (bottom[0] - top[0]) * t) * shade);
    const g = Math.round((top[1] + (bottom[1] - top[1]) * t) * shade);
    const b = Math.round((top[2] + (bottom[2] - top[2]) * t) * shade);

    const row = y * width * CHANNELS;
    for (let x = 0; x < width; x++) {
      const i = row + x * CHANNELS;
      image.data[i] = r;
      image.data[i + 1] = g;
      image.data[i + 2] = b;
      image.data[i + 3] = 255;
    }
  }

  const { gradient: _gradient, floor: _floor, ...info } = preset;
  return { ...info, image };
}

/**
 * Backdrops uploaded as files; the file stem becomes the id
 */
export async function loadBackdropsFromDirectory(
  dir: string,
  imageService: ImageService,
  floorLevel: number
): Promise<Backdrop[]> {
  const entries = await fs.readdir(dir);
  const files = entries
    .filter(name => IMAGE_EXTENSIONS.includes(path.extname(name).toLowerCase()))
    .sort();

  const backdrops: Backdrop[] = [];
  for (const file of files) {
    const id = path.basename(file, path.extname(file));
    const image = await imageService.decodeOpaque(await fs.readFile(path.join(dir, file)));
    backdrops.push({
      id,
      name: id,
      category: 'custom',
      description: `Uploaded backdrop ${file}`,
      floorLevel,
      shadowByDefault: true,
      image,
    });
    console.log(`[Backdrops] Loaded ${id} (${image.width}x${image.height}) from ${file}`);
  }
  return backdrops;
}

export interface RegistryOptions {
  size?: CanvasSize;
  backdropsDir?: string;
  groundLevel: number;
  imageService: ImageService;
}

/**
 * Studio presets plus any files found in backdropsDir
 */
export async function createBackdropRegistry(options: RegistryOptions): Promise<BackdropRegistry> {
  const studio = STUDIO_PRESETS.map(preset => renderStudioBackdrop(preset, options.size));
  const uploaded = options.backdropsDir
    ? await loadBackdropsFromDirectory(options.backdropsDir, options.imageService, options.groundLevel)
    : [];

  const registry = new BackdropRegistry([...studio, ...uploaded]);
  console.log(`[Backdrops] Registry ready with ${registry.size} backdrops`);
  return registry;
}
