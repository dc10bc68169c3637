/**
 * Pipeline tuning, read from the environment once at startup
 */

export interface PipelineConfig {
  alphaThreshold: number;      // Alpha at or below this is empty during trim (0-254)
  groundLevel: number;         // Default floor line, fraction of canvas height
  maxHeightFraction: number;   // Cap for width-referenced car height
  shadowOpacity: number;
  reflectionOpacity: number;
  reflectionMaxPixels: number;
  maskMinBlockSize: number;    // Pixelation block edge floor, px
  maskBlurRadius: number;      // Border smoothing radius for the blur fill, px
  useWorkers: boolean;
  maxWorkers: number;          // Concurrent worker threads; 0 means one per available core
  backdropsDir?: string;
}

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = {
  alphaThreshold: 8,
  groundLevel: 0.85,
  maxHeightFraction: 0.5,
  shadowOpacity: 0.45,
  reflectionOpacity: 0.35,
  reflectionMaxPixels: 160,
  maskMinBlockSize: 12,
  maskBlurRadius: 24,
  useWorkers: false,
  maxWorkers: 0,
};

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    console.warn(`[Config] Ignoring ${name}=${raw} (expected ${min}..${max}), using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const d = DEFAULT_PIPELINE_CONFIG;
  return {
    alphaThreshold: Math.round(readNumber(env, 'PIPELINE_ALPHA_THRESHOLD', d.alphaThreshold, 0, 254)),
    groundLevel: readNumber(env, 'PIPELINE_GROUND_LEVEL', d.groundLevel, 0, 1),
    maxHeightFraction: readNumber(env, 'PIPELINE_MAX_HEIGHT_FRACTION', d.maxHeightFraction, 0.05, 1),
    shadowOpacity: readNumber(env, 'PIPELINE_SHADOW_OPACITY', d.shadowOpacity, 0, 1),
    reflectionOpacity: readNumber(env, 'PIPELINE_REFLECTION_OPACITY', d.reflectionOpacity, 0, 1),
    reflectionMaxPixels: Math.round(readNumber(env, 'PIPELINE_REFLECTION_MAX_PX', d.reflectionMaxPixels, 1, 4096)),
    maskMinBlockSize: Math.round(readNumber(env, 'PIPELINE_MASK_MIN_BLOCK', d.maskMinBlockSize, 2, 512)),
    maskBlurRadius: Math.round(readNumber(env, 'PIPELINE_MASK_BLUR_RADIUS', d.maskBlurRadius, 1, 512)),
    useWorkers: env.PIPELINE_USE_WORKERS === 'true',
    maxWorkers: Math.round(readNumber(env, 'PIPELINE_MAX_WORKERS', d.maxWorkers, 0, 256)),
    backdropsDir: env.BACKDROPS_DIR || undefined,
  };
}
