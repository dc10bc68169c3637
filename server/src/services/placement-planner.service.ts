/**
 * Placement Planner Service
 * Maps an orientation to a scale and anchor on the target canvas
 */
import { Orientation } from './foreground-analyzer.service';
import { InvalidPlacementError } from './pipeline.errors';

export type VerticalReference = 'ground' | 'center';
export type ScaleReference = 'width' | 'height';

export interface PlacementPlan {
  scaleFactor: number;              // (0, 2], fraction of the reference dimension
  scaleReference: ScaleReference;   // Canvas dimension the scale applies to
  anchorX: number;                  // [0, 1], horizontal centre of the car
  anchorY: number;                  // [0, 1], bottom edge (ground) or centre
  verticalReference: VerticalReference;
}

export type PlacementOverrides = Partial<
  Pick<PlacementPlan, 'scaleFactor' | 'anchorX' | 'anchorY' | 'verticalReference'>
>;

export const MAX_SCALE_FACTOR = 2;

interface OrientationPolicy {
  scaleFactor: number;
  scaleReference: ScaleReference;
  anchorX: number;
}

/**
 * Side views fill more width, head-on views are sized by height so tall
 * SUVs do not dominate the frame.
 */
export function basePolicy(orientation: Orientation): OrientationPolicy {
  switch (orientation) {
    case 'side':
      return { scaleFactor: 0.45, scaleReference: 'width', anchorX: 0.5 };
    case 'front-or-back':
      return { scaleFactor: 0.3, scaleReference: 'height', anchorX: 0.5 };
    case 'three-quarter':
      return { scaleFactor: 0.38, scaleReference: 'width', anchorX: 0.5 };
    default:
      return assertNever(orientation);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled orientation: ${String(value)}`);
}

export class PlacementPlannerService {
  constructor(private readonly defaultGroundLevel: number) {}

  /**
   * @param groundLevel - floor line of the target backdrop, used when no anchorY override is given
   */
  plan(
    orientation: Orientation,
    overrides: PlacementOverrides = {},
    groundLevel: number = this.defaultGroundLevel
  ): PlacementPlan {
    validateOverrides(overrides);

    const policy = basePolicy(orientation);
    const verticalReference = overrides.verticalReference ?? 'ground';
    const defaultAnchorY = verticalReference === 'ground' ? groundLevel : 0.5;

    return {
      scaleFactor: overrides.scaleFactor ?? policy.scaleFactor,
      scaleReference: policy.scaleReference,
      anchorX: overrides.anchorX ?? policy.anchorX,
      anchorY: overrides.anchorY ?? defaultAnchorY,
      verticalReference,
    };
  }
}

function validateOverrides(overrides: PlacementOverrides): void {
  const { scaleFactor, anchorX, anchorY, verticalReference } = overrides;

  if (scaleFactor !== undefined) {
    if (!Number.isFinite(scaleFactor) || scaleFactor <= 0 || scaleFactor > MAX_SCALE_FACTOR) {
      throw new InvalidPlacementError(
        'scaleFactor',
        `scaleFactor must be in (0, ${MAX_SCALE_FACTOR}], got ${scaleFactor}`
      );
    }
  }

  for (const [field, value] of [['anchorX', anchorX], ['anchorY', anchorY]] as const) {
    if (value !== undefined && (!Number.isFinite(value) || value < 0 || value > 1)) {
      throw new InvalidPlacementError(field, `${field} must be in [0, 1], got ${value}`);
    }
  }

  if (verticalReference !== undefined && verticalReference !== 'ground' && verticalReference !== 'center') {
    throw new InvalidPlacementError(
      'verticalReference',
      `verticalReference must be "ground" or "center", got ${String(verticalReference)}`
    );
  }
}
