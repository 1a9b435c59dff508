import { ColorPair, ColorService, isColorChannel } from '../services/color.service';

export type GradientPosition = 'outside' | 'middle' | 'inside';

export interface GradientConfig {
  /** Total gradient thickness in pixels */
  size: number;
  position: GradientPosition;
  /** Pixels between successive rings */
  stepSize: number;
  colors: ColorPair[];
}

export const GRADIENT_POSITIONS: readonly GradientPosition[] = ['outside', 'middle', 'inside'];

export const MIN_STEP_SIZE = 1;
export const MAX_STEP_SIZE = 20;
export const MAX_COLOR_PAIRS = 4;

export const DEFAULT_GRADIENT_CONFIG: GradientConfig = {
  size: 20,
  position: 'outside',
  stepSize: 1,
  colors: [],
};

export class GradientConfigError extends Error {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(message);
    this.name = 'GradientConfigError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isGradientPosition(value: unknown): value is GradientPosition {
  return GRADIENT_POSITIONS.some(position => position === value);
}

/**
 * How far inward the gradient starts, relative to the clip edge
 */
export function positionOffset(config: Pick<GradientConfig, 'size' | 'position'>): number {
  switch (config.position) {
    case 'inside':
      return config.size;
    case 'middle':
      return config.size / 2;
    default:
      return 0;
  }
}

/**
 * Validate an untrusted config object, filling unset fields from the defaults
 */
export function resolveGradientConfig(
  input: unknown,
  defaults: GradientConfig = DEFAULT_GRADIENT_CONFIG
): GradientConfig {
  if (input === undefined || input === null) {
    return { ...defaults, colors: [...defaults.colors] };
  }
  if (!isRecord(input)) {
    throw new GradientConfigError('config', 'Gradient config must be an object');
  }

  const size = input.size ?? defaults.size;
  if (typeof size !== 'number' || !Number.isFinite(size) || size < 0 || !Number.isInteger(size * 2)) {
    throw new GradientConfigError('size', 'Gradient size must be a non-negative multiple of 0.5');
  }

  const position = input.position ?? defaults.position;
  if (!isGradientPosition(position)) {
    throw new GradientConfigError('position', `Gradient position must be one of: ${GRADIENT_POSITIONS.join(', ')}`);
  }

  const stepSize = input.stepSize ?? defaults.stepSize;
  if (
    typeof stepSize !== 'number' ||
    !Number.isInteger(stepSize) ||
    stepSize < MIN_STEP_SIZE ||
    stepSize > MAX_STEP_SIZE
  ) {
    throw new GradientConfigError('stepSize', `Step size must be an integer from ${MIN_STEP_SIZE} to ${MAX_STEP_SIZE}`);
  }

  const colors = input.colors === undefined ? [...defaults.colors] : resolveColorPairs(input.colors);

  return { size, position, stepSize, colors };
}

function resolveColorPairs(input: unknown): ColorPair[] {
  if (!Array.isArray(input)) {
    throw new GradientConfigError('colors', 'Colors must be an array');
  }
  if (input.length > MAX_COLOR_PAIRS) {
    throw new GradientConfigError('colors', `At most ${MAX_COLOR_PAIRS} colour pairs are supported`);
  }

  const colorService = new ColorService();
  const pairs: ColorPair[] = [];

  input.forEach((entry: unknown, i: number) => {
    const field = `colors[${i}]`;
    if (!isRecord(entry)) {
      throw new GradientConfigError(field, 'Colour pair must be an object');
    }

    const channel = entry.channel;
    if (!isColorChannel(channel)) {
      throw new GradientConfigError(`${field}.channel`, 'Colour channel must be 1, 2, 3 or 4');
    }
    if (pairs.some(pair => pair.channel === channel)) {
      throw new GradientConfigError(`${field}.channel`, `Colour channel ${channel} is listed twice`);
    }

    const start = typeof entry.start === 'string' ? colorService.parseColor(entry.start) : null;
    if (!start) {
      throw new GradientConfigError(`${field}.start`, 'Start colour must be #RRGGBB or &HBBGGRR&');
    }
    const end = typeof entry.end === 'string' ? colorService.parseColor(entry.end) : null;
    if (!end) {
      throw new GradientConfigError(`${field}.end`, 'End colour must be #RRGGBB or &HBBGGRR&');
    }

    pairs.push({ channel, start, end });
  });

  return pairs;
}
