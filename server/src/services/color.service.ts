/**
 * Color Service
 * Parses and formats subtitle colours and interpolates between them
 */

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

/** 1 = primary fill, 2 = secondary fill, 3 = border, 4 = shadow */
export type ColorChannel = 1 | 2 | 3 | 4;

export interface ColorPair {
  channel: ColorChannel;
  start: RgbColor;
  end: RgbColor;
}

export type ColorStop = ColorPair;

export interface BandColor {
  channel: ColorChannel;
  color: RgbColor;
}

const HEX_PATTERN = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;
// &HBBGGRR& with optional alpha byte in front and optional closing ampersand
const ASS_PATTERN = /^&H(?:[0-9a-f]{2})?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})&?$/i;

export function isColorChannel(value: unknown): value is ColorChannel {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

function toHexByte(value: number): string {
  return value.toString(16).padStart(2, '0');
}

export class ColorService {
  /**
   * Accepts `#RRGGBB`, `&HBBGGRR&` or `&HAABBGGRR&` (alpha is ignored)
   */
  parseColor(text: string): RgbColor | null {
    const trimmed = text.trim();

    const hex = HEX_PATTERN.exec(trimmed);
    if (hex) {
      return { r: parseInt(hex[1], 16), g: parseInt(hex[2], 16), b: parseInt(hex[3], 16) };
    }

    const ass = ASS_PATTERN.exec(trimmed);
    if (ass) {
      return { r: parseInt(ass[3], 16), g: parseInt(ass[2], 16), b: parseInt(ass[1], 16) };
    }

    return null;
  }

  toAssColor(color: RgbColor): string {
    return `&H${toHexByte(color.b)}${toHexByte(color.g)}${toHexByte(color.r)}&`.toUpperCase();
  }

  toHexColor(color: RgbColor): string {
    return `#${toHexByte(color.r)}${toHexByte(color.g)}${toHexByte(color.b)}`;
  }

  equals(a: RgbColor, b: RgbColor): boolean {
    return a.r === b.r && a.g === b.g && a.b === b.b;
  }

  /**
   * Linear blend per channel; factor is clamped to [0, 1]
   */
  interpolateColor(factor: number, start: RgbColor, end: RgbColor): RgbColor {
    const t = Math.min(1, Math.max(0, factor));
    const blend = (a: number, b: number) => Math.floor(a + (b - a) * t + 0.5);
    return {
      r: blend(start.r, end.r),
      g: blend(start.g, end.g),
      b: blend(start.b, end.b),
    };
  }

  /**
   * Keep only pairs that actually change, ordered by channel
   */
  buildColorStops(pairs: ColorPair[]): ColorStop[] {
    const seen = new Set<ColorChannel>();
    for (const pair of pairs) {
      if (seen.has(pair.channel)) {
        throw new Error(`Duplicate colour channel ${pair.channel}`);
      }
      seen.add(pair.channel);
    }

    return pairs
      .filter(pair => !this.equals(pair.start, pair.end))
      .sort((a, b) => a.channel - b.channel);
  }

  colorsAt(stops: ColorStop[], factor: number): BandColor[] {
    return stops.map(stop => ({
      channel: stop.channel,
      color: this.interpolateColor(factor, stop.start, stop.end),
    }));
  }
}
