/**
 * Gradient Service
 * Builds the stack of offset contours that turns a clip shape into a colour gradient
 *
 * Band layout, innermost first:
 *  - core: the clip shrunk to where the gradient begins, drawn in the start colours
 *    (for inverse clips, everything outside the far edge of the gradient)
 *  - rings: one per step, each the next contour minus the previous one
 *  - cap: whatever lies beyond the last ring, drawn in the end colours
 *    (for inverse clips, the inside of the contour the first ring starts from)
 */
import { GradientConfig, positionOffset } from '../config/gradient.config';
import { BandColor, ColorService, ColorStop } from './color.service';
import { GeometryService, UnusableShapeError } from './geometry.service';
import { OffsetService } from './offset.service';
import { ParsedClip, PathCodecService, VectorPath } from './path-codec.service';

export type BandRole = 'core' | 'ring' | 'cap';

export interface GradientBand {
  index: number;
  role: BandRole;
  outer: VectorPath;
  /** Reversed inner contour cut out of `outer`; empty for core and cap */
  hole: VectorPath;
  /** `outer` followed by `hole`, as a single drawing */
  clip: VectorPath;
  /** Region is everything outside `clip` */
  inverse: boolean;
  factor: number;
  colors: BandColor[];
}

export interface GradientResult {
  scaleExponent: number;
  bands: GradientBand[];
  cap: GradientBand;
}

export interface RenderedBandColor {
  channel: number;
  color: string;
  hex: string;
}

export interface RenderedBand {
  index: number;
  role: BandRole;
  clip: string;
  inverse: boolean;
  factor: number;
  colors: RenderedBandColor[];
}

export interface RenderedGradient {
  scaleExponent: number;
  bands: RenderedBand[];
  cap: RenderedBand;
}

export class GradientService {
  private codec = new PathCodecService();
  private geometry = new GeometryService();
  private offset = new OffsetService();
  private colorService = new ColorService();

  /**
   * Expand a clip into gradient bands.
   * `inverse` marks a clip that selects everything outside its shape; the
   * gradient then runs from the outside in.
   */
  generateBands(clip: ParsedClip, config: GradientConfig, inverse: boolean = false): GradientResult {
    const { path, scaleExponent } = clip;
    this.assertUsable(path);

    const stops = this.colorService.buildColorStops(config.colors);
    const unit = Math.pow(2, scaleExponent - 1);
    const grow = (source: VectorPath, pixels: number) => this.offset.grow(source, pixels * unit);

    const start = positionOffset(config);
    const steps = Math.ceil(config.size / config.stepSize);

    const base = grow(path, 0 - start);
    const bands: GradientBand[] = [
      this.solidBand(0, 'core', inverse ? grow(path, config.size - start - 1) : base, inverse, 0, stops),
    ];

    let previous = base;
    for (let j = 1; j <= steps; j++) {
      const outer = grow(path, Math.min(j * config.stepSize, config.size) - start);
      const hole = this.geometry.reverse(grow(previous, -1));
      // Core and cap take 0 and 1, so rings sit evenly between them
      const progress = j / (steps + 1);
      const factor = inverse ? 1 - progress : progress;

      bands.push({
        index: j,
        role: 'ring',
        outer,
        hole,
        clip: [...outer, ...hole],
        inverse: false,
        factor,
        colors: this.colorService.colorsAt(stops, factor),
      });
      previous = outer;
    }

    // Inverse clips end inside the first ring's inner edge, normal clips beyond the last ring
    const cap = inverse
      ? this.solidBand(steps + 1, 'cap', base, false, 1, stops)
      : this.solidBand(steps + 1, 'cap', grow(previous, -1), true, 1, stops);

    return { scaleExponent, bands, cap };
  }

  /**
   * Serialize bands to clip text and colour tags
   */
  renderBands(result: GradientResult): RenderedGradient {
    const render = (band: GradientBand): RenderedBand => ({
      index: band.index,
      role: band.role,
      clip: this.codec.formatClip(band.clip, result.scaleExponent),
      inverse: band.inverse,
      factor: band.factor,
      colors: band.colors.map(({ channel, color }) => ({
        channel,
        color: this.colorService.toAssColor(color),
        hex: this.colorService.toHexColor(color),
      })),
    });

    return {
      scaleExponent: result.scaleExponent,
      bands: result.bands.map(render),
      cap: render(result.cap),
    };
  }

  /**
   * Fail fast on shapes that cannot be offset
   */
  assertUsable(path: VectorPath): void {
    if (path.length === 0) {
      throw new UnusableShapeError('Clip has no usable vertices');
    }
    if (path.every(vertex => vertex.class === 'm')) {
      throw new UnusableShapeError('Clip contains only move commands');
    }
    const distinct = this.geometry.countDistinct(path);
    if (distinct < 3) {
      throw new UnusableShapeError(`Clip needs at least 3 distinct points, got ${distinct}`);
    }
    if (this.geometry.polygonArea(path) === 0) {
      throw new UnusableShapeError('Clip encloses no area');
    }
    // Throws when the outline has no orientation
    this.geometry.signedWinding(path);
  }

  private solidBand(
    index: number,
    role: BandRole,
    outer: VectorPath,
    inverse: boolean,
    factor: number,
    stops: ColorStop[]
  ): GradientBand {
    return {
      index,
      role,
      outer,
      hole: [],
      clip: outer,
      inverse,
      factor,
      colors: this.colorService.colorsAt(stops, factor),
    };
  }
}
