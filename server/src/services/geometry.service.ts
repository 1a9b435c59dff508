/// <reference path="../types/clipper-lib.d.ts" />
import * as ClipperLib from 'clipper-lib';
import { Vertex, VectorPath } from './path-codec.service';

export interface Point {
  x: number;
  y: number;
}

export interface WrappedVertex extends Vertex {
  /** Index of the vertex in the unwrapped path */
  index: number;
}

export type Winding = 1 | -1;

const ANGLE_EPSILON = 1e-9;

/**
 * Raised when a shape cannot be offset at all (empty, too few points,
 * nothing but move commands, no area, or no orientation)
 */
export class UnusableShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnusableShapeError';
  }
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Floored modulo, so negative angles land in [0, n)
 */
export function mod(value: number, n: number): number {
  return ((value % n) + n) % n;
}

export function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

export class GeometryService {
  prevIndex(index: number, length: number): number {
    return (index - 1 + length) % length;
  }

  nextIndex(index: number, length: number): number {
    return (index + 1) % length;
  }

  /**
   * Copy the path with the last vertex duplicated in front and the first
   * duplicated at the end, so every real vertex has both neighbours in place
   */
  wrap(path: VectorPath): WrappedVertex[] {
    if (path.length === 0) return [];

    const last = path.length - 1;
    return [
      { ...path[last], index: last },
      ...path.map((vertex, index) => ({ ...vertex, index })),
      { ...path[0], index: 0 },
    ];
  }

  unwrap(wrapped: WrappedVertex[]): VectorPath {
    return wrapped.slice(1, -1).map(({ class: vertexClass, x, y }) => ({ class: vertexClass, x, y }));
  }

  /**
   * Drop vertices that repeat their predecessor, including across the closing edge
   */
  mergeIdentical(path: VectorPath): VectorPath {
    const merged = path.filter((vertex, i) => i === 0 || !samePoint(vertex, path[i - 1]));
    while (merged.length > 1 && samePoint(merged[merged.length - 1], merged[0])) {
      merged.pop();
    }
    return merged;
  }

  countDistinct(path: VectorPath): number {
    return new Set(path.map(p => `${p.x},${p.y}`)).size;
  }

  /**
   * Sum of the turning angles in degrees, each turn taken in (-180, 180]
   * and exact reversals counted as 0. Zero when the shape has fewer than
   * 3 distinct points or is collinear.
   */
  totalTurning(path: VectorPath): number {
    const points = this.mergeIdentical(path);
    const n = points.length;
    if (n < 3) return 0;

    let total = 0;
    for (let i = 0; i < n; i++) {
      const prev = points[this.prevIndex(i, n)];
      const current = points[i];
      const next = points[this.nextIndex(i, n)];

      const incoming = Math.atan2(current.y - prev.y, current.x - prev.x);
      const outgoing = Math.atan2(next.y - current.y, next.x - current.x);
      const turn = mod(toDegrees(outgoing - incoming), 360);

      // A reversal has no side; count it as going straight
      if (Math.abs(turn - 180) < ANGLE_EPSILON) continue;
      total += turn > 180 ? turn - 360 : turn;
    }

    return total;
  }

  /**
   * Sign of the total turning angle: +1 when the path turns left overall
   * (counter-clockwise with y pointing up), -1 otherwise
   */
  signedWinding(path: VectorPath): Winding {
    const total = this.totalTurning(path);
    if (total === 0) {
      throw new UnusableShapeError('Shape has no orientation (fewer than 3 distinct points, or collinear)');
    }
    return total > 0 ? 1 : -1;
  }

  /**
   * Reverse the drawing direction. Classes shift by one position so that each
   * command still connects the same pair of points.
   */
  reverse(path: VectorPath): VectorPath {
    if (path.length === 0) return [];

    let start = path.length - 1;
    while (start >= 0 && path[start].class === 'm') {
      start--;
    }
    if (start < 0) {
      throw new UnusableShapeError('Shape contains only move commands');
    }

    const reversed: VectorPath = [{ ...path[start], class: 'm' }];
    let carried = path[start].class;
    for (let i = start - 1; i >= 0; i--) {
      reversed.push({ ...path[i], class: carried });
      carried = path[i].class;
    }

    return reversed;
  }

  /**
   * Unsigned area of a closed path
   */
  polygonArea(points: Point[]): number {
    if (points.length < 3) return 0;
    return Math.abs(ClipperLib.Clipper.Area(this.toClipperPath(points)));
  }

  private toClipperPath(points: Point[]): ClipperLib.Path {
    return points.map(p => ({ X: p.x, Y: p.y }));
  }
}
