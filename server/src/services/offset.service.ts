import { GeometryService, mod, samePoint, toDegrees, toRadians } from './geometry.service';
import { PathCodecService, VectorPath } from './path-codec.service';

/**
 * Offset vertices that collapsed onto one point while resolving crossovers.
 * `members` are indices into the source path in drawing order; their classes
 * are the tags the merged point carries.
 */
export interface MergeBucket {
  x: number;
  y: number;
  members: number[];
}

// Below this the miter is treated as a straight reversal
const MITER_EPSILON = 0.00001;

export class OffsetService {
  private geometry = new GeometryService();
  private codec = new PathCodecService();

  /**
   * Grow a closed path outward by `radius` (inward when negative), with
   * coordinates multiplied by `scale`. Radius 0 only rescales.
   * Shapes with fewer than 3 distinct points or no area give an empty path.
   */
  grow(path: VectorPath, radius: number, scale: number = 1): VectorPath {
    if (this.geometry.countDistinct(path) < 3) return [];

    const turning = this.geometry.totalTurning(path);
    if (turning === 0) return [];

    // Clip space has y pointing down, which mirrors the turn direction
    const handedness = turning > 0 ? -1 : 1;

    const grown = path.map((vertex, i) => {
      const prev = path[this.findNeighbour(path, i, -1)];
      const next = path[this.findNeighbour(path, i, 1)];

      const incoming = toDegrees(Math.atan2(vertex.y - prev.y, vertex.x - prev.x));
      const outgoing = toDegrees(Math.atan2(next.y - vertex.y, next.x - vertex.x));
      const turn = mod(outgoing - incoming, 360);

      let bisector = mod(0.5 * turn + 90, 180);
      if (handedness < 0) bisector += 180;

      const miter = Math.cos(toRadians(handedness * 90 - bisector));
      const adjusted = Math.abs(miter) < MITER_EPSILON ? radius : radius / Math.abs(miter);

      let x = vertex.x * scale;
      let y = vertex.y * scale;
      if (radius !== 0) {
        const direction = toRadians(bisector + incoming);
        x += scale * this.codec.roundTo(adjusted * Math.cos(direction));
        y += scale * this.codec.roundTo(adjusted * Math.sin(direction));
      }

      return { class: vertex.class, x, y };
    });

    return this.resolveCrossovers(path, grown);
  }

  /**
   * Merge neighbouring offset points whose connecting edge runs against the
   * source edge on either axis. Passes repeat, closing edge included, until
   * nothing merges. Each source vertex keeps its slot and class in the result.
   */
  resolveCrossovers(source: VectorPath, grown: VectorPath): VectorPath {
    let buckets: MergeBucket[] = grown.map((vertex, i) => ({ x: vertex.x, y: vertex.y, members: [i] }));

    let mergedAny = true;
    while (mergedAny && buckets.length > 1) {
      mergedAny = false;

      const pass: MergeBucket[] = [buckets[0]];
      for (let k = 1; k < buckets.length; k++) {
        const tail = pass[pass.length - 1];
        if (this.crosses(source, tail, buckets[k])) {
          pass[pass.length - 1] = this.mergeBuckets(tail, buckets[k]);
          mergedAny = true;
        } else {
          pass.push(buckets[k]);
        }
      }

      if (pass.length > 1) {
        const last = pass[pass.length - 1];
        if (this.crosses(source, last, pass[0])) {
          pass[0] = this.mergeBuckets(last, pass[0]);
          pass.pop();
          mergedAny = true;
        }
      }

      buckets = pass;
    }

    const result: VectorPath = source.map(vertex => ({ class: vertex.class, x: 0, y: 0 }));
    for (const bucket of buckets) {
      const x = this.codec.roundTo(bucket.x);
      const y = this.codec.roundTo(bucket.y);
      for (const index of bucket.members) {
        result[index] = { class: grown[index].class, x, y };
      }
    }
    return result;
  }

  private crosses(source: VectorPath, from: MergeBucket, to: MergeBucket): boolean {
    const a = source[from.members[from.members.length - 1]];
    const b = source[to.members[0]];
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const ndx = to.x - from.x;
    const ndy = to.y - from.y;
    return dx * ndx < 0 || dy * ndy < 0;
  }

  /**
   * Weighted by how many source vertices each side already holds
   */
  private mergeBuckets(first: MergeBucket, second: MergeBucket): MergeBucket {
    const w1 = first.members.length;
    const w2 = second.members.length;
    return {
      x: (w1 * first.x + w2 * second.x) / (w1 + w2),
      y: (w1 * first.y + w2 * second.y) / (w1 + w2),
      members: [...first.members, ...second.members],
    };
  }

  /**
   * Step from `index` in `direction` until the vertex no longer coincides with it
   */
  private findNeighbour(path: VectorPath, index: number, direction: 1 | -1): number {
    const n = path.length;
    let neighbour = mod(index + direction, n);
    for (let steps = 1; steps < n && samePoint(path[neighbour], path[index]); steps++) {
      neighbour = mod(neighbour + direction, n);
    }
    return neighbour;
  }
}
