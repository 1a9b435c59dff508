import { GeometryService } from '../services/geometry.service';
import { OffsetService } from '../services/offset.service';
import { VectorPath } from '../services/path-codec.service';
import {
  NOTCHED_SQUARE,
  RECTANGLE,
  TABBED_SQUARE,
  TRIANGLE,
  containsPoint,
  coordinates,
  distanceToLine,
  findAxisFlips,
  polygon,
  regularPolygon,
} from './helpers/shape.helper';

describe('OffsetService', () => {
  let service: OffsetService;
  let geometry: GeometryService;

  beforeEach(() => {
    service = new OffsetService();
    geometry = new GeometryService();
  });

  describe('grow', () => {
    it('should grow a rectangle outward by the radius', () => {
      expect(service.grow(RECTANGLE, 10)).toEqual([
        { class: 'm', x: -10, y: -10 },
        { class: 'l', x: 110, y: -10 },
        { class: 'l', x: 110, y: 60 },
        { class: 'l', x: -10, y: 60 },
      ]);
    });

    it('should shrink a rectangle for a negative radius', () => {
      expect(coordinates(service.grow(RECTANGLE, -10))).toEqual([[10, 10], [90, 10], [90, 40], [10, 40]]);
      expect(coordinates(service.grow(RECTANGLE, -1))).toEqual([[1, 1], [99, 1], [99, 49], [1, 49]]);
    });

    it('should grow by the same amount whichever way the path is drawn', () => {
      const reversed = geometry.reverse(RECTANGLE);

      expect(service.grow(reversed, 10)).toEqual([
        { class: 'm', x: -10, y: 60 },
        { class: 'l', x: 110, y: 60 },
        { class: 'l', x: 110, y: -10 },
        { class: 'l', x: -10, y: -10 },
      ]);
    });

    it('should multiply coordinates and offset by the scale', () => {
      expect(coordinates(service.grow(RECTANGLE, 10, 2))).toEqual([[-20, -20], [220, -20], [220, 120], [-20, 120]]);
    });

    it('should only rescale for radius 0', () => {
      expect(service.grow(RECTANGLE, 0)).toEqual(RECTANGLE);
      expect(coordinates(service.grow(RECTANGLE, 0, 4))).toEqual([[0, 0], [400, 0], [400, 200], [0, 200]]);
    });

    it('should keep offset edges at the radius from the source edges', () => {
      const grown = service.grow(TRIANGLE, 10);

      expect(coordinates(grown)).toEqual([[-18, -10], [118, -10], [50, 99]]);

      for (let i = 0; i < TRIANGLE.length; i++) {
        const prev = TRIANGLE[(i + TRIANGLE.length - 1) % TRIANGLE.length];
        const next = TRIANGLE[(i + 1) % TRIANGLE.length];
        // Integer rounding moves each point by at most half a unit per axis
        expect(Math.abs(distanceToLine(grown[i], prev, TRIANGLE[i]) - 10)).toBeLessThan(0.75);
        expect(Math.abs(distanceToLine(grown[i], TRIANGLE[i], next) - 10)).toBeLessThan(0.75);
      }
    });

    it('should contain the source shape when growing a convex shape', () => {
      const grown = service.grow(regularPolygon(50, 50, 40, 6), 8);

      for (const vertex of regularPolygon(50, 50, 40, 6)) {
        expect(containsPoint(grown, vertex)).toBe(true);
      }
      expect(geometry.polygonArea(grown)).toBeGreaterThan(geometry.polygonArea(regularPolygon(50, 50, 40, 6)));
    });

    it('should preserve vertex classes', () => {
      const path: VectorPath = [
        { class: 'm', x: 0, y: 0 },
        { class: 'b', x: 100, y: 0 },
        { class: 'b', x: 100, y: 50 },
        { class: 'l', x: 0, y: 50 },
      ];

      expect(service.grow(path, 5).map(vertex => vertex.class)).toEqual(['m', 'b', 'b', 'l']);
    });

    it('should give repeated vertices the same offset point', () => {
      const path = polygon([[0, 0], [10, 0], [10, 0], [10, 10], [0, 10]]);

      expect(coordinates(service.grow(path, 5))).toEqual([[-5, -5], [15, -5], [15, -5], [15, 15], [-5, 15]]);
    });

    it('should collapse a rectangle shrunk past its half height onto a line', () => {
      expect(service.grow(RECTANGLE, -30)).toEqual([
        { class: 'm', x: 30, y: 25 },
        { class: 'l', x: 70, y: 25 },
        { class: 'l', x: 70, y: 25 },
        { class: 'l', x: 30, y: 25 },
      ]);
    });

    it('should collapse a tab narrower than the shrink distance', () => {
      expect(coordinates(service.grow(TABBED_SQUARE, -10))).toEqual([
        [10, 10], [50, 10], [45, -20], [45, -20], [40, 10], [90, 10], [90, 90], [10, 90],
      ]);
    });

    it('should leave no edge running against its source edge', () => {
      const cases: Array<[VectorPath, number]> = [
        [NOTCHED_SQUARE, -10],
        [NOTCHED_SQUARE, 15],
        [TABBED_SQUARE, -10],
        [TABBED_SQUARE, -20],
        [RECTANGLE, -40],
        [regularPolygon(50, 50, 40, 7), -25],
      ];

      for (const [path, radius] of cases) {
        const grown = service.grow(path, radius);
        expect(grown).toHaveLength(path.length);
        expect(findAxisFlips(path, grown)).toEqual([]);
      }
    });

    it('should return an empty path for fewer than 3 distinct points', () => {
      expect(service.grow(polygon([[0, 0], [10, 0]]), 5)).toEqual([]);
      expect(service.grow(polygon([[0, 0], [10, 0], [10, 0], [0, 0]]), 5)).toEqual([]);
    });

    it('should return an empty path for collinear points', () => {
      expect(service.grow(polygon([[0, 0], [10, 0], [20, 0]]), 5)).toEqual([]);
    });
  });

  describe('resolveCrossovers', () => {
    it('should leave a clean offset untouched', () => {
      const grown = polygon([[-10, -10], [110, -10], [110, 60], [-10, 60]]);

      expect(service.resolveCrossovers(RECTANGLE, grown)).toEqual(grown);
    });

    it('should merge across the closing edge', () => {
      const grown = polygon([[30, 30], [70, 30], [70, 20], [30, 20]]);

      expect(coordinates(service.resolveCrossovers(RECTANGLE, grown))).toEqual([[30, 25], [70, 25], [70, 25], [30, 25]]);
    });

    it('should weight merged points by how many vertices they already hold', () => {
      const source = polygon([[0, 0], [10, 0], [20, 0], [20, 10], [0, 10]]);
      const grown = polygon([[0, 0], [12, 0], [9, 0], [9, -3], [0, 10]]);

      expect(service.resolveCrossovers(source, grown)).toEqual([
        { class: 'm', x: 0, y: 0 },
        { class: 'l', x: 10, y: -1 },
        { class: 'l', x: 10, y: -1 },
        { class: 'l', x: 10, y: -1 },
        { class: 'l', x: 0, y: 10 },
      ]);
    });
  });
});
