import { PathCodecService, VectorPath } from '../services/path-codec.service';
import { RECTANGLE, SQUARE } from './helpers/shape.helper';

describe('PathCodecService', () => {
  let codec: PathCodecService;

  beforeEach(() => {
    codec = new PathCodecService();
  });

  describe('parse', () => {
    it('should tag each coordinate pair with the last seen class', () => {
      const path = codec.parse('m 0 0 l 10 0 10 10 0 10');

      expect(path).toEqual(SQUARE);
    });

    it('should accept negative coordinates and curve commands', () => {
      const path = codec.parse('m -5 -5 b 10 -5 20 0 20 10 l 0 20');

      expect(path).toEqual([
        { class: 'm', x: -5, y: -5 },
        { class: 'b', x: 10, y: -5 },
        { class: 'b', x: 20, y: 0 },
        { class: 'b', x: 20, y: 10 },
        { class: 'l', x: 0, y: 20 },
      ]);
    });

    it('should accept commands without spaces before the first number', () => {
      expect(codec.parse('m0 0 l10 0 10 10')).toEqual([
        { class: 'm', x: 0, y: 0 },
        { class: 'l', x: 10, y: 0 },
        { class: 'l', x: 10, y: 10 },
      ]);
    });

    it('should return an empty path for a dangling coordinate', () => {
      expect(codec.parse('m 0 0 l 10')).toEqual([]);
    });

    it('should return an empty path for decimal coordinates', () => {
      expect(codec.parse('m 1.5 2 l 3 4 5 6')).toEqual([]);
    });

    it('should return an empty path for text without commands', () => {
      expect(codec.parse('')).toEqual([]);
      expect(codec.parse('hello')).toEqual([]);
    });
  });

  describe('parseClip', () => {
    it('should read the leading scale exponent', () => {
      const clip = codec.parseClip('2,m 0 0 l 20 0 20 20');

      expect(clip.scaleExponent).toBe(2);
      expect(clip.path).toHaveLength(3);
      expect(clip.path[2]).toEqual({ class: 'l', x: 20, y: 20 });
    });

    it('should default the scale exponent to 1', () => {
      expect(codec.parseClip('m 0 0 l 10 0 10 10').scaleExponent).toBe(1);
    });

    it('should convert the rectangle shorthand to a vector path', () => {
      const clip = codec.parseClip('0,0,100,50');

      expect(clip.scaleExponent).toBe(1);
      expect(clip.path).toEqual(RECTANGLE);
    });

    it('should round decimal rectangle coordinates half up', () => {
      const clip = codec.parseClip('10.4, 20.5, 30, 40');

      expect(clip.path).toEqual([
        { class: 'm', x: 10, y: 21 },
        { class: 'l', x: 30, y: 21 },
        { class: 'l', x: 30, y: 40 },
        { class: 'l', x: 10, y: 40 },
      ]);
    });
  });

  describe('serialize', () => {
    it('should write a class tag only when it changes', () => {
      expect(codec.serialize(SQUARE)).toBe('m 0 0 l 10 0 10 10 0 10');
    });

    it('should compress repeated move commands too', () => {
      const path: VectorPath = [
        { class: 'm', x: 0, y: 0 },
        { class: 'm', x: 5, y: 5 },
        { class: 'l', x: 1, y: 1 },
      ];

      expect(codec.serialize(path)).toBe('m 0 0 5 5 l 1 1');
    });

    it('should round-trip through parse', () => {
      const path: VectorPath = [
        { class: 'm', x: -3, y: 7 },
        { class: 'l', x: 40, y: 7 },
        { class: 'b', x: 50, y: 20 },
        { class: 'b', x: 45, y: 35 },
        { class: 'b', x: 30, y: 40 },
        { class: 'l', x: -3, y: 40 },
      ];

      expect(codec.parse(codec.serialize(path))).toEqual(path);
    });

    it('should keep an already compressed drawing unchanged', () => {
      const text = 'm 0 0 l 10 0 b 20 0 20 10 10 10 l 0 10';

      expect(codec.serialize(codec.parse(text))).toBe(text);
    });

    it('should return an empty string for an empty path', () => {
      expect(codec.serialize([])).toBe('');
    });
  });

  describe('formatClip', () => {
    it('should prefix the scale exponent', () => {
      expect(codec.formatClip(SQUARE, 3)).toBe('3,m 0 0 l 10 0 10 10 0 10');
    });
  });

  describe('roundTo', () => {
    it('should round halves up', () => {
      expect(codec.roundTo(2.5)).toBe(3);
      expect(codec.roundTo(-2.5)).toBe(-2);
      expect(codec.roundTo(-2.6)).toBe(-3);
    });

    it('should round to the given number of decimals', () => {
      expect(codec.roundTo(1.234, 2)).toBe(1.23);
      expect(codec.roundTo(1.236, 2)).toBe(1.24);
    });
  });
});
