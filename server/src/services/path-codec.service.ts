/**
 * Path Codec Service
 * Converts vector clip drawing text to vertex lists and back
 */

export type VertexClass = 'm' | 'l' | 'b';

export interface Vertex {
  class: VertexClass;
  x: number;
  y: number;
}

export type VectorPath = Vertex[];

export interface ParsedClip {
  path: VectorPath;
  scaleExponent: number;
}

const RECTANGLE_PATTERN =
  /^\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*$/;
const SCALE_PATTERN = /^\s*([1-4])\s*,/;
const COMMAND_PATTERN = /([mlb])([\d\s-]+)/g;
const INTEGER_PATTERN = /^-?\d+$/;

function isVertexClass(value: string): value is VertexClass {
  return value === 'm' || value === 'l' || value === 'b';
}

export class PathCodecService {
  /**
   * Half-up rounding to the given number of decimals
   */
  roundTo(value: number, decimals: number = 0): number {
    const factor = Math.pow(10, decimals);
    return Math.floor(value * factor + 0.5) / factor;
  }

  /**
   * Parse clip text into a path plus its scale exponent.
   * Accepts the rectangle shorthand `x1,y1,x2,y2` as well.
   * Malformed text yields an empty path.
   */
  parseClip(text: string): ParsedClip {
    const rectangle = this.rectangleToPath(text);
    if (rectangle.length > 0) {
      return { path: rectangle, scaleExponent: 1 };
    }

    const scaleMatch = SCALE_PATTERN.exec(text);
    const scaleExponent = scaleMatch ? Number(scaleMatch[1]) : 1;
    const body = scaleMatch ? text.slice(scaleMatch[0].length) : text;

    return { path: this.parse(body), scaleExponent };
  }

  /**
   * Parse drawing commands (`m 0 0 l 10 0 10 10`) into vertices.
   * A command with a dangling or non-integer coordinate invalidates the whole path.
   */
  parse(text: string): VectorPath {
    const path: VectorPath = [];

    for (const command of text.matchAll(COMMAND_PATTERN)) {
      const vertexClass = command[1];
      if (!isVertexClass(vertexClass)) continue;

      const tokens = command[2].trim().split(/\s+/).filter(token => token.length > 0);
      if (tokens.length === 0 || tokens.length % 2 !== 0) return [];
      if (!tokens.every(token => INTEGER_PATTERN.test(token))) return [];

      for (let i = 0; i < tokens.length; i += 2) {
        path.push({ class: vertexClass, x: Number(tokens[i]), y: Number(tokens[i + 1]) });
      }
    }

    return path;
  }

  /**
   * Convert the `x1,y1,x2,y2` rectangle shorthand into a four-vertex path.
   * Returns an empty path when the text is not a rectangle.
   */
  rectangleToPath(text: string): VectorPath {
    const match = RECTANGLE_PATTERN.exec(text);
    if (!match) return [];

    const [x1, y1, x2, y2] = match.slice(1, 5).map(value => this.roundTo(Number(value)));
    return [
      { class: 'm', x: x1, y: y1 },
      { class: 'l', x: x2, y: y1 },
      { class: 'l', x: x2, y: y2 },
      { class: 'l', x: x1, y: y2 },
    ];
  }

  /**
   * Serialize a path, writing the class tag only when it changes
   */
  serialize(path: VectorPath): string {
    const tokens: string[] = [];
    let currentClass: VertexClass | null = null;

    for (const vertex of path) {
      if (vertex.class !== currentClass) {
        tokens.push(vertex.class);
        currentClass = vertex.class;
      }
      tokens.push(`${vertex.x}`, `${vertex.y}`);
    }

    return tokens.join(' ');
  }

  formatClip(path: VectorPath, scaleExponent: number): string {
    return `${scaleExponent},${this.serialize(path)}`;
  }
}
