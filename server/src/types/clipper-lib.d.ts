declare module 'clipper-lib' {
  export interface IntPoint {
    X: number;
    Y: number;
  }

  export type Path = IntPoint[];

  export class Clipper {
    static Area(poly: Path): number;
    /** 0 when outside, 1 when inside, -1 when on the boundary */
    static PointInPolygon(pt: IntPoint, path: Path): number;
  }
}
