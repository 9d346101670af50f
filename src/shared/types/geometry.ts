/**
 * Grid position. `z` is the level index.
 */
export interface Position3D {
  x: number;
  y: number;
  z: number;
}
