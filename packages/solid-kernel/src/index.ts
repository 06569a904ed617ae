// Public API
export { Solid } from './solid.js';
export type { SolidReadback } from './solid.js';
export type { Vec2, Vec3, Axis, BoundingBox } from './vec3.js';
export { rotateAbout } from './vec3.js';

// 2D Profile API
export { Profile2D, Polygon2D } from './profile2d.js';
export type { BoundingBox2D } from './profile2d.js';

// Constructors
export { polygon, extrude, hull, union } from './api.js';

// Mesh evaluation + export
export type { TriangleMesh } from './mesh.js';
export { makeMesh, mergeMeshes, meshBounds, meshVolume } from './mesh.js';
export { convexHull } from './hull.js';
export { exportSTL, exportAsciiSTL } from './stl.js';

// Node classes (for advanced use / type checking)
export { Extrude, Hull, Union, Translate, RotateAxis, Mirror } from './solid.js';
