/**
 * Core type aliases shared by the registries, the stager and the loaders.
 */

/**
 * 2D vector tuple [x, y]
 * Used for texture coordinate scales
 */
export type Vec2 = [number, number];

/**
 * 3D vector tuple [x, y, z]
 * Used for positions, directions, rotations, scales
 */
export type Vec3 = [number, number, number];

/**
 * RGB color tuple [r, g, b] with values 0-1
 */
export type RGB = [number, number, number];

/**
 * RGBA color tuple [r, g, b, a] with values 0-1
 */
export type RGBA = [number, number, number, number];
