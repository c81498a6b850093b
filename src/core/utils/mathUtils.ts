/**
 * Math utilities for 3D graphics
 * Coordinate system: OpenGL (right-handed)
 * +X is to the right, +Y is up, +Z is towards the viewer
 */

import { mat3, mat4, vec3 } from 'gl-matrix';
import type { Vec3 } from '../types';

const DEG_TO_RAD = Math.PI / 180;

/**
 * Placement of one object: scale, Euler rotation in degrees (X, Y, Z) and position
 */
export interface TransformRequest {
  scale: Vec3;
  rotationDegrees: Vec3;
  position: Vec3;
}

/**
 * Model matrix plus the matching normal matrix
 */
export interface ComposedTransform {
  model: mat4;
  normal: mat3;
}

export const degToRad = (degrees: number): number => degrees * DEG_TO_RAD;

/**
 * Build the model and normal matrices for an object.
 *
 * model = T(position) * Rz * Ry * Rx * S(scale), so a vertex is scaled first,
 * rotated about local X, then Y, then Z, and translated last.
 * normal = transpose(inverse(upper-left 3x3 of model)). A zero scale component
 * leaves the 3x3 singular; the normal matrix is then the identity.
 */
export const composeTransform = (request: TransformRequest): ComposedTransform => {
  const [rx, ry, rz] = request.rotationDegrees;

  const model = mat4.create();
  mat4.translate(model, model, request.position);
  mat4.rotateZ(model, model, degToRad(rz));
  mat4.rotateY(model, model, degToRad(ry));
  mat4.rotateX(model, model, degToRad(rx));
  mat4.scale(model, model, request.scale);

  const normal = mat3.create();
  if (!mat3.normalFromMat4(normal, model)) {
    mat3.identity(normal);
  }

  return { model, normal };
};

/**
 * Transform a point by a model matrix (w = 1)
 */
export const transformPoint = (point: Vec3, model: mat4): Vec3 => {
  const out = vec3.create();
  vec3.transformMat4(out, point, model);
  return [out[0], out[1], out[2]];
};

/**
 * Transform a direction by a normal matrix and normalize it
 */
export const transformNormal = (normal: Vec3, normalMatrix: mat3): Vec3 => {
  const out = vec3.create();
  vec3.transformMat3(out, normal, normalMatrix);
  vec3.normalize(out, out);
  return [out[0], out[1], out[2]];
};

/**
 * Normalize a direction, leaving a zero vector untouched
 */
export const normalizeDirection = (direction: Vec3): Vec3 => {
  const out = vec3.fromValues(direction[0], direction[1], direction[2]);
  vec3.normalize(out, out);
  return [out[0], out[1], out[2]];
};
