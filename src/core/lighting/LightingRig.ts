import { directionalLightUniform, pointLightUniform } from '../gpu/uniformNames';
import type { ShaderUniforms } from '../gpu/types';
import { normalizeDirection } from '../utils/mathUtils';
import type { RGB, Vec3 } from '../types';

/** Point light slots declared by the scene shader */
export const MAX_POINT_LIGHTS = 4;

/**
 * Directional light parameters for shader uniforms
 */
export interface DirectionalLightParams {
  direction: Vec3;
  ambient: RGB;
  diffuse: RGB;
  specular: RGB;
  active: boolean;
}

/**
 * Point light parameters for shader uniforms.
 * Attenuation = 1 / (constant + linear * d + quadratic * d²)
 */
export interface PointLightParams {
  position: Vec3;
  ambient: RGB;
  diffuse: RGB;
  specular: RGB;
  constant: number;
  linear: number;
  quadratic: number;
  active: boolean;
}

/**
 * Serialized lighting rig data
 */
export interface SerializedLightingRig {
  directional: DirectionalLightParams | null;
  pointLights: PointLightParams[];
}

const copyDirectional = (light: DirectionalLightParams): DirectionalLightParams => ({
  direction: [...light.direction],
  ambient: [...light.ambient],
  diffuse: [...light.diffuse],
  specular: [...light.specular],
  active: light.active,
});

const copyPoint = (light: PointLightParams): PointLightParams => ({
  position: [...light.position],
  ambient: [...light.ambient],
  diffuse: [...light.diffuse],
  specular: [...light.specular],
  constant: light.constant,
  linear: light.linear,
  quadratic: light.quadratic,
  active: light.active,
});

/**
 * Lighting Rig - one directional light plus up to four point lights,
 * staged once at scene load
 */
export class LightingRig {
  private directional: DirectionalLightParams | null = null;
  private points: PointLightParams[] = [];

  get directionalLight(): DirectionalLightParams | null {
    return this.directional ? copyDirectional(this.directional) : null;
  }

  get pointLights(): PointLightParams[] {
    return this.points.map(copyPoint);
  }

  /**
   * Whether any light would be staged active
   */
  get hasActiveLights(): boolean {
    return (this.directional?.active ?? false) || this.points.some(p => p.active);
  }

  setDirectionalLight(light: DirectionalLightParams | null): void {
    this.directional = light ? copyDirectional(light) : null;
  }

  /**
   * Add a point light
   * @returns false when all point light slots are taken
   */
  addPointLight(light: PointLightParams): boolean {
    if (this.points.length >= MAX_POINT_LIGHTS) {
      console.warn(`[LightingRig] Point light limit of ${MAX_POINT_LIGHTS} reached; light ignored`);
      return false;
    }
    this.points.push(copyPoint(light));
    return true;
  }

  clear(): void {
    this.directional = null;
    this.points = [];
  }

  /**
   * Stage every light. Point light slots without a light are staged inactive.
   */
  apply(uniforms: ShaderUniforms): void {
    const sun = this.directional;
    if (sun) {
      uniforms.setVec3(directionalLightUniform('direction'), normalizeDirection(sun.direction));
      uniforms.setVec3(directionalLightUniform('ambient'), sun.ambient);
      uniforms.setVec3(directionalLightUniform('diffuse'), sun.diffuse);
      uniforms.setVec3(directionalLightUniform('specular'), sun.specular);
    }
    uniforms.setBool(directionalLightUniform('bActive'), sun?.active ?? false);

    for (let i = 0; i < MAX_POINT_LIGHTS; i++) {
      const light = this.points[i];
      if (!light) {
        uniforms.setBool(pointLightUniform(i, 'bActive'), false);
        continue;
      }
      uniforms.setVec3(pointLightUniform(i, 'position'), light.position);
      uniforms.setVec3(pointLightUniform(i, 'ambient'), light.ambient);
      uniforms.setVec3(pointLightUniform(i, 'diffuse'), light.diffuse);
      uniforms.setVec3(pointLightUniform(i, 'specular'), light.specular);
      uniforms.setFloat(pointLightUniform(i, 'constant'), light.constant);
      uniforms.setFloat(pointLightUniform(i, 'linear'), light.linear);
      uniforms.setFloat(pointLightUniform(i, 'quadratic'), light.quadratic);
      uniforms.setBool(pointLightUniform(i, 'bActive'), light.active);
    }
  }

  serialize(): SerializedLightingRig {
    return {
      directional: this.directionalLight,
      pointLights: this.pointLights,
    };
  }

  deserialize(data: Partial<SerializedLightingRig>): void {
    this.clear();
    if (data.directional) {
      this.setDirectionalLight(data.directional);
    }
    if (data.pointLights && Array.isArray(data.pointLights)) {
      data.pointLights.forEach(light => this.addPointLight(light));
    }
  }
}
