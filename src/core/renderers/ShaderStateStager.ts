/**
 * ShaderStateStager - Stages per-draw uniform state for the scene shader
 *
 * State is sticky: a field keeps whatever the last draw staged until a later
 * draw overwrites it. Nothing is reset between draws. The expected sequence
 * per object is:
 *
 *   applyTransform()                         always
 *   setFlatColor / setTexture / setMaterial / setUVScale   as needed
 *   draw
 *
 * Per-field persistence:
 * - model, normal: replaced by every applyTransform()
 * - color: replaced by setFlatColor()
 * - useTexture: set by setTexture(), cleared by setFlatColor()
 * - sampler: replaced by setTexture(), also when the tag is unknown (-1)
 * - material: replaced by setMaterial() only when the tag resolves
 * - uvScale: replaced by setUVScale()
 * - useLighting: replaced by setLighting()
 */

import { mat3, mat4 } from 'gl-matrix';
import { UNIFORM } from '../gpu/uniformNames';
import type { ShaderUniforms } from '../gpu/types';
import type { TextureRegistry } from '../gpu/TextureRegistry';
import type { MaterialLookup, MaterialRegistry } from '../materials/MaterialRegistry';
import { composeTransform, type ComposedTransform, type TransformRequest } from '../utils/mathUtils';
import type { RGB, RGBA, Vec2 } from '../types';

/**
 * Material values as last staged
 */
export interface StagedMaterial {
  tag: string;
  diffuseColor: RGB;
  specularColor: RGB;
  shininess: number;
}

/**
 * Mirror of the staged uniform values. `null` means never staged.
 */
export interface ShaderStateSnapshot {
  model: mat4 | null;
  normal: mat3 | null;
  color: RGBA | null;
  useTexture: boolean | null;
  useLighting: boolean | null;
  sampler: number | null;
  uvScale: Vec2 | null;
  material: StagedMaterial | null;
}

/**
 * Everything one draw may stage. Only `transform` is required; absent fields
 * keep their previous values.
 */
export interface ObjectDrawState {
  transform: TransformRequest | ComposedTransform;
  color?: RGBA;
  texture?: string;
  material?: string;
  uvScale?: Vec2;
}

const emptySnapshot = (): ShaderStateSnapshot => ({
  model: null,
  normal: null,
  color: null,
  useTexture: null,
  useLighting: null,
  sampler: null,
  uvScale: null,
  material: null,
});

const isComposed = (transform: TransformRequest | ComposedTransform): transform is ComposedTransform =>
  'model' in transform && 'normal' in transform;

export class ShaderStateStager {
  private readonly uniforms: ShaderUniforms;
  private readonly textures: TextureRegistry;
  private readonly materials: MaterialRegistry;
  private readonly state: ShaderStateSnapshot = emptySnapshot();

  constructor(uniforms: ShaderUniforms, textures: TextureRegistry, materials: MaterialRegistry) {
    this.uniforms = uniforms;
    this.textures = textures;
    this.materials = materials;
  }

  applyTransform(model: mat4, normal: mat3): void {
    this.uniforms.setMat4(UNIFORM.MODEL, model);
    this.uniforms.setMat3(UNIFORM.NORMAL, normal);
    this.state.model = mat4.clone(model);
    this.state.normal = mat3.clone(normal);
  }

  /**
   * Compose and stage the matrices for a placement request
   */
  applyTransformRequest(request: TransformRequest): ComposedTransform {
    const composed = composeTransform(request);
    this.applyTransform(composed.model, composed.normal);
    return composed;
  }

  /**
   * Flat color and texture sampling are exclusive, so this also clears useTexture
   */
  setFlatColor(r: number, g: number, b: number, a: number): void {
    const color: RGBA = [r, g, b, a];
    this.uniforms.setBool(UNIFORM.USE_TEXTURE, false);
    this.uniforms.setVec4(UNIFORM.OBJECT_COLOR, color);
    this.state.useTexture = false;
    this.state.color = color;
  }

  /**
   * Sample the texture registered under tag. An unknown tag stages the
   * not-found slot (-1); only set tags that were loaded.
   * @returns the staged slot
   */
  setTexture(tag: string): number {
    const slot = this.textures.findSlot(tag);
    this.uniforms.setBool(UNIFORM.USE_TEXTURE, true);
    this.uniforms.setSampler2D(UNIFORM.OBJECT_TEXTURE, slot);
    this.state.useTexture = true;
    this.state.sampler = slot;
    return slot;
  }

  /**
   * Stage the material registered under tag. A miss writes nothing, so the
   * previously staged material stays in effect.
   */
  setMaterial(tag: string): MaterialLookup {
    const lookup = this.materials.lookup(tag);
    if (!lookup.found || !lookup.material) {
      return lookup;
    }

    const { diffuseColor, specularColor, shininess } = lookup.material;
    this.uniforms.setVec3(UNIFORM.MATERIAL_DIFFUSE, diffuseColor);
    this.uniforms.setVec3(UNIFORM.MATERIAL_SPECULAR, specularColor);
    this.uniforms.setFloat(UNIFORM.MATERIAL_SHININESS, shininess);
    this.state.material = { tag, diffuseColor, specularColor, shininess };
    return lookup;
  }

  setUVScale(u: number, v: number): void {
    const scale: Vec2 = [u, v];
    this.uniforms.setVec2(UNIFORM.UV_SCALE, scale);
    this.state.uvScale = scale;
  }

  setLighting(enabled: boolean): void {
    this.uniforms.setBool(UNIFORM.USE_LIGHTING, enabled);
    this.state.useLighting = enabled;
  }

  /**
   * Stage one object: transform, then color, texture, material and UV scale
   * for the fields present. Color goes before texture, so an object with both
   * ends up textured.
   */
  stageObject(draw: ObjectDrawState): void {
    const { model, normal } = isComposed(draw.transform) ? draw.transform : composeTransform(draw.transform);
    this.applyTransform(model, normal);

    if (draw.color) this.setFlatColor(...draw.color);
    if (draw.texture !== undefined) this.setTexture(draw.texture);
    if (draw.material !== undefined) this.setMaterial(draw.material);
    if (draw.uvScale) this.setUVScale(...draw.uvScale);
  }

  /**
   * Stage one object and issue its draw call
   */
  drawObject(draw: ObjectDrawState, issueDraw: () => void): void {
    this.stageObject(draw);
    issueDraw();
  }

  snapshot(): ShaderStateSnapshot {
    const s = this.state;
    return {
      model: s.model ? mat4.clone(s.model) : null,
      normal: s.normal ? mat3.clone(s.normal) : null,
      color: s.color ? [...s.color] : null,
      useTexture: s.useTexture,
      useLighting: s.useLighting,
      sampler: s.sampler,
      uvScale: s.uvScale ? [...s.uvScale] : null,
      material: s.material
        ? {
            tag: s.material.tag,
            diffuseColor: [...s.material.diffuseColor],
            specularColor: [...s.material.specularColor],
            shininess: s.material.shininess,
          }
        : null,
    };
  }
}
