/**
 * Canonical uniform names of the scene shader program.
 * Every uniform write goes through these names; call sites never spell them out.
 */
export const UNIFORM = {
  // ==================== Transform ====================
  MODEL: 'model',
  NORMAL: 'normal',

  // ==================== Surface ====================
  OBJECT_COLOR: 'objectColor',
  OBJECT_TEXTURE: 'objectTexture',
  USE_TEXTURE: 'bUseTexture',
  UV_SCALE: 'UVscale',

  // ==================== Material ====================
  MATERIAL_DIFFUSE: 'material.diffuseColor',
  MATERIAL_SPECULAR: 'material.specularColor',
  MATERIAL_SHININESS: 'material.shininess',

  // ==================== Lighting ====================
  USE_LIGHTING: 'bUseLighting',
} as const;

export type UniformName = (typeof UNIFORM)[keyof typeof UNIFORM];

export type DirectionalLightField = 'direction' | 'ambient' | 'diffuse' | 'specular' | 'bActive';

export type PointLightField =
  | 'position'
  | 'ambient'
  | 'diffuse'
  | 'specular'
  | 'constant'
  | 'linear'
  | 'quadratic'
  | 'bActive';

export const directionalLightUniform = (field: DirectionalLightField): string =>
  `directionalLight.${field}`;

export const pointLightUniform = (index: number, field: PointLightField): string =>
  `pointLights[${index}].${field}`;
