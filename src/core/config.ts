/**
 * SceneConfig - Resource loading options for a scene
 */

import { MAX_TEXTURE_SLOTS, type TextureRegistryOptions } from './gpu/TextureRegistry';

export interface SceneConfig {
  /** Usable texture slots, clamped to [1, 16] */
  textureCapacity: number;
  /** Accept a texture tag twice; lookups then resolve to the first */
  allowDuplicateTextureTags: boolean;
  /** Flip image rows on decode so row 0 is the bottom of the texture */
  flipTexturesVertically: boolean;
}

export const DEFAULT_SCENE_CONFIG: SceneConfig = {
  textureCapacity: MAX_TEXTURE_SLOTS,
  allowDuplicateTextureTags: false,
  flipTexturesVertically: true,
};

/**
 * Merge overrides onto the defaults
 */
export function createSceneConfig(overrides: Partial<SceneConfig> = {}): SceneConfig {
  const config = { ...DEFAULT_SCENE_CONFIG, ...overrides };
  const capacity = Number.isFinite(config.textureCapacity)
    ? Math.floor(config.textureCapacity)
    : MAX_TEXTURE_SLOTS;
  return {
    ...config,
    textureCapacity: Math.min(MAX_TEXTURE_SLOTS, Math.max(1, capacity)),
  };
}

export function textureRegistryOptions(config: SceneConfig): TextureRegistryOptions {
  return {
    capacity: config.textureCapacity,
    allowDuplicateTags: config.allowDuplicateTextureTags,
    flipY: config.flipTexturesVertically,
  };
}
