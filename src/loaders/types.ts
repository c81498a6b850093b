/**
 * Shared types for scene manifest loading
 */

import type { MaterialDescriptor } from '../core/materials/MaterialRegistry';
import type { SerializedLightingRig } from '../core/lighting/LightingRig';

/**
 * Image file to register under a texture tag
 */
export interface TextureEntry {
  /** Absolute path, resolved against the manifest's directory */
  path: string;
  tag: string;
}

/**
 * Every resource a scene needs before its first draw
 */
export interface SceneManifest {
  name: string;
  textures: TextureEntry[];
  materials: MaterialDescriptor[];
  lights: SerializedLightingRig;
}
