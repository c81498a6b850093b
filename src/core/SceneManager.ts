/**
 * SceneManager - Owns a scene's resources and the stager that draws with them
 *
 * Lifecycle:
 *   prepare(manifest)   materials, lights, textures, bindAll
 *   stager.*            per draw
 *   destroy()           release GPU textures
 */

import { createSceneConfig, textureRegistryOptions, type SceneConfig } from './config';
import { SharpImageDecoder, type ImageDecoder } from './gpu/TextureLoader';
import { TextureRegistry, type TextureLoadError } from './gpu/TextureRegistry';
import type { ShaderUniforms, TextureGL } from './gpu/types';
import { LightingRig } from './lighting/LightingRig';
import { MaterialRegistry } from './materials/MaterialRegistry';
import { ShaderStateStager } from './renderers/ShaderStateStager';
import type { SceneManifest } from '../loaders/types';

export interface SceneManagerOptions {
  gl: TextureGL;
  uniforms: ShaderUniforms;
  /** Defaults to a sharp decoder rooted at the working directory */
  decoder?: ImageDecoder;
  config?: Partial<SceneConfig>;
}

export interface FailedTexture {
  tag: string;
  path: string;
  error: TextureLoadError;
  message: string;
}

export interface PrepareResult {
  /** Tags that got a slot, in slot order */
  loaded: string[];
  failed: FailedTexture[];
}

export class SceneManager {
  readonly config: SceneConfig;
  readonly textures: TextureRegistry;
  readonly materials: MaterialRegistry;
  readonly lighting: LightingRig;
  readonly stager: ShaderStateStager;

  private readonly uniforms: ShaderUniforms;

  constructor(options: SceneManagerOptions) {
    this.config = createSceneConfig(options.config);
    this.uniforms = options.uniforms;
    this.textures = new TextureRegistry(
      options.gl,
      options.decoder ?? new SharpImageDecoder(),
      textureRegistryOptions(this.config)
    );
    this.materials = new MaterialRegistry();
    this.lighting = new LightingRig();
    this.stager = new ShaderStateStager(this.uniforms, this.textures, this.materials);
  }

  /**
   * Load every resource the manifest names. Textures load one at a time so
   * slot order matches manifest order. A texture that fails is reported and
   * skipped; the rest still load.
   */
  async prepare(manifest: SceneManifest): Promise<PrepareResult> {
    console.log(`[SceneManager] Preparing scene "${manifest.name}"`);

    manifest.materials.forEach(material => this.materials.register(material));

    this.lighting.deserialize(manifest.lights);
    this.lighting.apply(this.uniforms);
    this.stager.setLighting(this.lighting.hasActiveLights);

    const result: PrepareResult = { loaded: [], failed: [] };
    for (const entry of manifest.textures) {
      const loaded = await this.textures.load(entry.path, entry.tag);
      if (loaded.success) {
        result.loaded.push(entry.tag);
      } else {
        result.failed.push({ tag: entry.tag, path: entry.path, error: loaded.error, message: loaded.message });
      }
    }

    this.textures.bindAll();

    console.log(
      `[SceneManager] Scene "${manifest.name}" ready: ${result.loaded.length} textures, ` +
        `${this.materials.size} materials, ${result.failed.length} failed`
    );
    return result;
  }

  destroy(): void {
    this.textures.releaseAll();
  }
}
