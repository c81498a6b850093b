/**
 * Scene resource and shader-state layer
 *
 * @example
 * ```ts
 * import { GLShaderUniforms, SceneManager, loadSceneManifest } from 'desk-scene-renderer';
 *
 * const uniforms = new GLShaderUniforms(gl, program);
 * uniforms.use();
 * const scene = new SceneManager({ gl, uniforms });
 * await scene.prepare(await loadSceneManifest('scenes/desk-scene.json'));
 *
 * scene.stager.drawObject(
 *   { transform: { scale: [20, 1, 10], rotationDegrees: [0, 0, 0], position: [0, 0, 0] }, texture: 'desk', material: 'wood' },
 *   () => drawPlaneMesh()
 * );
 * ```
 */

export * from './core/gpu';
export * from './core/materials';
export * from './core/renderers';
export * from './core/lighting';
export * from './core/utils';
export type { Vec2, Vec3, RGB, RGBA } from './core/types';

export { createSceneConfig, DEFAULT_SCENE_CONFIG, textureRegistryOptions, type SceneConfig } from './core/config';
export {
  SceneManager,
  type SceneManagerOptions,
  type PrepareResult,
  type FailedTexture,
} from './core/SceneManager';

export * from './loaders';
