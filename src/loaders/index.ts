/**
 * Scene manifest loading
 *
 * @example
 * ```ts
 * import { loadSceneManifest } from './loaders';
 * const manifest = await loadSceneManifest('scenes/desk-scene.json');
 * ```
 */

export { parseSceneManifest, loadSceneManifest } from './SceneManifestLoader';

export type { SceneManifest, TextureEntry } from './types';
