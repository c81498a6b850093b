/**
 * GPU Module - WebGL2 texture registry, image decoding and uniform writes
 */

// Texture registry
export {
  TextureRegistry,
  MAX_TEXTURE_SLOTS,
  SLOT_NOT_FOUND,
} from './TextureRegistry';
export type {
  TextureSlot,
  TextureLoadError,
  TextureLoadResult,
  TextureRegistryOptions,
} from './TextureRegistry';

// Image decoding
export { SharpImageDecoder } from './TextureLoader';
export type { DecodedImage, DecodeOptions, DecodeResult, ImageDecoder } from './TextureLoader';

// Uniforms
export { GLShaderUniforms } from './GLShaderUniforms';
export {
  UNIFORM,
  directionalLightUniform,
  pointLightUniform,
} from './uniformNames';
export type { UniformName, DirectionalLightField, PointLightField } from './uniformNames';

// WebGL surface
export type { TextureGL, UniformGL, ShaderUniforms } from './types';
