/**
 * WebGL surface used by the scene layer.
 *
 * Both interfaces are structural subsets of WebGL2RenderingContext, so a real
 * context satisfies them and tests can substitute an in-process fake.
 */

import type { mat3, mat4, vec2, vec3, vec4 } from 'gl-matrix';

/**
 * Texture object calls and enums used by the TextureRegistry
 */
export interface TextureGL {
  readonly TEXTURE_2D: number;
  readonly TEXTURE0: number;
  readonly TEXTURE_WRAP_S: number;
  readonly TEXTURE_WRAP_T: number;
  readonly TEXTURE_MIN_FILTER: number;
  readonly TEXTURE_MAG_FILTER: number;
  readonly REPEAT: number;
  readonly LINEAR: number;
  readonly RGB: number;
  readonly RGBA: number;
  readonly RGB8: number;
  readonly RGBA8: number;
  readonly UNSIGNED_BYTE: number;
  readonly UNPACK_ALIGNMENT: number;

  createTexture(): WebGLTexture | null;
  bindTexture(target: number, texture: WebGLTexture | null): void;
  texParameteri(target: number, pname: number, param: number): void;
  pixelStorei(pname: number, param: number): void;
  texImage2D(
    target: number,
    level: number,
    internalformat: number,
    width: number,
    height: number,
    border: number,
    format: number,
    type: number,
    pixels: ArrayBufferView | null
  ): void;
  generateMipmap(target: number): void;
  activeTexture(texture: number): void;
  deleteTexture(texture: WebGLTexture | null): void;
}

/**
 * Uniform calls used by GLShaderUniforms
 */
export interface UniformGL {
  useProgram(program: WebGLProgram | null): void;
  getUniformLocation(program: WebGLProgram, name: string): WebGLUniformLocation | null;
  uniformMatrix4fv(location: WebGLUniformLocation | null, transpose: boolean, data: Float32List): void;
  uniformMatrix3fv(location: WebGLUniformLocation | null, transpose: boolean, data: Float32List): void;
  uniform2fv(location: WebGLUniformLocation | null, data: Float32List): void;
  uniform3fv(location: WebGLUniformLocation | null, data: Float32List): void;
  uniform4fv(location: WebGLUniformLocation | null, data: Float32List): void;
  uniform1f(location: WebGLUniformLocation | null, x: number): void;
  uniform1i(location: WebGLUniformLocation | null, x: number): void;
}

/**
 * String-keyed uniform property bag of a linked shader program.
 * The set of names is a contract with the shader source and is not validated here.
 */
export interface ShaderUniforms {
  setMat4(name: string, value: mat4): void;
  setMat3(name: string, value: mat3): void;
  setVec2(name: string, value: vec2): void;
  setVec3(name: string, value: vec3): void;
  setVec4(name: string, value: vec4): void;
  setFloat(name: string, value: number): void;
  setBool(name: string, value: boolean): void;
  setInt(name: string, value: number): void;
  /** Points a sampler2D uniform at a texture unit */
  setSampler2D(name: string, unit: number): void;
}
