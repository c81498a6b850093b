/**
 * GLShaderUniforms - ShaderUniforms over a linked WebGL program
 */

import type { mat3, mat4, vec2, vec3, vec4 } from 'gl-matrix';
import type { ShaderUniforms, UniformGL } from './types';

// gl-matrix values may be plain tuples; WebGL takes Float32Array or number[]
const toFloat32 = (value: ArrayLike<number>): Float32Array =>
  value instanceof Float32Array ? value : new Float32Array(value);

export class GLShaderUniforms implements ShaderUniforms {
  private readonly gl: UniformGL;
  private readonly program: WebGLProgram;
  private readonly locations = new Map<string, WebGLUniformLocation | null>();

  constructor(gl: UniformGL, program: WebGLProgram) {
    this.gl = gl;
    this.program = program;
  }

  /**
   * Make this program current. Uniform writes target the current program.
   */
  use(): void {
    this.gl.useProgram(this.program);
  }

  setMat4(name: string, value: mat4): void {
    this.gl.uniformMatrix4fv(this.location(name), false, toFloat32(value));
  }

  setMat3(name: string, value: mat3): void {
    this.gl.uniformMatrix3fv(this.location(name), false, toFloat32(value));
  }

  setVec2(name: string, value: vec2): void {
    this.gl.uniform2fv(this.location(name), toFloat32(value));
  }

  setVec3(name: string, value: vec3): void {
    this.gl.uniform3fv(this.location(name), toFloat32(value));
  }

  setVec4(name: string, value: vec4): void {
    this.gl.uniform4fv(this.location(name), toFloat32(value));
  }

  setFloat(name: string, value: number): void {
    this.gl.uniform1f(this.location(name), value);
  }

  setBool(name: string, value: boolean): void {
    this.gl.uniform1i(this.location(name), value ? 1 : 0);
  }

  setInt(name: string, value: number): void {
    this.gl.uniform1i(this.location(name), value);
  }

  setSampler2D(name: string, unit: number): void {
    this.gl.uniform1i(this.location(name), unit);
  }

  // Inactive uniforms resolve to null; WebGL ignores writes to a null location
  private location(name: string): WebGLUniformLocation | null {
    if (!this.locations.has(name)) {
      this.locations.set(name, this.gl.getUniformLocation(this.program, name));
    }
    return this.locations.get(name) ?? null;
  }
}
