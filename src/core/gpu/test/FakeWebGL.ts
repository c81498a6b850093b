/**
 * In-process stand-ins for the WebGL surface, used by the unit tests
 */

import type { TextureGL, UniformGL } from '../types';
import type { DecodeOptions, DecodeResult, DecodedImage, ImageDecoder } from '../TextureLoader';

export interface FakeTexture {
  readonly id: number;
}

export interface TextureUpload {
  texture: WebGLTexture | null;
  internalFormat: number;
  width: number;
  height: number;
  format: number;
  byteLength: number;
}

/**
 * Records texture calls and tracks which texture objects are alive
 */
export class FakeTextureGL implements TextureGL {
  readonly TEXTURE_2D = 0x0de1;
  readonly TEXTURE0 = 0x84c0;
  readonly TEXTURE_WRAP_S = 0x2802;
  readonly TEXTURE_WRAP_T = 0x2803;
  readonly TEXTURE_MIN_FILTER = 0x2801;
  readonly TEXTURE_MAG_FILTER = 0x2800;
  readonly REPEAT = 0x2901;
  readonly LINEAR = 0x2601;
  readonly RGB = 0x1907;
  readonly RGBA = 0x1908;
  readonly RGB8 = 0x8051;
  readonly RGBA8 = 0x8058;
  readonly UNSIGNED_BYTE = 0x1401;
  readonly UNPACK_ALIGNMENT = 0x0cf5;

  /** Every texture ever created, in creation order */
  readonly created: WebGLTexture[] = [];
  readonly deleted: WebGLTexture[] = [];
  readonly uploads: TextureUpload[] = [];
  readonly mipmapped: Array<WebGLTexture | null> = [];
  /** Texture unit index -> bound texture */
  readonly units = new Map<number, WebGLTexture | null>();
  readonly params = new Map<WebGLTexture, Map<number, number>>();
  readonly pixelStore = new Map<number, number>();

  /** When true, createTexture() returns null */
  failCreate = false;

  private nextId = 1;
  private activeUnit = 0;
  private bound: WebGLTexture | null = null;

  get live(): WebGLTexture[] {
    return this.created.filter(t => !this.deleted.includes(t));
  }

  get boundTexture(): WebGLTexture | null {
    return this.bound;
  }

  createTexture(): WebGLTexture | null {
    if (this.failCreate) return null;
    const texture: FakeTexture = { id: this.nextId++ };
    this.created.push(texture);
    return texture;
  }

  bindTexture(_target: number, texture: WebGLTexture | null): void {
    this.bound = texture;
    this.units.set(this.activeUnit, texture);
  }

  texParameteri(_target: number, pname: number, param: number): void {
    if (!this.bound) throw new Error('texParameteri with no texture bound');
    const params = this.params.get(this.bound) ?? new Map<number, number>();
    params.set(pname, param);
    this.params.set(this.bound, params);
  }

  pixelStorei(pname: number, param: number): void {
    this.pixelStore.set(pname, param);
  }

  texImage2D(
    _target: number,
    _level: number,
    internalformat: number,
    width: number,
    height: number,
    _border: number,
    format: number,
    _type: number,
    pixels: ArrayBufferView | null
  ): void {
    this.uploads.push({
      texture: this.bound,
      internalFormat: internalformat,
      width,
      height,
      format,
      byteLength: pixels ? pixels.byteLength : 0,
    });
  }

  generateMipmap(_target: number): void {
    this.mipmapped.push(this.bound);
  }

  activeTexture(texture: number): void {
    this.activeUnit = texture - this.TEXTURE0;
  }

  deleteTexture(texture: WebGLTexture | null): void {
    if (texture) this.deleted.push(texture);
  }
}

export interface FakeUniformLocation {
  readonly name: string;
}

export type UniformCall = { method: string; name: string; value: number[] | number };

/**
 * Records uniform writes by the name their location was created for
 */
export class FakeUniformGL implements UniformGL {
  readonly calls: UniformCall[] = [];
  readonly lookups: string[] = [];
  usedProgram: WebGLProgram | null = null;
  /** Names getUniformLocation() reports as inactive */
  readonly inactive = new Set<string>();

  useProgram(program: WebGLProgram | null): void {
    this.usedProgram = program;
  }

  getUniformLocation(_program: WebGLProgram, name: string): WebGLUniformLocation | null {
    this.lookups.push(name);
    if (this.inactive.has(name)) return null;
    const location: FakeUniformLocation = { name };
    return location;
  }

  uniformMatrix4fv(location: WebGLUniformLocation | null, _transpose: boolean, data: Float32List): void {
    this.record('uniformMatrix4fv', location, Array.from(data));
  }

  uniformMatrix3fv(location: WebGLUniformLocation | null, _transpose: boolean, data: Float32List): void {
    this.record('uniformMatrix3fv', location, Array.from(data));
  }

  uniform2fv(location: WebGLUniformLocation | null, data: Float32List): void {
    this.record('uniform2fv', location, Array.from(data));
  }

  uniform3fv(location: WebGLUniformLocation | null, data: Float32List): void {
    this.record('uniform3fv', location, Array.from(data));
  }

  uniform4fv(location: WebGLUniformLocation | null, data: Float32List): void {
    this.record('uniform4fv', location, Array.from(data));
  }

  uniform1f(location: WebGLUniformLocation | null, x: number): void {
    this.record('uniform1f', location, x);
  }

  uniform1i(location: WebGLUniformLocation | null, x: number): void {
    this.record('uniform1i', location, x);
  }

  private record(method: string, location: WebGLUniformLocation | null, value: number[] | number): void {
    const name = isFakeLocation(location) ? location.name : '<inactive>';
    this.calls.push({ method, name, value });
  }
}

const isFakeLocation = (location: WebGLUniformLocation | null): location is FakeUniformLocation =>
  location !== null && typeof location === 'object' && 'name' in location;

/**
 * Decoder that serves canned results by path
 */
export class StubImageDecoder implements ImageDecoder {
  readonly requests: Array<{ path: string; options?: DecodeOptions }> = [];
  private readonly results = new Map<string, DecodeResult>();

  withImage(imagePath: string, image: DecodedImage): this {
    this.results.set(imagePath, { success: true, image });
    return this;
  }

  withFailure(imagePath: string, error: string): this {
    this.results.set(imagePath, { success: false, error });
    return this;
  }

  async decode(imagePath: string, options?: DecodeOptions): Promise<DecodeResult> {
    this.requests.push({ path: imagePath, options });
    return this.results.get(imagePath) ?? { success: false, error: `No such file: ${imagePath}` };
  }
}

/**
 * Solid-color image of the given size and channel count
 */
export const solidImage = (width: number, height: number, channels: number): DecodedImage => ({
  width,
  height,
  channels,
  pixels: new Uint8Array(width * height * channels).fill(200),
});
