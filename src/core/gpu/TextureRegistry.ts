/**
 * TextureRegistry - Fixed-capacity table of GPU textures keyed by tag
 *
 * Slot index == position in the table == texture unit after bindAll().
 * Populated once during scene load, released in bulk at teardown.
 */

import type { TextureGL } from './types';
import type { DecodedImage, ImageDecoder } from './TextureLoader';

/** Texture units assumed by the scene shader */
export const MAX_TEXTURE_SLOTS = 16;

/** Returned by findSlot() for an unknown tag */
export const SLOT_NOT_FOUND = -1;

export interface TextureSlot {
  readonly tag: string;
  readonly handle: WebGLTexture;
}

export type TextureLoadError =
  | 'decode-failure'
  | 'capacity-exceeded'
  | 'duplicate-tag'
  | 'upload-failure';

export type TextureLoadResult =
  | { success: true; slot: number; width: number; height: number; channels: number }
  | { success: false; error: TextureLoadError; message: string };

export interface TextureRegistryOptions {
  /** Number of usable slots, clamped to [1, MAX_TEXTURE_SLOTS] */
  capacity?: number;
  /** Accept a tag that is already registered; lookups then return the first match */
  allowDuplicateTags?: boolean;
  /** Passed to the decoder (default: true) */
  flipY?: boolean;
}

const clampCapacity = (capacity: number): number =>
  Math.min(MAX_TEXTURE_SLOTS, Math.max(1, Math.floor(capacity)));

export class TextureRegistry {
  private readonly gl: TextureGL;
  private readonly decoder: ImageDecoder;
  private readonly _capacity: number;
  private readonly allowDuplicateTags: boolean;
  private readonly flipY: boolean;
  private _slots: TextureSlot[] = [];

  constructor(gl: TextureGL, decoder: ImageDecoder, options: TextureRegistryOptions = {}) {
    this.gl = gl;
    this.decoder = decoder;
    this._capacity = clampCapacity(options.capacity ?? MAX_TEXTURE_SLOTS);
    this.allowDuplicateTags = options.allowDuplicateTags ?? false;
    this.flipY = options.flipY ?? true;
  }

  get size(): number {
    return this._slots.length;
  }

  get capacity(): number {
    return this._capacity;
  }

  get isFull(): boolean {
    return this._slots.length >= this._capacity;
  }

  slots(): readonly TextureSlot[] {
    return [...this._slots];
  }

  /**
   * Decode an image file and register it under tag.
   * Capacity and tag checks run before decoding and again when committing,
   * so overlapping loads cannot overrun the table.
   */
  async load(imagePath: string, tag: string): Promise<TextureLoadResult> {
    const rejected = this.checkAdmission(tag);
    if (rejected) return rejected;

    const decoded = await this.decoder.decode(imagePath, { flipY: this.flipY });
    if (!decoded.success) {
      console.warn(`[TextureRegistry] Could not load image "${imagePath}": ${decoded.error}`);
      return { success: false, error: 'decode-failure', message: decoded.error };
    }

    const result = this.upload(decoded.image, tag);
    if (result.success) {
      console.log(
        `[TextureRegistry] Loaded "${imagePath}" as "${tag}" ` +
          `(${result.width}x${result.height}, ${result.channels} channels) -> slot ${result.slot}`
      );
    }
    return result;
  }

  /**
   * Upload already-decoded pixels as a mipmapped, repeating, linearly filtered 2D texture
   */
  upload(image: DecodedImage, tag: string): TextureLoadResult {
    const rejected = this.checkAdmission(tag);
    if (rejected) return rejected;

    const formats = this.formatsFor(image.channels);
    if (!formats) {
      const message = `Unsupported channel count ${image.channels} for "${tag}" (expected 3 or 4)`;
      console.warn(`[TextureRegistry] ${message}`);
      return { success: false, error: 'decode-failure', message };
    }

    const gl = this.gl;
    const handle = gl.createTexture();
    if (!handle) {
      const message = `GPU did not create a texture object for "${tag}"`;
      console.warn(`[TextureRegistry] ${message}`);
      return { success: false, error: 'upload-failure', message };
    }

    gl.bindTexture(gl.TEXTURE_2D, handle);

    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_S, gl.REPEAT);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_T, gl.REPEAT);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MIN_FILTER, gl.LINEAR);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MAG_FILTER, gl.LINEAR);

    // RGB rows are rarely 4-byte aligned
    gl.pixelStorei(gl.UNPACK_ALIGNMENT, 1);
    gl.texImage2D(
      gl.TEXTURE_2D,
      0,
      formats.internalFormat,
      image.width,
      image.height,
      0,
      formats.format,
      gl.UNSIGNED_BYTE,
      image.pixels
    );
    gl.generateMipmap(gl.TEXTURE_2D);
    gl.bindTexture(gl.TEXTURE_2D, null);

    const slot = this._slots.length;
    this._slots.push({ tag, handle });

    return { success: true, slot, width: image.width, height: image.height, channels: image.channels };
  }

  /**
   * Bind slot i to texture unit i for every occupied slot.
   * Call once after all loads and before any draw samples a texture.
   */
  bindAll(): void {
    const gl = this.gl;
    this._slots.forEach((slot, index) => {
      gl.activeTexture(gl.TEXTURE0 + index);
      gl.bindTexture(gl.TEXTURE_2D, slot.handle);
    });
  }

  findHandle(tag: string): WebGLTexture | null {
    return this._slots.find(slot => slot.tag === tag)?.handle ?? null;
  }

  findSlot(tag: string): number {
    return this._slots.findIndex(slot => slot.tag === tag);
  }

  /**
   * Delete every GPU texture and empty the table
   */
  releaseAll(): void {
    const gl = this.gl;
    for (const slot of this._slots) {
      gl.deleteTexture(slot.handle);
    }
    if (this._slots.length > 0) {
      console.log(`[TextureRegistry] Released ${this._slots.length} textures`);
    }
    this._slots = [];
  }

  private checkAdmission(tag: string): TextureLoadResult | null {
    if (this.isFull) {
      const message = `Texture capacity of ${this._capacity} reached; "${tag}" not loaded`;
      console.warn(`[TextureRegistry] ${message}`);
      return { success: false, error: 'capacity-exceeded', message };
    }
    if (!this.allowDuplicateTags && this.findSlot(tag) !== SLOT_NOT_FOUND) {
      const message = `Texture tag "${tag}" is already registered`;
      console.warn(`[TextureRegistry] ${message}`);
      return { success: false, error: 'duplicate-tag', message };
    }
    return null;
  }

  private formatsFor(channels: number): { internalFormat: number; format: number } | null {
    const gl = this.gl;
    switch (channels) {
      case 3:
        return { internalFormat: gl.RGB8, format: gl.RGB };
      case 4:
        return { internalFormat: gl.RGBA8, format: gl.RGBA };
      default:
        return null;
    }
  }
}
