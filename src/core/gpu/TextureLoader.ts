/**
 * TextureLoader - Decodes image files into raw pixel data for texture upload
 *
 * The TextureRegistry only sees the ImageDecoder interface; SharpImageDecoder is
 * the file-system implementation.
 */

import path from 'path';
import sharp from 'sharp';

/**
 * Raw 8-bit pixel data, rows packed without padding
 */
export interface DecodedImage {
  width: number;
  height: number;
  /** Interleaved channels per pixel (3 = RGB, 4 = RGBA) */
  channels: number;
  pixels: Uint8Array;
}

/**
 * Options for decoding an image
 */
export interface DecodeOptions {
  /** Flip rows so the first row is the bottom of the image (default: true) */
  flipY?: boolean;
}

export type DecodeResult =
  | { success: true; image: DecodedImage }
  | { success: false; error: string };

/**
 * Image decoding collaborator
 */
export interface ImageDecoder {
  decode(imagePath: string, options?: DecodeOptions): Promise<DecodeResult>;
}

/**
 * Decodes image files with sharp. Relative paths resolve against rootPath.
 */
export class SharpImageDecoder implements ImageDecoder {
  private rootPath: string;

  constructor(rootPath: string = process.cwd()) {
    this.rootPath = path.resolve(rootPath);
  }

  async decode(imagePath: string, options?: DecodeOptions): Promise<DecodeResult> {
    const flipY = options?.flipY ?? true;
    const absolutePath = path.resolve(this.rootPath, imagePath);

    try {
      let pipeline = sharp(absolutePath);
      if (flipY) {
        pipeline = pipeline.flip();
      }

      const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });

      return {
        success: true,
        image: {
          width: info.width,
          height: info.height,
          channels: info.channels,
          pixels: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
        },
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, error: `Could not decode ${absolutePath}: ${message}` };
    }
  }
}
