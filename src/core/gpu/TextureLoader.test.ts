/**
 * Unit tests for SharpImageDecoder
 * Images are written to a temp directory with sharp and decoded back
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import sharp from 'sharp';
import { SharpImageDecoder } from './TextureLoader';

describe('SharpImageDecoder', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'texture-loader-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  // 1x2 image: top row red, bottom row blue
  const writeTwoRowImage = async (fileName: string): Promise<string> => {
    const filePath = path.join(tmpDir, fileName);
    await sharp(Buffer.from([255, 0, 0, 0, 0, 255]), {
      raw: { width: 1, height: 2, channels: 3 },
    })
      .png()
      .toFile(filePath);
    return filePath;
  };

  it('decodes an RGB image with its dimensions and channel count', async () => {
    const filePath = await writeTwoRowImage('rgb.png');
    const decoder = new SharpImageDecoder();

    const result = await decoder.decode(filePath, { flipY: false });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.image.width).toBe(1);
    expect(result.image.height).toBe(2);
    expect(result.image.channels).toBe(3);
    expect(Array.from(result.image.pixels)).toEqual([255, 0, 0, 0, 0, 255]);
  });

  it('flips rows vertically by default', async () => {
    const filePath = await writeTwoRowImage('flip.png');
    const decoder = new SharpImageDecoder();

    const result = await decoder.decode(filePath);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(Array.from(result.image.pixels)).toEqual([0, 0, 255, 255, 0, 0]);
  });

  it('keeps the alpha channel of an RGBA image', async () => {
    const filePath = path.join(tmpDir, 'rgba.png');
    await sharp(Buffer.from([10, 20, 30, 40, 50, 60, 70, 80]), {
      raw: { width: 2, height: 1, channels: 4 },
    })
      .png()
      .toFile(filePath);

    const result = await new SharpImageDecoder().decode(filePath, { flipY: false });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.image.channels).toBe(4);
    expect(Array.from(result.image.pixels)).toEqual([10, 20, 30, 40, 50, 60, 70, 80]);
  });

  it('resolves relative paths against the root path', async () => {
    await writeTwoRowImage('relative.png');
    const decoder = new SharpImageDecoder(tmpDir);

    const result = await decoder.decode('relative.png');

    expect(result.success).toBe(true);
  });

  it('reports a missing file as a failure instead of throwing', async () => {
    const decoder = new SharpImageDecoder(tmpDir);

    const result = await decoder.decode('missing.jpg');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toContain(path.join(tmpDir, 'missing.jpg'));
  });

  it('reports a file that is not an image as a failure', async () => {
    fs.writeFileSync(path.join(tmpDir, 'notes.png'), 'not an image');
    const decoder = new SharpImageDecoder(tmpDir);

    const result = await decoder.decode('notes.png');

    expect(result.success).toBe(false);
  });
});
