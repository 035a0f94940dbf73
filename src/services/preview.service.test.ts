import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { describeImages, previewRotation } from './preview.service.js';
import { rotateEquirectangular } from './rotation.service.js';
import { DecodeError } from '../utils/errors.js';
import { encodeBmp } from '../providers/implementations/bmp-format.js';

async function decodePng(png: Buffer) {
  const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height, channels: info.channels };
}

describe('preview service', () => {
  let tempDir: string;
  let largePath: string;
  let smallPath: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'panorot-preview-'));

    const width = 800;
    const height = 400;
    const data = Buffer.alloc(width * height * 3);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const idx = (y * width + x) * 3;
        data[idx] = Math.floor((x / width) * 255);
        data[idx + 1] = Math.floor((y / height) * 255);
        data[idx + 2] = 128;
      }
    }
    largePath = path.join(tempDir, 'large.png');
    await sharp(data, { raw: { width, height, channels: 3 } }).png().toFile(largePath);

    smallPath = path.join(tempDir, 'small.jpg');
    await sharp({ create: { width: 100, height: 50, channels: 3, background: { r: 0, g: 90, b: 200 } } })
      .jpeg()
      .toFile(smallPath);
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('previewRotation', () => {
    it('should shrink the image to fit the preview box', async () => {
      const preview = await previewRotation(largePath, 90, { maxWidth: 400, maxHeight: 200 });

      expect(preview.width).toBe(400);
      expect(preview.height).toBe(200);
      expect(preview.angle).toBe(90);
      expect((await sharp(preview.original).metadata()).format).toBe('png');
    });

    it('should rotate the shrunk pixels', async () => {
      const preview = await previewRotation(largePath, 90, { maxWidth: 400, maxHeight: 200 });

      const original = await decodePng(preview.original);
      const rotated = await decodePng(preview.rotated);

      expect(rotated.data.equals(rotateEquirectangular(original, 90).data)).toBe(true);
    });

    it('should not enlarge small images', async () => {
      const preview = await previewRotation(smallPath, 45, { maxWidth: 400, maxHeight: 200 });

      expect([preview.width, preview.height]).toEqual([100, 50]);
    });

    it('should preview BMP inputs', async () => {
      const bmpPath = path.join(tempDir, 'small.bmp');
      const data = Buffer.alloc(100 * 50 * 3, 90);
      await writeFile(bmpPath, encodeBmp({ data, width: 100, height: 50, channels: 3 }));

      const preview = await previewRotation(bmpPath, 30, { maxWidth: 400, maxHeight: 200 });

      expect([preview.width, preview.height]).toEqual([100, 50]);
      expect((await sharp(preview.rotated).metadata()).format).toBe('png');
    });

    it('should fail with DecodeError for unreadable files', async () => {
      await expect(previewRotation(path.join(tempDir, 'missing.png'), 90)).rejects.toBeInstanceOf(DecodeError);
    });
  });

  describe('describeImages', () => {
    it('should report info per file and keep failures inline', async () => {
      const missing = path.join(tempDir, 'missing.jpg');

      const infos = await describeImages([smallPath, missing]);

      expect(infos[0]).toEqual({ path: smallPath, width: 100, height: 50, format: 'jpeg' });
      expect(infos[1]).toMatchObject({ path: missing });
      expect(infos[1]).toHaveProperty('error', expect.stringMatching(/^Cannot read image: /));
    });
  });
});
