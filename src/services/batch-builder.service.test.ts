import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { BatchInputBuilder, createBatchRun } from './batch-builder.service.js';
import { BatchValidationError } from '../utils/errors.js';

describe('BatchInputBuilder', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'panorot-builder-'));
    for (const name of ['b.jpg', 'a.png', 'notes.txt', 'c.TIF']) {
      await writeFile(path.join(tempDir, name), 'x');
    }
    await mkdir(path.join(tempDir, 'nested'));
    await writeFile(path.join(tempDir, 'nested', 'deep.jpg'), 'x');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should add files in insertion order as absolute paths', async () => {
    const builder = new BatchInputBuilder();

    const result = await builder.add([path.join(tempDir, 'b.jpg'), path.join(tempDir, 'a.png')]);

    expect(result).toEqual({ added: 2, skipped: [] });
    expect(builder.paths).toEqual([path.join(tempDir, 'b.jpg'), path.join(tempDir, 'a.png')]);
    expect(builder.size).toBe(2);
  });

  it('should skip duplicates, missing files and unsupported extensions', async () => {
    const builder = new BatchInputBuilder();
    const jpg = path.join(tempDir, 'b.jpg');
    const missing = path.join(tempDir, 'missing.jpg');
    const txt = path.join(tempDir, 'notes.txt');

    const result = await builder.add([jpg, jpg, missing, txt]);

    expect(result.added).toBe(1);
    expect(result.skipped).toEqual([
      { path: jpg, reason: 'duplicate' },
      { path: missing, reason: 'not-found' },
      { path: txt, reason: 'unsupported-extension' },
    ]);
  });

  it('should skip files already added by an earlier call', async () => {
    const builder = new BatchInputBuilder();
    const jpg = path.join(tempDir, 'b.jpg');
    await builder.add([jpg]);

    const result = await builder.add([jpg]);

    expect(result).toEqual({ added: 0, skipped: [{ path: jpg, reason: 'duplicate' }] });
    expect(builder.size).toBe(1);
  });

  it('should expand a directory one level in name order', async () => {
    const builder = new BatchInputBuilder();

    const result = await builder.add([tempDir]);

    expect(result.added).toBe(3);
    expect(builder.paths).toEqual([
      path.join(tempDir, 'a.png'),
      path.join(tempDir, 'b.jpg'),
      path.join(tempDir, 'c.TIF'),
    ]);
  });

  it('should empty the list on clear', async () => {
    const builder = new BatchInputBuilder();
    await builder.add([tempDir]);

    builder.clear();

    expect(builder.size).toBe(0);
    expect((await builder.add([path.join(tempDir, 'a.png')])).added).toBe(1);
  });
});

describe('createBatchRun', () => {
  it('should create a fresh run with zeroed counters', () => {
    const inputs = ['/in/a.jpg', '/in/b.png'];

    const batch = createBatchRun({ inputs, angle: 90, outputDir: '/out' });

    expect(batch).toMatchObject({
      inputs,
      angle: 90,
      outputDir: '/out',
      total: 2,
      completed: 0,
      failed: 0,
      results: [],
    });
    expect(batch.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(batch.startedAt).toBeUndefined();
  });

  it('should copy the input list', () => {
    const inputs = ['/in/a.jpg'];
    const batch = createBatchRun({ inputs, angle: 0, outputDir: '/out' });

    inputs.push('/in/b.jpg');

    expect(batch.inputs).toEqual(['/in/a.jpg']);
  });

  it('should reject an empty input list', () => {
    expect(() => createBatchRun({ inputs: [], angle: 90, outputDir: '/out' })).toThrow(
      new BatchValidationError('Batch has no input files')
    );
  });

  it('should reject duplicate inputs', () => {
    try {
      createBatchRun({ inputs: ['/a.jpg', '/b.jpg', '/a.jpg'], angle: 90, outputDir: '/out' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(BatchValidationError);
      expect((error as BatchValidationError).details).toEqual({ duplicates: ['/a.jpg'] });
    }
  });

  it.each([Number.NaN, Number.POSITIVE_INFINITY])('should reject angle %s', (angle) => {
    expect(() => createBatchRun({ inputs: ['/a.jpg'], angle, outputDir: '/out' })).toThrow(
      `Rotation angle must be a finite number, got ${angle}`
    );
  });

  it('should require an output directory', () => {
    expect(() => createBatchRun({ inputs: ['/a.jpg'], angle: 1, outputDir: '' })).toThrow(
      'Output directory is required'
    );
  });
});
