import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { TreeUploader } from '../uploader.js';
import { MemoryRemote } from './memoryRemote.js';
import { UploadError } from '../../shared/errors.js';

let tmpDir: string;

function writeFile(relative: string, content = 'x'): void {
  const full = path.join(tmpDir, relative);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content);
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pinharvest-upload-'));
  writeFile('all_pins.json', '[]');
  writeFile('TRAVEL/coastal_towns/coastal_towns_pins.json', '[]');
  writeFile('TRAVEL/coastal_towns/images/1.jpg');
  writeFile('TRAVEL/coastal_towns/images/2.jpg');
  writeFile('TRAVEL/coastal_towns/images/3.jpg.part');
  writeFile('TRAVEL/notes.json', '{}');
  writeFile('TRAVEL/readme.txt');
  writeFile('FOOD_COOKING/sourdough/sourdough_pins.json', '[]');
  writeFile('.cache/ignored.json', '{}');
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('TreeUploader', () => {
  it('mirrors categories and topics with images flattened into the topic folder', async () => {
    const remote = new MemoryRemote();
    const summary = await new TreeUploader(remote).uploadAll(tmpDir, 'root');

    expect(summary).toEqual({
      FOOD_COOKING: { uploaded: 1, skipped: 0, failed: 0 },
      TRAVEL: { uploaded: 4, skipped: 0, failed: 0 },
    });
    expect(remote.filePaths('root')).toEqual([
      'FOOD_COOKING/sourdough/sourdough_pins.json',
      'TRAVEL/coastal_towns/1.jpg',
      'TRAVEL/coastal_towns/2.jpg',
      'TRAVEL/coastal_towns/coastal_towns_pins.json',
      'TRAVEL/notes.json',
    ]);
  });

  it('skips files already uploaded and reuses folders', async () => {
    const remote = new MemoryRemote();
    await new TreeUploader(remote).uploadAll(tmpDir, 'root');
    const foldersBefore = remote.nodes.filter((n) => n.folder).length;

    const summary = await new TreeUploader(remote).uploadAll(tmpDir, 'root');

    expect(summary).toEqual({
      FOOD_COOKING: { uploaded: 0, skipped: 1, failed: 0 },
      TRAVEL: { uploaded: 0, skipped: 4, failed: 0 },
    });
    expect(remote.nodes.filter((n) => n.folder)).toHaveLength(foldersBefore);
  });

  it('counts failed files and keeps going', async () => {
    const remote = new MemoryRemote();
    remote.failNames.add('1.jpg');

    const summary = await new TreeUploader(remote).uploadAll(tmpDir, 'root');

    expect(summary['TRAVEL']).toEqual({ uploaded: 3, skipped: 0, failed: 1 });
    expect(remote.uploads).not.toContain('1.jpg');
  });

  it('returns an empty summary for a missing base path', async () => {
    const summary = await new TreeUploader(new MemoryRemote()).uploadAll(path.join(tmpDir, 'missing'), 'root');
    expect(summary).toEqual({});
  });

  it('counts an unreadable category as a failure', async () => {
    const remote = new MemoryRemote();
    vi.spyOn(fs, 'readdirSync').mockImplementationOnce(() => {
      throw new Error('EACCES: permission denied');
    });

    const result = await new TreeUploader(remote).uploadCategory(path.join(tmpDir, 'TRAVEL'), 'root');

    expect(result).toEqual({ uploaded: 0, skipped: 0, failed: 1 });
    expect(remote.filePaths('root')).toEqual([]);
  });

  it('rejects with UploadError when the base path is not a folder', async () => {
    const basePath = path.join(tmpDir, 'all_pins.json');
    await expect(new TreeUploader(new MemoryRemote()).uploadAll(basePath, 'root')).rejects.toThrow(
      new UploadError(`Cannot read output folder ${basePath}`),
    );
  });

  it('caches folder lookups', async () => {
    const remote = new MemoryRemote();
    const uploader = new TreeUploader(remote);
    const first = await uploader.findOrCreateFolder('TRAVEL', 'root');
    remote.nodes.length = 0;
    expect(await uploader.findOrCreateFolder('TRAVEL', 'root')).toBe(first);
  });
});
