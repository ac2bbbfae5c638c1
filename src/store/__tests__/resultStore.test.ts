import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ResultStore, MASTER_FILE, topicJsonPath } from '../resultStore.js';
import { fingerprint } from '../../harvest/dedup.js';
import type { AcceptedRecord } from '../../harvest/types.js';
import { StoreError } from '../../shared/errors.js';
import { candidate } from '../../harvest/__tests__/fakes.js';

let tmpDir: string;

function accepted(id: string, overrides: Parameters<typeof candidate>[1] = {}): AcceptedRecord {
  return { ...candidate(id, overrides), fingerprint: fingerprint(id) };
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pinharvest-store-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('topicJsonPath', () => {
  it('uses the topic slug for folder and file', () => {
    expect(topicJsonPath('/out', 'TRAVEL', 'coastal towns')).toBe('/out/TRAVEL/coastal_towns/coastal_towns_pins.json');
  });
});

describe('ResultStore', () => {
  it('writes the topic file in the pin JSON shape', async () => {
    const store = new ResultStore(tmpDir);
    const target = await store.writeTopic('STUDY_ACADEMIA', 'dark academia', [accepted('111')]);

    expect(target).toBe(path.join(tmpDir, 'STUDY_ACADEMIA', 'dark_academia', 'dark_academia_pins.json'));
    expect(JSON.parse(fs.readFileSync(target, 'utf-8'))).toEqual([
      {
        pin_id: '111',
        title: 'Pin 111',
        description: 'cozy reading corner',
        image_url: 'https://i.pinimg.com/236x/aa/bb/111.jpg',
        pin_url: 'https://www.pinterest.com/pin/111/',
        category: 'STUDY_ACADEMIA',
        topic: 'dark academia',
        scraped_at: '2026-01-01T00:00:00.000Z',
      },
    ]);
  });

  it('indents with two spaces and keeps non-ASCII text unescaped', async () => {
    const store = new ResultStore(tmpDir);
    const target = await store.writeMaster([accepted('1', { title: 'Café ☕ 日本' })]);

    const content = fs.readFileSync(target, 'utf-8');
    expect(target).toBe(path.join(tmpDir, MASTER_FILE));
    expect(content).toContain('\n    "title": "Café ☕ 日本",\n');
    expect(content.startsWith('[\n  {\n')).toBe(true);
  });

  it('writes an empty master as an empty array', async () => {
    const target = await new ResultStore(tmpDir).writeMaster([]);
    expect(fs.readFileSync(target, 'utf-8')).toBe('[]');
  });

  it('overwrites an existing topic file', async () => {
    const store = new ResultStore(tmpDir);
    await store.writeTopic('TRAVEL', 'road trip', [accepted('1'), accepted('2')]);
    const target = await store.writeTopic('TRAVEL', 'road trip', [accepted('3')]);

    const pins: unknown = JSON.parse(fs.readFileSync(target, 'utf-8'));
    expect(Array.isArray(pins) ? pins.length : -1).toBe(1);
  });

  it('creates the output root', () => {
    const root = path.join(tmpDir, 'nested', 'out');
    new ResultStore(root).ensureRoot();
    expect(fs.statSync(root).isDirectory()).toBe(true);
  });

  it('fails with StoreError when the root is a file', async () => {
    const blocker = path.join(tmpDir, 'blocker');
    fs.writeFileSync(blocker, 'x');
    const store = new ResultStore(path.join(blocker, 'out'));

    expect(() => store.ensureRoot()).toThrow(StoreError);
    await expect(store.writeMaster([])).rejects.toBeInstanceOf(StoreError);
  });
});
