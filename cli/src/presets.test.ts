import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadPresets, seedPresets } from './presets';
import { DATA_DIR_ENV, Storage } from './storage';

describe('presets', () => {
  let dataDir: string;
  let previous: string | undefined;

  beforeEach(() => {
    previous = process.env[DATA_DIR_ENV];
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rk-bodies-presets-'));
    process.env[DATA_DIR_ENV] = dataDir;
  });

  afterEach(() => {
    if (previous === undefined) {
      delete process.env[DATA_DIR_ENV];
    } else {
      process.env[DATA_DIR_ENV] = previous;
    }
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it('loads the bundled scenarios in file order', () => {
    const presets = loadPresets();

    expect(presets.map(preset => preset.name)).toEqual(['three_body', 'two_body']);
    expect(presets[1].bodies.map(body => body.mass)).toEqual([5, 50]);
    expect(presets.every(preset => preset.method === 'twoThirds' && preset.h === 0.025)).toBe(true);
  });

  it('seeds an empty data directory once', () => {
    expect(seedPresets()).toEqual({ seeded: true, names: ['three_body', 'two_body'] });
    expect(Storage.listScenarios()).toEqual(['three_body', 'two_body']);

    expect(seedPresets()).toEqual({ seeded: false, names: [] });
  });

  it('leaves a data directory that already has scenarios alone', () => {
    Storage.saveScenario({ ...loadPresets()[0], name: 'mine' });

    expect(seedPresets().seeded).toBe(false);
    expect(Storage.listScenarios()).toEqual(['mine']);
  });
});
