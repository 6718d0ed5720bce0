import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { parseScenario } from './scenario';
import { Storage } from './storage';
import type { ScenarioConfig } from './types';

export const PRESETS_DIR = fileURLToPath(new URL('../presets/', import.meta.url));

export function loadPresets(dir: string = PRESETS_DIR): ScenarioConfig[] {
  return fs
    .readdirSync(dir)
    .filter(file => file.endsWith('.json'))
    .sort()
    .map(file => parseScenario(JSON.parse(fs.readFileSync(path.join(dir, file), 'utf-8'))));
}

type SeedResult = {
  seeded: boolean;
  names: string[];
};

/**
 * Copies the bundled scenarios into an empty data directory.
 */
export function seedPresets(dir: string = PRESETS_DIR): SeedResult {
  if (Storage.listScenarios().length > 0) {
    return { seeded: false, names: [] };
  }
  const presets = loadPresets(dir);
  presets.forEach(preset => Storage.saveScenario(preset));
  return { seeded: true, names: presets.map(preset => preset.name) };
}
