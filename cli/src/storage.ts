import fs from 'fs';
import path from 'path';
import { parseScenario } from './scenario';
import type { RunObject, ScenarioConfig } from './types';

export const DATA_DIR_ENV = 'RK_BODIES_DATA_DIR';

// Resolved on every call so tests and shells can point it elsewhere.
export const getDataDir = () => process.env[DATA_DIR_ENV] ?? path.join(process.cwd(), 'data');

const getScenariosDir = () => path.join(getDataDir(), 'scenarios');
const getRunsDir = (scenarioName: string) => path.join(getDataDir(), 'runs', scenarioName);

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

function listJson(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter(f => f.endsWith('.json'))
    .map(f => f.replace(/\.json$/, ''))
    .sort();
}

function isRunObject(value: unknown): value is RunObject {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'type' in value && value.type === 'run' &&
    'name' in value && typeof value.name === 'string' &&
    'data' in value && Array.isArray(value.data) &&
    'final' in value && Array.isArray(value.final)
  );
}

export type ScenarioListing =
  | { name: string; config: ScenarioConfig }
  | { name: string; error: string };

export const Storage = {
  listScenarios: (): string[] => listJson(getScenariosDir()),

  /**
   * Loads every stored scenario for the menu. A file that cannot be read or
   * parsed is listed with its error instead of aborting the listing.
   */
  listScenarioConfigs: (): ScenarioListing[] =>
    Storage.listScenarios().map(name => {
      try {
        return { name, config: Storage.loadScenario(name) };
      } catch (err) {
        return { name, error: err instanceof Error ? err.message : String(err) };
      }
    }),

  scenarioExists: (name: string): boolean => fs.existsSync(path.join(getScenariosDir(), `${name}.json`)),

  saveScenario: (config: ScenarioConfig) => {
    ensureDir(getScenariosDir());
    fs.writeFileSync(path.join(getScenariosDir(), `${config.name}.json`), JSON.stringify(config, null, 2));
  },

  loadScenario: (name: string): ScenarioConfig => {
    const file = path.join(getScenariosDir(), `${name}.json`);
    return parseScenario(JSON.parse(fs.readFileSync(file, 'utf-8')));
  },

  /**
   * Deletes a scenario together with every run stored for it.
   */
  deleteScenario: (name: string) => {
    const file = path.join(getScenariosDir(), `${name}.json`);
    if (fs.existsSync(file)) fs.unlinkSync(file);
    const runsDir = getRunsDir(name);
    if (fs.existsSync(runsDir)) fs.rmSync(runsDir, { recursive: true, force: true });
  },

  /**
   * Renames a scenario, moving its runs and updating their scenarioName.
   */
  renameScenario: (oldName: string, newName: string) => {
    if (Storage.scenarioExists(newName)) {
      throw new Error(`Scenario "${newName}" already exists.`);
    }
    const config = Storage.loadScenario(oldName);
    Storage.saveScenario({ ...config, name: newName });
    fs.unlinkSync(path.join(getScenariosDir(), `${oldName}.json`));

    const oldRuns = getRunsDir(oldName);
    if (!fs.existsSync(oldRuns)) return;
    const newRuns = getRunsDir(newName);
    ensureDir(path.dirname(newRuns));
    fs.renameSync(oldRuns, newRuns);
    for (const runName of listJson(newRuns)) {
      const run = Storage.loadRun(newName, runName);
      Storage.saveRun({ ...run, scenarioName: newName });
    }
  },

  listRuns: (scenarioName: string): string[] => listJson(getRunsDir(scenarioName)),

  runExists: (scenarioName: string, runName: string): boolean =>
    fs.existsSync(path.join(getRunsDir(scenarioName), `${runName}.json`)),

  // First run_N not yet taken for the scenario.
  nextRunName: (scenarioName: string): string => {
    let index = 1;
    while (Storage.runExists(scenarioName, `run_${index}`)) index++;
    return `run_${index}`;
  },

  saveRun: (run: RunObject) => {
    const dir = getRunsDir(run.scenarioName);
    ensureDir(dir);
    fs.writeFileSync(path.join(dir, `${run.name}.json`), JSON.stringify(run));
  },

  loadRun: (scenarioName: string, runName: string): RunObject => {
    const file = path.join(getRunsDir(scenarioName), `${runName}.json`);
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    if (!isRunObject(parsed)) {
      throw new Error(`"${file}" does not hold a stored run.`);
    }
    return parsed;
  },

  deleteRun: (scenarioName: string, runName: string) => {
    const file = path.join(getRunsDir(scenarioName), `${runName}.json`);
    if (fs.existsSync(file)) fs.unlinkSync(file);
  },
};
