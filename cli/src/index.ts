import inquirer from 'inquirer';
import chalk from 'chalk';
import { Storage, getDataDir } from './storage';
import { seedPresets } from './presets';
import { executeScenario, printRunRows, printRunSummary } from './run';
import { integrateWithProgress } from './progress';
import { buildModel, validateScenario } from './scenario';
import { isValidName } from './naming';
import {
    ConfigEntry,
    MENU_PAGE_SIZE,
    numberEntry,
    runConfigMenu,
    vectorEntry
} from './menu';
import {
    formatVector,
    printBlank,
    printError,
    printField,
    printHeader,
    printInfo,
    printSuccess,
    printWarning
} from './format';
import type { MethodChoice, ScenarioConfig } from './types';
import { countSteps, describeTableau, TABLEAU_NAMES } from '../../src/math/odesolvers';

function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

async function pause() {
    await inquirer.prompt({ type: 'input', name: 'cont', message: 'Press enter to continue...' });
}

async function mainMenu() {
    const seed = seedPresets();
    if (seed.seeded) {
        printInfo(`Seeded ${seed.names.join(', ')} into ${getDataDir()}`);
    }

    while (true) {
        const scenarios = Storage.listScenarioConfigs();

        const choices = [];
        choices.push({ name: 'Create New Scenario', value: 'CREATE' });

        if (scenarios.length > 0) {
            choices.push(new inquirer.Separator());
            scenarios.forEach(entry => {
                if ('error' in entry) {
                    choices.push(new inquirer.Separator(chalk.red(`${entry.name} (unreadable: ${entry.error})`)));
                } else {
                    choices.push({ name: `${entry.name} (${entry.config.bodies.length} bodies, ${entry.config.method})`, value: entry.name });
                }
            });
        }

        choices.push(new inquirer.Separator());
        choices.push({ name: 'Exit', value: 'EXIT' });

        const { selection } = await inquirer.prompt([{
            type: 'rawlist',
            name: 'selection',
            message: 'Select a scenario',
            choices: choices,
            pageSize: MENU_PAGE_SIZE
        }]);

        if (selection === 'EXIT') return;

        if (selection === 'CREATE') {
            await createScenario();
        } else {
            await scenarioContext(String(selection));
        }
    }
}

async function scenarioContext(initialName: string) {
    let name = initialName;

    while (true) {
        const config = Storage.loadScenario(name);
        printHeader(name, config.description ?? `${config.bodies.length}-body scenario`);

        const { action } = await inquirer.prompt([{
            type: 'rawlist',
            name: 'action',
            message: 'Scenario Menu',
            choices: [
                { name: 'Run', value: 'Run' },
                { name: 'Runs', value: 'Runs' },
                new inquirer.Separator(),
                { name: 'Edit Settings', value: 'Edit Settings' },
                { name: 'Edit Bodies', value: 'Edit Bodies' },
                { name: 'Rename Scenario', value: 'Rename Scenario' },
                { name: 'Duplicate Scenario', value: 'Duplicate Scenario' },
                { name: 'Delete Scenario', value: 'Delete Scenario' },
                new inquirer.Separator(),
                { name: 'Back', value: 'Back' }
            ],
            pageSize: MENU_PAGE_SIZE
        }]);

        if (action === 'Back') return;

        try {
            if (action === 'Run') {
                await runScenario(config);
            } else if (action === 'Runs') {
                await runsMenu(name);
            } else if (action === 'Edit Settings') {
                await editSettings(config);
            } else if (action === 'Edit Bodies') {
                await editBodies(config);
            } else if (action === 'Rename Scenario') {
                const newName = await promptNewName('New Scenario Name:', name);
                if (newName) {
                    Storage.renameScenario(name, newName);
                    printSuccess(`Scenario renamed to ${newName}.`);
                    name = newName;
                }
            } else if (action === 'Duplicate Scenario') {
                const newName = await promptNewName('New Scenario Name:', `${name}_copy`);
                if (newName) {
                    Storage.saveScenario({ ...config, name: newName });
                    printSuccess(`Scenario duplicated as ${newName}.`);
                    name = newName;
                    console.log(chalk.cyan(`Switching to duplicated scenario: ${name}`));
                }
            } else if (action === 'Delete Scenario') {
                const { confirm } = await inquirer.prompt({
                    type: 'confirm',
                    name: 'confirm',
                    message: `Delete ${name} and all of its runs?`,
                    default: false
                });
                if (confirm) {
                    Storage.deleteScenario(name);
                    printSuccess(`Scenario ${name} deleted.`);
                    return;
                }
            }
        } catch (err) {
            printError(describeError(err));
        }
    }
}

async function promptNewName(message: string, suggestion: string): Promise<string | null> {
    const { newName } = await inquirer.prompt({
        name: 'newName',
        message,
        default: suggestion,
        validate: isValidName
    });
    const value = String(newName);
    if (Storage.scenarioExists(value)) {
        printError(`Scenario "${value}" already exists.`);
        return null;
    }
    return value;
}

async function createScenario() {
    const { name } = await inquirer.prompt([
        { name: 'name', message: 'Scenario Name:', validate: isValidName }
    ]);
    const scenarioName = String(name);

    if (Storage.scenarioExists(scenarioName)) {
        printError(`Scenario "${scenarioName}" already exists.`);
        return;
    }

    const { count } = await inquirer.prompt({
        name: 'count',
        message: 'Number of bodies:',
        default: '2',
        validate: (input: string) => {
            const parsed = Number(input);
            return Number.isInteger(parsed) && parsed >= 2 ? true : 'Please enter a whole number of at least 2.';
        }
    });

    const bodyCount = Number(count);
    // Bodies start on a circle of radius 10 so no two coincide.
    const config: ScenarioConfig = {
        name: scenarioName,
        gravitationalConstant: 1,
        bodies: Array.from({ length: bodyCount }, (_, i) => {
            const angle = (2 * Math.PI * i) / bodyCount;
            return {
                name: `body_${i + 1}`,
                mass: 1,
                position: [10 * Math.cos(angle), 10 * Math.sin(angle)],
                momentum: [0, 0]
            };
        }),
        t0: 0,
        tf: 10,
        h: 0.01,
        method: 'twoThirds',
        sampleEvery: 10
    };

    if ((await editBodies(config)) === 'back') return;
    if ((await editSettings(Storage.loadScenario(scenarioName))) === 'back') return;
    printSuccess(`Scenario ${scenarioName} created.`);
    await scenarioContext(scenarioName);
}

async function editSettings(config: ScenarioConfig) {
    const draft: ScenarioConfig = { ...config };

    const entries: ConfigEntry[] = [
        numberEntry({ id: 't0', label: 'Initial instant (t0)', section: 'Time', get: () => draft.t0, set: v => { draft.t0 = v; } }),
        numberEntry({ id: 'tf', label: 'Final instant (tf)', section: 'Time', get: () => draft.tf, set: v => { draft.tf = v; } }),
        numberEntry({ id: 'h', label: 'Step size (h)', section: 'Time', get: () => draft.h, set: v => { draft.h = v; } }),
        {
            id: 'method',
            label: 'Method',
            section: 'Method',
            getDisplay: () => draft.method,
            edit: async () => {
                const { value } = await inquirer.prompt({
                    type: 'rawlist',
                    name: 'value',
                    message: 'Runge-Kutta method:',
                    choices: TABLEAU_NAMES.map(preset => {
                        const { label, order } = describeTableau(preset);
                        return { name: `${preset} (${label}, order ${order})`, value: preset };
                    }),
                    default: draft.method
                });
                const choice: MethodChoice | undefined = TABLEAU_NAMES.find(preset => preset === value);
                if (choice) draft.method = choice;
            }
        },
        numberEntry({ id: 'sample', label: 'Store every n-th step', section: 'Output', integer: true, get: () => draft.sampleEvery, set: v => { draft.sampleEvery = v; } }),
        numberEntry({ id: 'G', label: 'Gravitational constant', section: 'Physics', get: () => draft.gravitationalConstant, set: v => { draft.gravitationalConstant = v; } })
    ];

    const result = await runConfigMenu(`${config.name} Settings`, entries);
    if (result === 'back') return result;
    return saveIfValid(draft);
}

async function editBodies(config: ScenarioConfig) {
    const draft: ScenarioConfig = {
        ...config,
        bodies: config.bodies.map(body => ({ ...body, position: [...body.position], momentum: [...body.momentum] }))
    };

    const entries: ConfigEntry[] = draft.bodies.flatMap((body, idx) => [
        numberEntry({ id: `mass_${idx}`, label: 'Mass', section: body.name, get: () => body.mass, set: v => { body.mass = v; } }),
        vectorEntry({ id: `position_${idx}`, label: 'Position', section: body.name, get: () => body.position, set: v => { body.position = v; } }),
        vectorEntry({ id: `momentum_${idx}`, label: 'Momentum', section: body.name, get: () => body.momentum, set: v => { body.momentum = v; } })
    ]);

    const result = await runConfigMenu(`${config.name} Bodies`, entries);
    if (result === 'back') return result;
    return saveIfValid(draft);
}

function saveIfValid(draft: ScenarioConfig): 'continue' | 'back' {
    const validation = validateScenario(draft);
    validation.warnings.forEach(printWarning);
    if (!validation.valid) {
        Object.values(validation.errors).forEach(message => {
            if (message) printError(message);
        });
        printError('Changes were not saved.');
        return 'back';
    }
    Storage.saveScenario(draft);
    printSuccess('Scenario saved.');
    return 'continue';
}

async function runScenario(config: ScenarioConfig) {
    const validation = validateScenario(config);
    validation.warnings.forEach(printWarning);

    if (validation.valid) {
        printField('Planned steps', countSteps(config.t0, config.tf, config.h));
    }

    const { runName } = await inquirer.prompt({
        name: 'runName',
        message: 'Name for this run:',
        default: Storage.nextRunName(config.name),
        validate: (input: string) => {
            const check = isValidName(input);
            if (check !== true) return check;
            return Storage.runExists(config.name, input) ? `Run "${input}" already exists.` : true;
        }
    });

    const { run, model } = executeScenario(config, {
        runName: String(runName),
        integrate: integrateWithProgress
    });
    Storage.saveRun(run);
    printRunSummary(run, model);
    printSuccess(`Run ${run.name} saved with ${run.data.length} frames.`);
}

async function runsMenu(scenarioName: string) {
    while (true) {
        const runs = Storage.listRuns(scenarioName);
        if (runs.length === 0) {
            printInfo('No runs stored for this scenario yet.');
            return;
        }

        const { selection } = await inquirer.prompt({
            type: 'rawlist',
            name: 'selection',
            message: 'Select a run',
            choices: [...runs.map(run => ({ name: run, value: run })), new inquirer.Separator(), { name: 'Back', value: '__BACK__' }],
            pageSize: MENU_PAGE_SIZE
        });
        if (selection === '__BACK__') return;

        const run = Storage.loadRun(scenarioName, String(selection));
        const { action } = await inquirer.prompt({
            type: 'rawlist',
            name: 'action',
            message: `Run ${run.name}`,
            choices: ['Inspect', 'Summary', 'Delete', 'Back']
        });

        if (action === 'Inspect') {
            console.log(chalk.yellow('Data Points:'));
            printRunRows(run);
            printBlank();
            await pause();
        } else if (action === 'Summary') {
            printRunSummary(run, buildModel(Storage.loadScenario(scenarioName)));
            printField('Initial state', formatVector(run.data[0]?.slice(1) ?? []));
            await pause();
        } else if (action === 'Delete') {
            Storage.deleteRun(scenarioName, run.name);
            printSuccess(`Run ${run.name} deleted.`);
        }
    }
}

mainMenu().catch(err => {
    printError(describeError(err));
    process.exitCode = 1;
});
