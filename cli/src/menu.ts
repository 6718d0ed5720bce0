import inquirer from 'inquirer';

export const MENU_PAGE_SIZE = 32;

export type ConfigMenuResult = 'continue' | 'back';

export type ConfigEntry = {
    id: string;
    label: string;
    getDisplay: () => string;
    edit: () => Promise<void>;
    section?: string;
};

const CONFIG_CONTINUE_VALUE = '__CONFIG_CONTINUE__';
const CONFIG_BACK_VALUE = '__CONFIG_BACK__';

export async function runConfigMenu(
    title: string,
    entries: ConfigEntry[]
): Promise<ConfigMenuResult> {
    while (true) {
        const choices: Array<{ name: string; value: string } | inquirer.Separator> = [];

        let lastSection: string | null = null;
        for (const entry of entries) {
            const section = entry.section ?? '';
            if (section !== lastSection) {
                const label = section.length > 0 ? `== ${section} ==` : '== Settings ==';
                choices.push(new inquirer.Separator(label));
                lastSection = section;
            }
            choices.push({
                name: `${entry.label}: ${entry.getDisplay()}`,
                value: entry.id
            });
        }

        choices.push(new inquirer.Separator());
        choices.push({ name: 'Continue', value: CONFIG_CONTINUE_VALUE });
        choices.push({ name: 'Back', value: CONFIG_BACK_VALUE });

        const { selection } = await inquirer.prompt({
            type: 'rawlist',
            name: 'selection',
            message: title,
            choices,
            pageSize: MENU_PAGE_SIZE
        });

        if (selection === CONFIG_CONTINUE_VALUE) {
            return 'continue';
        }
        if (selection === CONFIG_BACK_VALUE) {
            return 'back';
        }

        const entry = entries.find(e => e.id === selection);
        if (entry) {
            await entry.edit();
        }
    }
}

/**
 * Parses "1, -2.5" style input into numbers; null when any item is not a number.
 */
export function parseVectorInput(input: string): number[] | null {
    const items = input
        .split(',')
        .map(item => item.trim())
        .filter(item => item.length > 0);
    if (items.length === 0) return null;
    const values = items.map(item => Number(item));
    return values.every(Number.isFinite) ? values : null;
}

export function parseFloatOrDefault(value: string, fallback: number): number {
    const parsed = parseFloat(value);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseIntOrDefault(value: string, fallback: number): number {
    const parsed = parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export function validateNumberInput(input: string): true | string {
    return Number.isFinite(parseFloat(input)) ? true : 'Please enter a number.';
}

export function validateVectorInput(dimension: number) {
    return (input: string): true | string => {
        const values = parseVectorInput(input);
        if (!values) return 'Please enter comma separated numbers.';
        if (values.length !== dimension) return `Please enter ${dimension} components.`;
        return true;
    };
}

/**
 * Config entry that edits one number through a text prompt.
 */
export function numberEntry(options: {
    id: string;
    label: string;
    section?: string;
    get: () => number;
    set: (value: number) => void;
    integer?: boolean;
}): ConfigEntry {
    return {
        id: options.id,
        label: options.label,
        section: options.section,
        getDisplay: () => String(options.get()),
        edit: async () => {
            const { value } = await inquirer.prompt({
                name: 'value',
                message: `${options.label}:`,
                default: String(options.get()),
                validate: validateNumberInput
            });
            const text = String(value);
            options.set(options.integer ? parseIntOrDefault(text, options.get()) : parseFloatOrDefault(text, options.get()));
        }
    };
}

export function vectorEntry(options: {
    id: string;
    label: string;
    section?: string;
    get: () => number[];
    set: (value: number[]) => void;
}): ConfigEntry {
    return {
        id: options.id,
        label: options.label,
        section: options.section,
        getDisplay: () => options.get().join(', '),
        edit: async () => {
            const current = options.get();
            const { value } = await inquirer.prompt({
                name: 'value',
                message: `${options.label} (comma separated):`,
                default: current.join(', '),
                validate: validateVectorInput(current.length)
            });
            options.set(parseVectorInput(String(value)) ?? current);
        }
    };
}
