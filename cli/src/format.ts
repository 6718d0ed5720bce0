import chalk from 'chalk';

/**
 * Terminal output for the scenario runner. Library code never prints; every
 * line the user sees goes through these helpers.
 */

const BOX = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│'
};

export const PROGRESS_BAR_WIDTH = 20;

type FieldColor = 'green' | 'yellow' | 'red' | 'cyan' | 'dim';

// Symbol, color and stream for each kind of one-line status message.
const STATUS = {
  success: { symbol: '✓', color: 'green', stream: 'log' },
  error: { symbol: '✗', color: 'red', stream: 'error' },
  warning: { symbol: '⚠', color: 'yellow', stream: 'log' },
  info: { symbol: 'ℹ', color: 'cyan', stream: 'log' }
} as const;

function printStatus(kind: keyof typeof STATUS, message: string): void {
  const { symbol, color, stream } = STATUS[kind];
  console[stream](chalk[color](`${symbol} ${message}`));
}

function boxedLine(text: string, width: number, style: (text: string) => string): string {
  return `${BOX.vertical}  ${style(text)}${' '.repeat(width - text.length - 2)}${BOX.vertical}`;
}

export function printHeader(title: string, subtitle?: string): void {
  const width = Math.max(title.length, subtitle?.length ?? 0) + 4;
  const line = BOX.horizontal.repeat(width);

  console.log('');
  console.log(chalk.cyan(`${BOX.topLeft}${line}${BOX.topRight}`));
  console.log(chalk.cyan(boxedLine(title, width, chalk.bold)));
  if (subtitle) {
    console.log(chalk.cyan(boxedLine(subtitle, width, chalk.dim)));
  }
  console.log(chalk.cyan(`${BOX.bottomLeft}${line}${BOX.bottomRight}`));
}

export function printDivider(): void {
  console.log(chalk.dim(BOX.horizontal.repeat(40)));
}

export function printField(label: string, value: string | number, options?: { color?: FieldColor }): void {
  const shown = options?.color ? chalk[options.color](String(value)) : String(value);
  console.log(`  ${chalk.dim(`${label}:`)} ${shown}`);
}

export function printFieldRow(items: Array<{ label: string; value: string | number }>): void {
  console.log(`  ${items.map(({ label, value }) => `${chalk.dim(`${label}:`)} ${value}`).join('  │  ')}`);
}

export const printSuccess = (message: string): void => printStatus('success', message);
export const printError = (message: string): void => printStatus('error', message);
export const printWarning = (message: string): void => printStatus('warning', message);
export const printInfo = (message: string): void => printStatus('info', message);

export function printProgress(current: number, total: number, label?: string): void {
  const fraction = total > 0 ? Math.min(1, current / total) : 1;
  const filled = Math.round(fraction * PROGRESS_BAR_WIDTH);
  const bar = '█'.repeat(filled) + '░'.repeat(PROGRESS_BAR_WIDTH - filled);
  const labelText = label ? `${label} ` : '';
  process.stdout.write(`\r${labelText}[${bar}] ${Math.round(fraction * 100)}%`);
}

export function printProgressComplete(label?: string): void {
  const labelText = label ? `${label} ` : '';
  console.log(`\r${labelText}[${chalk.green('█'.repeat(PROGRESS_BAR_WIDTH))}] ${chalk.green('Done!')}`);
}

export function printBlank(): void {
  console.log('');
}

/**
 * Scientific notation for very large or very small magnitudes.
 */
export function formatNum(value: number, precision: number = 4): string {
  if (!Number.isFinite(value)) return value.toString();
  const absVal = Math.abs(value);
  if ((absVal !== 0 && absVal < 1e-3) || absVal >= 1e4) {
    return value.toExponential(precision);
  }
  return value.toPrecision(precision);
}

export function formatVector(values: readonly number[], precision: number = 4): string {
  return `(${values.map(v => formatNum(v, precision)).join(', ')})`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms.toFixed(1)} ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(2)} s`;
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes} min ${seconds} s`;
}

// One stored row as "t=…: [y…]".
export function formatRow(row: readonly number[]): string {
  const [t, ...y] = row;
  return `t=${t.toFixed(3)}: [${y.map(x => x.toFixed(4)).join(', ')}]`;
}
