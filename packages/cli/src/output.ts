/**
 * Output formatting utilities for the CLI.
 *
 * Provides colored output, aligned statistics, JSON mode and quiet mode.
 */

import chalk from 'chalk';

// ─── Global output state ─────────────────────────────────────────────────────

let jsonMode = false;
let quietMode = false;

export function setJsonMode(enabled: boolean): void {
	jsonMode = enabled;
}

export function setQuietMode(enabled: boolean): void {
	quietMode = enabled;
}

export function isJsonMode(): boolean {
	return jsonMode;
}

// ─── Basic output ────────────────────────────────────────────────────────────

export function info(message: string): void {
	if (quietMode || jsonMode) return;
	console.log(message);
}

export function success(message: string): void {
	if (quietMode || jsonMode) return;
	console.log(chalk.green(`  ✓ ${message}`));
}

export function error(message: string): void {
	if (jsonMode) return;
	console.error(chalk.red(`  ✗ ${message}`));
}

export function warn(message: string): void {
	if (quietMode || jsonMode) return;
	console.warn(chalk.yellow(`  ! ${message}`));
}

export function blank(): void {
	if (quietMode || jsonMode) return;
	console.log();
}

// ─── Styled output ───────────────────────────────────────────────────────────

/** Aligned `key  value` rows */
export function keyValues(rows: Array<[string, string | number | boolean]>): void {
	if (quietMode || jsonMode) return;
	const width = Math.max(0, ...rows.map(([key]) => key.length));
	for (const [key, value] of rows) {
		console.log(`    ${chalk.dim(key.padEnd(width))}  ${String(value)}`);
	}
}

// ─── JSON output ─────────────────────────────────────────────────────────────

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}
