#!/usr/bin/env node

/**
 * logwire CLI — ship log lines to an MQTT broker.
 *
 * Entry point: reads the package version and runs the program.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createProgram } from './program.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

async function getVersion(): Promise<string> {
	let content: string;
	try {
		content = await readFile(resolve(__dirname, '..', 'package.json'), 'utf-8');
	} catch {
		return '0.0.0';
	}
	const pkg: unknown = JSON.parse(content);
	if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
		return pkg.version;
	}
	return '0.0.0';
}

async function main(): Promise<void> {
	const program = createProgram(await getVersion());
	await program.parseAsync(process.argv);
}

main().catch((err) => {
	console.error('Fatal error:', err instanceof Error ? err.message : String(err));
	process.exitCode = 1;
});
