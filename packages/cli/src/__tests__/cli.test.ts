import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConsoleSink } from '@logwire/sink-console';
import { FileSink } from '@logwire/sink-file';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadCliConfig, resolveConfigPath } from '../config.js';
import { createProgram } from '../program.js';
import { checkSinks, resolveSinks } from '../sinks.js';

// ─── Program ─────────────────────────────────────────────────────────────────

describe('createProgram', () => {
	it('registers every command', () => {
		const program = createProgram('1.2.3');
		expect(program.commands.map((c) => c.name())).toEqual(['send', 'pipe', 'validate']);
		expect(program.version()).toBe('1.2.3');
	});
});

// ─── Config ──────────────────────────────────────────────────────────────────

describe('resolveConfigPath', () => {
	it('resolves relative paths against the working directory', () => {
		expect(resolveConfigPath('conf/logwire.yaml')).toBe(join(process.cwd(), 'conf/logwire.yaml'));
	});

	it('defaults to logwire.yaml in the working directory', () => {
		expect(resolveConfigPath()).toBe(join(process.cwd(), 'logwire.yaml'));
	});
});

describe('loadCliConfig', () => {
	it('fails when an explicit file is missing', async () => {
		const missing = join(tmpdir(), 'logwire-no-such-dir', 'logwire.yaml');
		await expect(loadCliConfig({ configPath: missing })).rejects.toThrow(
			`Configuration file not found: ${missing}`,
		);
	});
});

// ─── Sinks ───────────────────────────────────────────────────────────────────

describe('resolveSinks', () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'logwire-sinks-'));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it('builds sinks in definition order', async () => {
		const path = join(tempDir, 'out.log');
		const sinks = await resolveSinks(
			[
				{ type: 'console', config: { stream: 'stderr', color: false } },
				{ type: 'file', config: { path } },
			],
			'app',
		);

		expect(sinks[0]).toBeInstanceOf(ConsoleSink);
		expect(sinks[1]).toBeInstanceOf(FileSink);
		expect(await readFile(path, 'utf-8')).toBe('');
		await Promise.all(sinks.map((s) => s.shutdown()));
	});

	it('rejects unknown sink types', async () => {
		await expect(resolveSinks([{ type: 'syslog', config: {} }], 'app')).rejects.toThrow(
			'Unknown sink type "syslog". Available: console, file',
		);
	});

	it('checks configs without creating anything', () => {
		expect(() => checkSinks([{ type: 'file', config: { path: join(tempDir, 'x.log') } }])).not.toThrow();
		expect(() => checkSinks([{ type: 'file', config: { rotate: true } }])).toThrow('Invalid config for sink "file"');
	});
});
