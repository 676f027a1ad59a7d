import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runValidation } from '../commands/validate.js';

describe('runValidation', () => {
	let tempDir: string;
	let configPath: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'logwire-validate-'));
		configPath = join(tempDir, 'logwire.yaml');
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it('resolves a valid file', async () => {
		await writeFile(
			configPath,
			`level: warn
pipeline:
  hostname: \${TEST_BROKER}
  queue_capacity: 20
  backoff_base: 250ms
sinks:
  - type: console
    config: { stream: stdout }
`,
		);

		const result = await runValidation(configPath, { TEST_BROKER: 'broker.test' });

		expect(result.valid).toBe(true);
		expect(result.errors).toEqual([]);
		expect(result.config?.level).toBe('WARNING');
		expect(result.config?.pipeline.hostname).toBe('broker.test');
		expect(result.config?.pipeline.queueCapacity).toBe(20);
		expect(result.config?.pipeline.batchSize).toBe(20);
		expect(result.config?.pipeline.backoffBase).toBe(250);
		expect(result.config?.sinks).toEqual([{ type: 'console', config: { stream: 'stdout' } }]);
	});

	it('reports schema violations', async () => {
		await writeFile(configPath, 'pipeline:\n  port: 70000\n');

		const result = await runValidation(configPath, {});

		expect(result.valid).toBe(false);
		expect(result.config).toBeUndefined();
		expect(result.errors[0]).toBe(`Invalid configuration in ${configPath}`);
		expect(result.errors.length).toBeGreaterThan(1);
	});

	it('reports unset environment variables', async () => {
		await writeFile(configPath, 'pipeline:\n  hostname: ${TEST_MISSING_HOST}\n');

		const result = await runValidation(configPath, {});

		expect(result.errors).toEqual(['Environment variable "TEST_MISSING_HOST" is not set']);
	});

	it('reports unknown sink types', async () => {
		await writeFile(configPath, 'sinks:\n  - type: syslog\n');

		const result = await runValidation(configPath, {});

		expect(result.errors).toEqual(['Unknown sink type "syslog". Available: console, file']);
	});

	it('checks each sink config against its schema', async () => {
		await writeFile(configPath, 'sinks:\n  - type: console\n    config: { stream: stdlog }\n');

		const result = await runValidation(configPath, {});

		expect(result.valid).toBe(false);
		expect(result.errors[0]).toBe('Invalid config for sink "console"');
	});

	it('rejects an unknown sink level before anything runs', async () => {
		await writeFile(configPath, 'sinks:\n  - type: console\n    config: { level: loud }\n');

		const result = await runValidation(configPath, {});

		expect(result.valid).toBe(false);
		expect(result.errors).toEqual([
			'Invalid config for sink "console"',
			'/level: must match format "log-level"',
		]);
	});

	it('accepts sink levels in any case and by alias', async () => {
		await writeFile(configPath, 'sinks:\n  - type: console\n    config: { level: warn }\n');

		const result = await runValidation(configPath, {});

		expect(result.valid).toBe(true);
		expect(result.errors).toEqual([]);
	});

	it('reports a missing file', async () => {
		const missing = join(tempDir, 'absent.yaml');
		const result = await runValidation(missing, {});

		expect(result.errors).toEqual([`Configuration file not found: ${missing}`]);
	});
});
