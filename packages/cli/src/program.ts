/**
 * Commander program with every command and the global flags.
 */

import { Command } from 'commander';
import { registerPipeCommand } from './commands/pipe.js';
import { registerSendCommand } from './commands/send.js';
import { registerValidateCommand } from './commands/validate.js';
import { setJsonMode, setQuietMode } from './output.js';

export function createProgram(version: string): Command {
	const program = new Command();

	program
		.name('logwire')
		.description('logwire — buffered log forwarding to an MQTT broker')
		.version(version, '-V, --version', 'Print version number')
		.option('-c, --config <path>', 'Path to logwire.yaml')
		.option('--json', 'Output as JSON (for scripting)')
		.option('--quiet', 'Errors only')
		.hook('preAction', (thisCommand) => {
			const opts = thisCommand.opts();
			if (opts.json) setJsonMode(true);
			if (opts.quiet) setQuietMode(true);
		});

	registerSendCommand(program);
	registerPipeCommand(program);
	registerValidateCommand(program);

	return program;
}
