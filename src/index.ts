#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerPlanCommand } from "./commands/plan.js";
import { registerRunCommand } from "./commands/run.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerTimeCommand } from "./commands/time.js";
import { setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { formatErrorSafe } from "./infra/network-errors.js";
import { closeLogger, getLogger } from "./logging.js";
import { closeDb } from "./storage/db.js";

const program = createProgram();

registerRunCommand(program);
registerPlanCommand(program);
registerStatusCommand(program);
registerTimeCommand(program);

// Global options must be applied before any command loads config
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts();
	if (typeof opts.config === "string") {
		setConfigPath(opts.config);
	}
	if (opts.verbose === true) {
		setVerbose(true);
	}
	getLogger();
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err: unknown) => {
		console.error(`Error: ${formatErrorSafe(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// pino destination and SQLite keep handles open
		closeDb();
		closeLogger();
	});
