#!/usr/bin/env node
import { errorMessage } from "./core/errors.js";
import { runCli } from "./cli/run-cli.js";

runCli().catch((error: unknown) => {
	process.stderr.write(`${errorMessage(error)}\n`);
	process.exitCode = 1;
});
