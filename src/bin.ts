#!/usr/bin/env node
import { describeError } from "./errors";
import { main } from "./cli";

main(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		console.error(describeError(error));
		process.exitCode = 1;
	},
);
