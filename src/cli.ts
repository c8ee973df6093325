/**
 * news-stemmer CLI
 *
 * Usage:
 *   news-stemmer stem <word...>        Print the stem of each word
 *   news-stemmer compare <word...>     Compare with the Snowball reference stemmer
 *   news-stemmer classify --train <file> --test <file> --output <file>
 *                         [--config <file>] [--quiet]
 */

import { Command, parseArgs } from "./cli-args";
import { describeError } from "./errors";
import { detectLocale, setLocale, t, TranslationKey } from "./i18n";
import { loadSettings } from "./settings";
import { agreementRate, compareStemmers } from "./stemming/compare";
import { ReferenceStemmer } from "./stemming/reference-stemmer";
import { RussianStemmer } from "./stemming/russian-stemmer";
import { runClassification } from "./corpus/run-classification";

export interface Output {
	log(message: string): void;
	error(message: string): void;
}

const consoleOutput: Output = {
	log: (message) => console.log(message),
	error: (message) => console.error(message),
};

const HELP_KEYS: TranslationKey[] = [
	"cli.usage",
	"cli.commands",
	"cli.command.stem",
	"cli.command.compare",
	"cli.command.classify",
	"cli.command.classify-description",
	"cli.command.help",
];

export function helpText(): string {
	return HELP_KEYS.map((key) => t(key)).join("\n");
}

/**
 * Execute a parsed command. Errors propagate to the caller.
 */
export async function runCommand(command: Command, out: Output = consoleOutput): Promise<void> {
	switch (command.type) {
		case "help":
			out.log(helpText());
			return;

		case "stem": {
			const stemmer = new RussianStemmer();
			for (const word of command.words) {
				out.log(`${word}\t${stemmer.stem(word)}`);
			}
			return;
		}

		case "compare": {
			const rows = compareStemmers(command.words, new RussianStemmer(), new ReferenceStemmer());
			for (const row of rows) {
				out.log(`${row.word}\t${row.stem}\t${row.reference}\t${row.agrees ? "ok" : "diff"}`);
			}
			out.error(
				t("compare.summary", {
					agreed: rows.filter((row) => row.agrees).length,
					total: rows.length,
					percent: Math.round(agreementRate(rows) * 100),
				}),
			);
			return;
		}

		case "classify": {
			const settings = await loadSettings(command.configPath);
			if (settings.locale !== null) {
				setLocale(settings.locale);
			}
			const summary = await runClassification({
				trainPath: command.trainPath,
				testPath: command.testPath,
				outputPath: command.outputPath,
				settings,
				onProgress: command.quiet
					? undefined
					: (index, total) => out.error(t("classify.progress", { index, total })),
			});
			out.log(
				t("classify.done", {
					trained: summary.trained,
					classified: summary.classified,
					output: command.outputPath,
				}),
			);
			for (const [category, size] of Object.entries(summary.vocabularySizes)) {
				out.log(t("classify.vocabulary", { category, size }));
			}
			return;
		}
	}
}

/**
 * Parse, run, and map any failure to exit code 1.
 */
export async function main(argv: string[], out: Output = consoleOutput): Promise<number> {
	setLocale(detectLocale());
	let command: Command;
	try {
		command = parseArgs(argv);
	} catch (error) {
		out.error(describeError(error));
		out.error(helpText());
		return 1;
	}

	try {
		await runCommand(command, out);
		return 0;
	} catch (error) {
		out.error(t("cli.error", { message: describeError(error) }));
		return 1;
	}
}
