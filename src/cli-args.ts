import { UsageError } from "./errors";
import { t } from "./i18n";

export type Command =
	| { type: "stem"; words: string[] }
	| { type: "compare"; words: string[] }
	| {
			type: "classify";
			trainPath: string;
			testPath: string;
			outputPath: string;
			configPath?: string;
			quiet: boolean;
	  }
	| { type: "help" };

type ClassifyOption = "train" | "test" | "output" | "config";

const CLASSIFY_OPTIONS: ReadonlySet<string> = new Set<ClassifyOption>([
	"train",
	"test",
	"output",
	"config",
]);

function isClassifyOption(name: string): name is ClassifyOption {
	return CLASSIFY_OPTIONS.has(name);
}

function parseWords(args: string[]): string[] {
	const words = args.map((word) => word.toLowerCase()).filter((word) => word.length > 0);
	if (words.length === 0) {
		throw new UsageError(t("cli.missing-words"));
	}
	return words;
}

function parseClassify(args: string[]): Command {
	const values: Partial<Record<ClassifyOption, string>> = {};
	let quiet = false;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		if (arg === "--quiet" || arg === "-q") {
			quiet = true;
			continue;
		}
		const name = arg.startsWith("--") ? arg.slice(2) : "";
		if (!isClassifyOption(name)) {
			throw new UsageError(t("cli.unknown-option", { option: arg }));
		}
		const value = args[i + 1];
		if (value === undefined || value.startsWith("--")) {
			throw new UsageError(t("cli.missing-value", { option: name }));
		}
		values[name] = value;
		i++;
	}

	const { train, test, output, config } = values;
	if (train === undefined) {
		throw new UsageError(t("cli.missing-option", { option: "train" }));
	}
	if (test === undefined) {
		throw new UsageError(t("cli.missing-option", { option: "test" }));
	}
	if (output === undefined) {
		throw new UsageError(t("cli.missing-option", { option: "output" }));
	}

	return {
		type: "classify",
		trainPath: train,
		testPath: test,
		outputPath: output,
		configPath: config,
		quiet,
	};
}

/**
 * Parse command-line arguments (without the node and script paths).
 */
export function parseArgs(argv: string[]): Command {
	const [command, ...rest] = argv;
	switch (command) {
		case "stem":
			return { type: "stem", words: parseWords(rest) };
		case "compare":
			return { type: "compare", words: parseWords(rest) };
		case "classify":
			return parseClassify(rest);
		case undefined:
		case "help":
		case "--help":
		case "-h":
			return { type: "help" };
		default:
			throw new UsageError(t("cli.unknown-command", { command }));
	}
}
