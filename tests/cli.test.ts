import { describe, it, expect, beforeEach } from "vitest";
import { parseArgs } from "../src/cli-args";
import { helpText, main, Output, runCommand } from "../src/cli";
import { UsageError } from "../src/errors";
import { setLocale } from "../src/i18n";

function captureOutput(): Output & { logs: string[]; errors: string[] } {
	const logs: string[] = [];
	const errors: string[] = [];
	return {
		logs,
		errors,
		log: (message: string) => logs.push(message),
		error: (message: string) => errors.push(message),
	};
}

describe("parseArgs", () => {
	beforeEach(() => {
		setLocale("en");
	});

	it("parses stem with lowercased words", () => {
		expect(parseArgs(["stem", "Коробка", "ДОМ"])).toEqual({
			type: "stem",
			words: ["коробка", "дом"],
		});
	});

	it("parses classify options", () => {
		expect(
			parseArgs(["classify", "--train", "a.txt", "--test", "b.txt", "--output", "c.txt", "-q"]),
		).toEqual({
			type: "classify",
			trainPath: "a.txt",
			testPath: "b.txt",
			outputPath: "c.txt",
			configPath: undefined,
			quiet: true,
		});
	});

	it("treats no arguments as help", () => {
		expect(parseArgs([])).toEqual({ type: "help" });
		expect(parseArgs(["-h"])).toEqual({ type: "help" });
	});

	it("rejects a missing required option", () => {
		expect(() => parseArgs(["classify", "--train", "a.txt", "--test", "b.txt"])).toThrow(
			"Missing required option --output.",
		);
	});

	it("rejects an option without a value", () => {
		expect(() => parseArgs(["classify", "--train"])).toThrow("Option --train needs a value.");
	});

	it("rejects unknown options and commands", () => {
		expect(() => parseArgs(["classify", "--verbose"])).toThrow(UsageError);
		expect(() => parseArgs(["lemmatize"])).toThrow("Unknown command: lemmatize");
	});

	it("requires words for stem", () => {
		expect(() => parseArgs(["stem"])).toThrow("No words given.");
	});
});

describe("runCommand", () => {
	beforeEach(() => {
		setLocale("en");
	});

	it("prints each word with its stem", async () => {
		const out = captureOutput();
		await runCommand({ type: "stem", words: ["коробка", "ванн"] }, out);
		expect(out.logs).toEqual(["коробка\tкоробк", "ванн\tван"]);
	});

	it("prints help", async () => {
		const out = captureOutput();
		await runCommand({ type: "help" }, out);
		expect(out.logs).toEqual([helpText()]);
		expect(helpText().split("\n")[0]).toBe("Usage: news-stemmer <command> [options]");
	});
});

describe("main", () => {
	it("returns 1 and prints help for an unknown command", async () => {
		const out = captureOutput();
		expect(await main(["lemmatize"], out)).toBe(1);
		expect(out.errors).toHaveLength(2);
		expect(out.logs).toEqual([]);
	});

	it("returns 1 when a command fails", async () => {
		const out = captureOutput();
		const code = await main(
			["classify", "--train", "/nonexistent/train.txt", "--test", "t", "--output", "o", "-q"],
			out,
		);
		expect(code).toBe(1);
		expect(out.errors).toHaveLength(1);
	});

	it("returns 0 after stemming", async () => {
		const out = captureOutput();
		expect(await main(["stem", "коробка"], out)).toBe(0);
		expect(out.logs).toEqual(["коробка\tкоробк"]);
	});
});
