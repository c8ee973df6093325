import { readFile, writeFile } from "fs/promises";
import { CorpusFormatError, StemmerAppError } from "../errors";
import { TrainingExample } from "../types";

async function readText(filePath: string): Promise<string> {
	try {
		return await readFile(filePath, "utf8");
	} catch (error) {
		throw new StemmerAppError(`Cannot read ${filePath}`, { cause: error });
	}
}

/**
 * Split file content into lines, without the empty line after a final newline.
 */
export function splitLines(content: string): string[] {
	if (content.length === 0) {
		return [];
	}
	const lines = content.split(/\r?\n/);
	if (lines[lines.length - 1] === "") {
		lines.pop();
	}
	return lines;
}

/**
 * Parse "<category>\t<text>" lines. Blank lines are skipped.
 */
export function parseTrainingCorpus(content: string, source = "<training>"): TrainingExample[] {
	const examples: TrainingExample[] = [];
	splitLines(content).forEach((line, index) => {
		if (line.trim().length === 0) {
			return;
		}
		const tab = line.indexOf("\t");
		if (tab === -1) {
			throw new CorpusFormatError(source, index + 1, "expected <category>\\t<text>");
		}
		examples.push({
			category: line.slice(0, tab),
			text: line.slice(tab + 1),
			line: index + 1,
		});
	});
	return examples;
}

export async function readTrainingCorpus(filePath: string): Promise<TrainingExample[]> {
	return parseTrainingCorpus(await readText(filePath), filePath);
}

/**
 * One document per line. Blank lines are kept so output lines align with input lines.
 */
export async function readTestDocuments(filePath: string): Promise<string[]> {
	return splitLines(await readText(filePath));
}

export async function writeLabels(filePath: string, labels: string[]): Promise<void> {
	const content = labels.map((label) => `${label}\n`).join("");
	try {
		await writeFile(filePath, content, "utf8");
	} catch (error) {
		throw new StemmerAppError(`Cannot write ${filePath}`, { cause: error });
	}
}
