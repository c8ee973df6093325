import { readFile } from "fs/promises";
import path from "path";
import { SettingsError } from "../errors";

export const DEFAULT_STOP_WORDS_PATH = path.resolve(__dirname, "../../data/stop-words.txt");

/**
 * Words skipped before stemming.
 */
export class StopWords {
	private readonly words: ReadonlySet<string>;

	constructor(words: Iterable<string>) {
		this.words = new Set(words);
	}

	has(word: string): boolean {
		return this.words.has(word);
	}

	get size(): number {
		return this.words.size;
	}

	static empty(): StopWords {
		return new StopWords([]);
	}
}

/**
 * One word per line. Blank lines and lines starting with # are skipped.
 */
export function parseStopWords(content: string): StopWords {
	const words: string[] = [];
	for (const raw of content.split(/\r?\n/)) {
		const word = raw.trim().toLowerCase();
		if (word.length === 0 || word.startsWith("#")) {
			continue;
		}
		words.push(word);
	}
	return new StopWords(words);
}

export async function loadStopWords(filePath: string = DEFAULT_STOP_WORDS_PATH): Promise<StopWords> {
	let content: string;
	try {
		content = await readFile(filePath, "utf8");
	} catch (error) {
		throw new SettingsError(`Cannot read stop words from ${filePath}`, { cause: error });
	}
	return parseStopWords(content);
}
