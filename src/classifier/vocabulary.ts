import { UnknownCategoryError } from "../errors";

/**
 * Stems seen per category, in a fixed category order.
 */
export class CategoryVocabulary {
	private readonly stems = new Map<string, Set<string>>();

	constructor(categories: readonly string[]) {
		for (const category of categories) {
			this.stems.set(category, new Set());
		}
	}

	get categories(): string[] {
		return [...this.stems.keys()];
	}

	add(category: string, stems: Iterable<string>): void {
		const set = this.get(category);
		for (const stem of stems) {
			set.add(stem);
		}
	}

	has(category: string, stem: string): boolean {
		return this.get(category).has(stem);
	}

	size(category: string): number {
		return this.get(category).size;
	}

	private get(category: string): Set<string> {
		const set = this.stems.get(category);
		if (!set) {
			throw new UnknownCategoryError(category);
		}
		return set;
	}
}
