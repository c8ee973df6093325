import { describe, it, expect } from "vitest";
import { agreementRate, compareStemmers } from "../../src/stemming/compare";
import { Stemmer } from "../../src/types";

describe("compareStemmers", () => {
	// Simple mock stemmers for testing the comparison logic
	const dropLast: Stemmer = {
		stem: (word: string) => word.slice(0, -1),
	};
	const dropLastVowel: Stemmer = {
		stem: (word: string) => word.replace(/[аео]$/, ""),
	};

	it("reports both stems and whether they agree", () => {
		const rows = compareStemmers(["кот", "окно"], dropLast, dropLastVowel);
		expect(rows).toEqual([
			{ word: "кот", stem: "ко", reference: "кот", agrees: false },
			{ word: "окно", stem: "окн", reference: "окн", agrees: true },
		]);
	});

	it("computes the agreement rate", () => {
		const rows = compareStemmers(["кот", "окно"], dropLast, dropLastVowel);
		expect(agreementRate(rows)).toBe(0.5);
	});

	it("treats an empty comparison as full agreement", () => {
		expect(agreementRate([])).toBe(1);
	});
});
