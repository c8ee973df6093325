import { describe, it, expect } from "vitest";
import { cut } from "../../src/stemming/cut";
import {
	DOUBLE_N,
	NOUN,
	PERFECTIVE_GERUND,
	SUPERLATIVE,
	VERB,
} from "../../src/stemming/suffix-rules";

describe("cut", () => {
	it("keeps the preserved letter before a group-1 gerund ending", () => {
		expect(cut("прочитав", PERFECTIVE_GERUND, 3)).toEqual({
			matched: true,
			word: "прочита",
		});
	});

	it("cuts a plain ending from its first letter", () => {
		expect(cut("купив", PERFECTIVE_GERUND, 2)).toEqual({ matched: true, word: "куп" });
	});

	it("requires the preserved letter to be present", () => {
		expect(cut("лов", PERFECTIVE_GERUND, 0)).toEqual({ matched: false, word: "лов" });
	});

	it("requires the preserved letter to lie at or after the boundary", () => {
		expect(cut("прочитав", PERFECTIVE_GERUND, 7)).toEqual({
			matched: false,
			word: "прочитав",
		});
		expect(cut("читает", VERB, 4)).toEqual({ matched: false, word: "читает" });
	});

	it("prefers the longest ending", () => {
		expect(cut("линиями", NOUN, 2)).toEqual({ matched: true, word: "лин" });
		expect(cut("красивейше", SUPERLATIVE, 3)).toEqual({ matched: true, word: "красив" });
	});

	it("falls back to a shorter ending when the longer one crosses the boundary", () => {
		expect(cut("линиями", NOUN, 4)).toEqual({ matched: true, word: "лини" });
	});

	it("undoubles н even when the first н lies before the boundary", () => {
		expect(cut("ванн", DOUBLE_N, 3)).toEqual({ matched: true, word: "ван" });
	});

	it("does not cut a single н", () => {
		expect(cut("сон", DOUBLE_N, 0)).toEqual({ matched: false, word: "сон" });
	});

	it("does not match beyond the end of the word", () => {
		expect(cut("ванн", DOUBLE_N, 4)).toEqual({ matched: false, word: "ванн" });
		expect(cut("", NOUN, 0)).toEqual({ matched: false, word: "" });
	});
});
