import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { SettingsError } from "../src/errors";
import {
	DEFAULT_CATEGORIES,
	DEFAULT_SETTINGS,
	loadSettings,
	validateSettings,
} from "../src/settings";

describe("validateSettings", () => {
	it("returns the defaults for null", () => {
		expect(validateSettings(null)).toEqual(DEFAULT_SETTINGS);
	});

	it("merges given fields over the defaults", () => {
		const settings = validateSettings({ normalizeYo: true, locale: "ru", extra: 1 });
		expect(settings).toEqual({
			version: 1,
			categories: [...DEFAULT_CATEGORIES],
			stopWordsPath: null,
			normalizeYo: true,
			locale: "ru",
		});
	});

	it("does not share the default category array", () => {
		const settings = validateSettings({});
		settings.categories.push("weather");
		expect(DEFAULT_SETTINGS.categories).toEqual([...DEFAULT_CATEGORIES]);
	});

	it("rejects non-object settings", () => {
		expect(() => validateSettings([1, 2])).toThrow(SettingsError);
		expect(() => validateSettings("sport")).toThrow("Settings must be a JSON object");
	});

	it("rejects empty or duplicate categories", () => {
		expect(() => validateSettings({ categories: [] })).toThrow(
			"categories must be a non-empty array of non-empty strings",
		);
		expect(() => validateSettings({ categories: ["sport", "sport"] })).toThrow(
			"categories must be unique",
		);
	});

	it("rejects fields of the wrong type", () => {
		expect(() => validateSettings({ version: "1" })).toThrow("version must be an integer");
		expect(() => validateSettings({ normalizeYo: "yes" })).toThrow(
			"normalizeYo must be a boolean",
		);
		expect(() => validateSettings({ stopWordsPath: 3 })).toThrow(
			"stopWordsPath must be a string or null",
		);
	});
});

describe("loadSettings", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(os.tmpdir(), "news-stemmer-settings-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("returns the defaults without a path", async () => {
		expect(await loadSettings()).toEqual(DEFAULT_SETTINGS);
	});

	it("reads a JSON file", async () => {
		const file = path.join(dir, "settings.json");
		await writeFile(file, JSON.stringify({ categories: ["a", "b"] }), "utf8");
		const settings = await loadSettings(file);
		expect(settings.categories).toEqual(["a", "b"]);
		expect(settings.normalizeYo).toBe(false);
	});

	it("fails on invalid JSON", async () => {
		const file = path.join(dir, "settings.json");
		await writeFile(file, "{ categories", "utf8");
		await expect(loadSettings(file)).rejects.toThrow(`Invalid JSON in ${file}`);
	});

	it("fails on a missing file", async () => {
		await expect(loadSettings(path.join(dir, "missing.json"))).rejects.toBeInstanceOf(
			SettingsError,
		);
	});
});
