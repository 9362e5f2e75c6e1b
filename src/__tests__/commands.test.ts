import fs from "node:fs/promises";
import path from "node:path";
import { afterAll, beforeEach, describe, expect, it, vi } from "vitest";
import { createProgram, parsePositiveInt } from "../cli";
import { costCommand } from "../commands/cost";
import { readDescriptions } from "../commands/inspect";
import { formatSummary, renameOverrides } from "../commands/rename";
import { COST_REPORT_COLUMNS } from "../costReport";
import { PngMetadataWriter } from "../metadata";
import { makePng, makeTempDir, removeTempDirs } from "./helpers/png";

afterAll(removeTempDirs);

beforeEach(() => {
	vi.spyOn(console, "log").mockImplementation(() => {});
	vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("parsePositiveInt", () => {
	it("accepts positive integers", () => {
		expect(parsePositiveInt("4")).toBe(4);
	});

	it("rejects anything else", () => {
		expect(() => parsePositiveInt("0")).toThrow("Must be a positive integer.");
		expect(() => parsePositiveInt("1.5")).toThrow("Must be a positive integer.");
		expect(() => parsePositiveInt("two")).toThrow("Must be a positive integer.");
	});
});

describe("createProgram", () => {
	it("registers the rename, cost and inspect commands", () => {
		const program = createProgram();
		expect(program.name()).toBe("screenshot-scribe");
		expect(program.commands.map((c) => c.name())).toEqual(["rename", "cost", "inspect"]);

		const rename = program.commands.find((c) => c.name() === "rename");
		expect(rename?.options.map((o) => o.long)).toEqual([
			"--provider",
			"--detail",
			"--resize",
			"--no-resize",
			"--concurrency",
			"--retries",
			"--log-dir",
			"--sort",
			"--watch",
			"--config",
		]);
	});
});

describe("renameOverrides", () => {
	it("maps flags onto config keys", () => {
		expect(renameOverrides({ provider: "ollama", retries: 4, concurrency: 2, logDir: "/logs" })).toEqual({
			provider: "ollama",
			concurrency: 2,
			retry: { attempts: 4 },
			logDir: "/logs",
		});
	});

	it("leaves unset flags undefined", () => {
		expect(Object.values(renameOverrides({})).every((v) => v === undefined)).toBe(true);
	});
});

describe("formatSummary", () => {
	it("mentions cancelled and audit problems only when present", () => {
		const text = formatSummary({
			results: [],
			counts: { Success: 2, Skipped: 1, Failed: 0 },
			notAttempted: 3,
			auditPath: "/logs/rename_log.csv",
			auditErrors: [],
			cancelled: true,
		});
		expect(text).toContain("2 renamed");
		expect(text).toContain("1 skipped");
		expect(text).toContain("3 screenshot(s) not started because the run was cancelled");
		expect(text).not.toContain("audit log write");
	});
});

describe("costCommand", () => {
	it("writes a CSV row for each screenshot", async () => {
		const dir = await makeTempDir("cost-command");
		await fs.writeFile(path.join(dir, "Screenshot 2.png"), makePng(1024, 600));
		await fs.writeFile(path.join(dir, "Screenshot 1.png"), makePng(100, 100));
		await fs.writeFile(path.join(dir, "holiday.png"), makePng(10, 10));
		const output = path.join(dir, "report.csv");

		expect(await costCommand(dir, { output })).toBe(0);

		const lines = (await fs.readFile(output, "utf-8")).trim().split("\n");
		expect(lines[0]).toBe(COST_REPORT_COLUMNS.join(","));
		expect(lines).toHaveLength(3);
		// 100x100: one tile at both sizes
		expect(lines[1]?.split(",").slice(1, 3)).toEqual(["100", "100"]);
		expect(lines[1]?.split(",").slice(4, 6)).toEqual(["1", "8500"]);
		// 1024x600: 2x2 tiles, halved to 512x300: one tile
		expect(lines[2]?.split(",").slice(4, 6)).toEqual(["4", "25501"]);
		expect(lines[2]?.split(",").slice(7, 11)).toEqual(["512", "300", "1", "8500"]);
	});
});

describe("readDescriptions", () => {
	it("reports the description, its absence or the read error for each PNG", async () => {
		const dir = await makeTempDir("inspect");
		await fs.writeFile(path.join(dir, "a.png"), makePng(1, 1));
		await fs.writeFile(path.join(dir, "b.png"), makePng(1, 1));
		await fs.writeFile(path.join(dir, "broken.png"), "garbage");
		await fs.writeFile(path.join(dir, "notes.txt"), "ignored");
		await new PngMetadataWriter().embed(path.join(dir, "a.png"), "A described image");

		const entries = await readDescriptions(dir);

		expect(entries).toEqual([
			{ filename: "a.png", description: "A described image" },
			{ filename: "b.png", description: undefined },
			{ filename: "broken.png", error: expect.stringContaining("missing PNG signature") },
		]);
	});
});
