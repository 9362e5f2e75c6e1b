import fs from "node:fs/promises";
import path from "node:path";
import { afterAll, beforeEach, describe, expect, it, vi } from "vitest";
import { ContentExtractionError, NamingError } from "../errors";
import { FolderLock } from "../folderLock";
import { type MetadataWriter, PngMetadataWriter } from "../metadata";
import type { ContentExtractionAdapter, NamingEngine } from "../providers/VisionProvider";
import { RenameTransaction, type TransactionDeps } from "../renameTransaction";
import type { ExtractedContent, ScreenshotCandidate } from "../types";
import { makePng, makeTempDir, removeTempDirs } from "./helpers/png";

afterAll(removeTempDirs);

beforeEach(() => {
	vi.spyOn(console, "log").mockImplementation(() => {});
	vi.spyOn(console, "warn").mockImplementation(() => {});
	vi.spyOn(console, "error").mockImplementation(() => {});
});

const DESCRIPTION = "A bar chart of Q1 sales by region";

class FakeExtractor implements ContentExtractionAdapter {
	calls = 0;
	constructor(private readonly replies: Array<ExtractedContent | Error> = []) {}

	async extractContent(): Promise<ExtractedContent> {
		const reply = this.replies[this.calls++] ?? {
			description: DESCRIPTION,
			usage: { promptTokens: 120, completionTokens: 30, totalTokens: 150 },
		};
		if (reply instanceof Error) throw reply;
		return reply;
	}
}

class FakeNamer implements NamingEngine {
	calls = 0;
	constructor(private readonly reply: string | Error = "sales_chart_q1") {}

	async generateName(): Promise<string> {
		this.calls++;
		if (this.reply instanceof Error) throw this.reply;
		return this.reply;
	}
}

async function setup(name = "Screenshot 2024-03-01.png", contents: Buffer = makePng(4, 3)) {
	const dir = await makeTempDir("transaction");
	const filePath = path.join(dir, name);
	await fs.writeFile(filePath, contents);
	const candidate: ScreenshotCandidate = {
		path: filePath,
		filename: name,
		sizeBytes: contents.length,
		width: 4,
		height: 3,
	};
	return { dir, filePath, candidate, contents };
}

function deps(overrides: Partial<TransactionDeps> = {}): TransactionDeps {
	return {
		extractor: new FakeExtractor(),
		namer: new FakeNamer(),
		metadata: new PngMetadataWriter(),
		lock: new FolderLock(),
		retry: { attempts: 3, baseDelayMs: 0, maxDelayMs: 0, timeoutMs: 1000 },
		resize: false,
		maxCollisionAttempts: 1000,
		...overrides,
	};
}

const listDir = async (dir: string) => (await fs.readdir(dir)).sort();

describe("RenameTransaction", () => {
	it("describes, tags and renames a screenshot", async () => {
		const { dir, filePath, candidate } = await setup();
		const transaction = new RenameTransaction(candidate, deps());

		const result = await transaction.run();

		expect(result).toEqual({
			originalPath: filePath,
			newPath: path.join(dir, "sales_chart_q1.png"),
			description: DESCRIPTION,
			promptTokens: 120,
			totalTokens: 150,
			status: "Success",
		});
		expect(await listDir(dir)).toEqual(["sales_chart_q1.png"]);
		expect(await new PngMetadataWriter().read(path.join(dir, "sales_chart_q1.png"))).toBe(DESCRIPTION);
		expect(transaction.currentState).toBe("Renamed");
		expect(transaction.history).toEqual([
			"Pending",
			"ContentExtracted",
			"Named",
			"MetadataEmbedded",
			"Renamed",
		]);
	});

	it("adds a numeric suffix instead of overwriting an existing file", async () => {
		const { dir, candidate } = await setup();
		const existing = path.join(dir, "sales_chart_q1.png");
		await fs.writeFile(existing, "keep me");

		const result = await new RenameTransaction(candidate, deps()).run();

		expect(result.status).toBe("Success");
		expect(result.newPath).toBe(path.join(dir, "sales_chart_q1_1.png"));
		expect(await fs.readFile(existing, "utf-8")).toBe("keep me");
		expect(await listDir(dir)).toEqual(["sales_chart_q1.png", "sales_chart_q1_1.png"]);
	});

	it("sanitizes the suggested name", async () => {
		const { dir, candidate } = await setup();
		const namer = new FakeNamer(' "../Sales Chart.png" ');

		const result = await new RenameTransaction(candidate, deps({ namer })).run();

		expect(result.newPath).toBe(path.join(dir, "Sales Chart.png"));
	});

	it("skips a file that already carries a description without calling any service", async () => {
		const { dir, filePath, candidate } = await setup();
		await new PngMetadataWriter().embed(filePath, "Already described");
		const before = await fs.readFile(filePath);
		const extractor = new FakeExtractor();
		const namer = new FakeNamer();

		const result = await new RenameTransaction(candidate, deps({ extractor, namer })).run();

		expect(result).toEqual({
			originalPath: filePath,
			description: "Already described",
			status: "Skipped",
		});
		expect(extractor.calls).toBe(0);
		expect(namer.calls).toBe(0);
		expect(await listDir(dir)).toEqual([path.basename(filePath)]);
		expect((await fs.readFile(filePath)).equals(before)).toBe(true);
	});

	it("leaves the file untouched when extraction is rejected", async () => {
		const { dir, filePath, candidate, contents } = await setup();
		const extractor = new FakeExtractor([new ContentExtractionError("Rejected", "unsupported image")]);
		const namer = new FakeNamer();
		const transaction = new RenameTransaction(candidate, deps({ extractor, namer }));

		const result = await transaction.run();

		expect(result).toMatchObject({
			originalPath: filePath,
			status: "Failed",
			failureStage: "ContentExtraction",
			errorKind: "Rejected",
			errorMessage: "unsupported image",
		});
		expect(extractor.calls).toBe(1);
		expect(namer.calls).toBe(0);
		expect(transaction.currentState).toBe("Pending");
		expect(await listDir(dir)).toEqual([path.basename(filePath)]);
		expect((await fs.readFile(filePath)).equals(contents)).toBe(true);
	});

	it("retries a transient extraction failure", async () => {
		const { candidate } = await setup();
		const extractor = new FakeExtractor([new ContentExtractionError("Network", "connection reset")]);

		const result = await new RenameTransaction(candidate, deps({ extractor })).run();

		expect(result.status).toBe("Success");
		expect(extractor.calls).toBe(2);
	});

	it("treats an empty description as a malformed response", async () => {
		const { filePath, candidate, contents } = await setup();
		const extractor = new FakeExtractor([
			{ description: "   ", usage: { promptTokens: 1, completionTokens: 0, totalTokens: 1 } },
		]);

		const result = await new RenameTransaction(candidate, deps({ extractor })).run();

		expect(result).toMatchObject({
			status: "Failed",
			failureStage: "ContentExtraction",
			errorKind: "MalformedResponse",
			promptTokens: 1,
			totalTokens: 1,
		});
		expect((await fs.readFile(filePath)).equals(contents)).toBe(true);
	});

	it("fails at naming and keeps the description in the result", async () => {
		const { filePath, candidate, contents } = await setup();
		const namer = new FakeNamer(new NamingError("Rejected", "content policy"));

		const result = await new RenameTransaction(candidate, deps({ namer })).run();

		expect(result).toMatchObject({
			status: "Failed",
			failureStage: "Naming",
			errorKind: "Rejected",
			description: DESCRIPTION,
			totalTokens: 150,
		});
		expect((await fs.readFile(filePath)).equals(contents)).toBe(true);
	});

	it("fails when the suggested name sanitizes to nothing", async () => {
		const { dir, filePath, candidate } = await setup();
		const namer = new FakeNamer("'//'");

		const result = await new RenameTransaction(candidate, deps({ namer })).run();

		expect(result).toMatchObject({
			status: "Failed",
			failureStage: "Naming",
			errorKind: "MalformedResponse",
		});
		expect(await listDir(dir)).toEqual([path.basename(filePath)]);
	});

	it("does not rename when the description cannot be embedded", async () => {
		const { dir, filePath, candidate } = await setup();
		const metadata: MetadataWriter = {
			read: async () => undefined,
			embed: async () => {
				throw new Error("disk full");
			},
		};
		const transaction = new RenameTransaction(candidate, deps({ metadata }));

		const result = await transaction.run();

		expect(result).toMatchObject({
			status: "Failed",
			failureStage: "MetadataEmbed",
			errorKind: "MetadataWriteError",
			errorMessage: "disk full",
		});
		expect(transaction.currentState).toBe("Named");
		expect(await listDir(dir)).toEqual([path.basename(filePath)]);
	});

	it("restores the original bytes when every candidate name is taken", async () => {
		const { dir, filePath, candidate, contents } = await setup();
		for (const name of ["sales_chart_q1.png", "sales_chart_q1_1.png", "sales_chart_q1_2.png"]) {
			await fs.writeFile(path.join(dir, name), name);
		}

		const result = await new RenameTransaction(candidate, deps({ maxCollisionAttempts: 2 })).run();

		expect(result).toMatchObject({
			status: "Failed",
			failureStage: "Rename",
			errorKind: "RenameCollisionExhausted",
			description: DESCRIPTION,
		});
		expect((await fs.readFile(filePath)).equals(contents)).toBe(true);
		expect(await fs.readFile(path.join(dir, "sales_chart_q1_2.png"), "utf-8")).toBe(
			"sales_chart_q1_2.png",
		);
	});

	it("does not start when the run is already cancelled", async () => {
		const { candidate } = await setup();
		const controller = new AbortController();
		controller.abort();
		const extractor = new FakeExtractor();

		const result = await new RenameTransaction(
			candidate,
			deps({ extractor, signal: controller.signal }),
		).run();

		expect(result).toMatchObject({
			status: "Failed",
			failureStage: "ContentExtraction",
			errorKind: "Cancelled",
		});
		expect(extractor.calls).toBe(0);
	});

	it("reports a cancellation that arrives while a transient failure waits to be retried", async () => {
		const { filePath, candidate, contents } = await setup();
		const controller = new AbortController();
		let calls = 0;
		const extractor: ContentExtractionAdapter = {
			async extractContent() {
				calls++;
				setTimeout(() => controller.abort(), 10);
				throw new ContentExtractionError("Network", "connection reset");
			},
		};
		const namer = new FakeNamer();

		const result = await new RenameTransaction(
			candidate,
			deps({
				extractor,
				namer,
				signal: controller.signal,
				retry: { attempts: 3, baseDelayMs: 50, maxDelayMs: 50, timeoutMs: 1000 },
			}),
		).run();

		expect(result).toMatchObject({
			status: "Failed",
			failureStage: "ContentExtraction",
			errorKind: "Cancelled",
		});
		expect(calls).toBe(1);
		expect(namer.calls).toBe(0);
		expect((await fs.readFile(filePath)).equals(contents)).toBe(true);
	});

	it("reports a file that is not a PNG as an invalid image", async () => {
		const { candidate } = await setup("Screenshot broken.png", Buffer.from("not a png"));

		const result = await new RenameTransaction(candidate, deps()).run();

		expect(result).toMatchObject({ status: "Failed", failureStage: "Read", errorKind: "InvalidImage" });
	});

	it("can only run once", async () => {
		const { candidate } = await setup();
		const transaction = new RenameTransaction(candidate, deps());
		await transaction.run();
		await expect(transaction.run()).rejects.toThrow(/already run/);
	});
});
