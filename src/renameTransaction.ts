import fs from "node:fs";
import path from "node:path";
import { dim, green, red, yellow } from "kleur/colors";
import {
	ContentExtractionError,
	InvalidImageError,
	NamingError,
	RenameCollisionExhaustedError,
	errorMessage,
} from "./errors";
import type { FolderLock } from "./folderLock";
import { type MetadataWriter, replaceFileAtomic } from "./metadata";
import { findAvailablePath, maxBaseNameBytes, sanitizeFileName } from "./naming";
import {
	type ContentExtractionAdapter,
	type NamingEngine,
	toContentExtractionError,
	toNamingError,
} from "./providers/VisionProvider";
import { callWithRetry } from "./retry";
import type {
	ErrorKind,
	ExtractedContent,
	FailureStage,
	ProcessingResult,
	RetryPolicy,
	ScreenshotCandidate,
	TokenUsage,
	TransactionState,
} from "./types";

export type TransactionDeps = {
	extractor: ContentExtractionAdapter;
	namer: NamingEngine;
	metadata: MetadataWriter;
	/** serializes collision search and rename per folder */
	lock: FolderLock;
	retry: RetryPolicy;
	/** submit images at half size */
	resize: boolean;
	maxCollisionAttempts: number;
	/** when aborted, no further external call is started */
	signal?: AbortSignal;
};

const NEXT_STATE: Record<TransactionState, TransactionState | null> = {
	Pending: "ContentExtracted",
	ContentExtracted: "Named",
	Named: "MetadataEmbedded",
	MetadataEmbedded: "Renamed",
	Renamed: null,
};

/**
 * Describe → name → embed → rename for a single screenshot.
 *
 * The file is only renamed once a description has been embedded, the rename
 * never replaces an existing file, and every failure ends in a `Failed`
 * result instead of an exception. Files that already carry a description are
 * skipped without calling any service.
 */
export class RenameTransaction {
	private state: TransactionState = "Pending";
	private readonly visited: TransactionState[] = ["Pending"];
	private started = false;
	private description?: string;
	private usage?: TokenUsage;

	constructor(
		private readonly candidate: ScreenshotCandidate,
		private readonly deps: TransactionDeps,
	) {}

	get currentState(): TransactionState {
		return this.state;
	}

	/** States reached so far, in order */
	get history(): readonly TransactionState[] {
		return this.visited;
	}

	async run(): Promise<ProcessingResult> {
		if (this.started) {
			throw new Error(`Transaction for ${this.candidate.path} has already run`);
		}
		this.started = true;

		const { candidate, deps } = this;
		const filePath = candidate.path;

		let existing: string | undefined;
		try {
			existing = await deps.metadata.read(filePath);
		} catch (error) {
			const kind = error instanceof InvalidImageError ? "InvalidImage" : "FilesystemError";
			return this.fail("Read", kind, error);
		}
		if (existing?.trim()) {
			console.log(dim(`Skipping ${candidate.filename}: already described`));
			return { originalPath: filePath, description: existing, status: "Skipped" };
		}

		let original: Buffer;
		try {
			original = await fs.promises.readFile(filePath);
		} catch (error) {
			return this.fail("Read", "FilesystemError", error);
		}

		// Pending → ContentExtracted
		if (deps.signal?.aborted) {
			return this.fail("ContentExtraction", "Cancelled", "run was cancelled");
		}
		let extracted: ExtractedContent;
		try {
			extracted = await callWithRetry({
				label: `Describing ${candidate.filename}`,
				policy: deps.retry,
				call: (signal) => deps.extractor.extractContent(original, { resize: deps.resize }, signal),
				toError: toContentExtractionError,
				timeoutError: () =>
					new ContentExtractionError("Timeout", `no response within ${deps.retry.timeoutMs}ms`),
				signal: deps.signal,
			});
		} catch (error) {
			const kind = deps.signal?.aborted ? "Cancelled" : toContentExtractionError(error).kind;
			return this.fail("ContentExtraction", kind, error);
		}
		const { usage } = extracted;
		this.usage = usage;
		const description = extracted.description.trim();
		if (!description) {
			return this.fail("ContentExtraction", "MalformedResponse", "empty description");
		}
		this.description = description;
		this.advance("ContentExtracted");

		// ContentExtracted → Named
		if (deps.signal?.aborted) {
			return this.fail("Naming", "Cancelled", "run was cancelled");
		}
		let suggestion: string;
		try {
			suggestion = await callWithRetry({
				label: `Naming ${candidate.filename}`,
				policy: deps.retry,
				call: (signal) => deps.namer.generateName(description, signal),
				toError: toNamingError,
				timeoutError: () => new NamingError("Timeout", `no response within ${deps.retry.timeoutMs}ms`),
				signal: deps.signal,
			});
		} catch (error) {
			const kind = deps.signal?.aborted ? "Cancelled" : toNamingError(error).kind;
			return this.fail("Naming", kind, error);
		}
		const baseName = sanitizeFileName(suggestion, maxBaseNameBytes(deps.maxCollisionAttempts));
		if (!baseName) {
			return this.fail("Naming", "MalformedResponse", `unusable filename "${suggestion}"`);
		}
		this.advance("Named");

		// Named → MetadataEmbedded
		try {
			await deps.metadata.embed(filePath, description);
		} catch (error) {
			return this.fail("MetadataEmbed", "MetadataWriteError", error);
		}
		this.advance("MetadataEmbedded");

		// MetadataEmbedded → Renamed
		const folder = path.dirname(filePath);
		let newPath: string;
		try {
			newPath = await deps.lock.run(folder, async () => {
				const target = await findAvailablePath(folder, baseName, deps.maxCollisionAttempts);
				await fs.promises.rename(filePath, target);
				return target;
			});
		} catch (error) {
			await this.restoreOriginal(original);
			const kind =
				error instanceof RenameCollisionExhaustedError ? "RenameCollisionExhausted" : "FilesystemError";
			return this.fail("Rename", kind, error);
		}
		this.advance("Renamed");

		console.log(`${green("Renamed")} ${candidate.filename} -> ${yellow(path.basename(newPath))}`);
		return {
			originalPath: filePath,
			newPath,
			description,
			promptTokens: usage.promptTokens,
			totalTokens: usage.totalTokens,
			status: "Success",
		};
	}

	private advance(next: TransactionState): void {
		if (NEXT_STATE[this.state] !== next) {
			throw new Error(`Invalid transition ${this.state} -> ${next}`);
		}
		this.state = next;
		this.visited.push(next);
	}

	// The rename failed after the description was embedded: put the original
	// bytes back so a later run does not skip the file as already processed.
	private async restoreOriginal(original: Buffer): Promise<void> {
		try {
			await replaceFileAtomic(this.candidate.path, original);
		} catch (error) {
			console.error(
				red(`Could not restore ${this.candidate.path} after failed rename: ${errorMessage(error)}`),
			);
		}
	}

	private fail(stage: FailureStage, kind: ErrorKind, error: unknown): ProcessingResult {
		const message = errorMessage(error);
		console.error(
			`${red("Failed")} ${this.candidate.filename} at ${stage} (${kind}): ${message}`,
		);
		return {
			originalPath: this.candidate.path,
			description: this.description,
			promptTokens: this.usage?.promptTokens,
			totalTokens: this.usage?.totalTokens,
			status: "Failed",
			failureStage: stage,
			errorKind: kind,
			errorMessage: message,
		};
	}
}
