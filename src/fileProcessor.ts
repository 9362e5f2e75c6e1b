// src/fileProcessor.ts
import path from "node:path";
import async, { type QueueObject } from "async";
import { dim, red, yellow } from "kleur/colors";
import type { AuditLogger } from "./auditLogger";
import { AuditLogError, errorMessage } from "./errors";
import { FolderLock } from "./folderLock";
import { RenameTransaction, type TransactionDeps } from "./renameTransaction";
import { type ScanOptions, type ScanResult, type UnreadableFile, scanFolder } from "./scanner";
import type { ProcessingCounts, ProcessingResult, ScreenshotCandidate } from "./types";

export type ProcessorDeps = Omit<TransactionDeps, "lock"> & {
	audit: AuditLogger;
	/** transactions running at the same time */
	concurrency: number;
	lock?: FolderLock;
};

export type BatchSummary = {
	results: ProcessingResult[];
	counts: ProcessingCounts;
	/** candidates dropped because the run was cancelled before they started */
	notAttempted: number;
	auditPath: string;
	auditErrors: AuditLogError[];
	cancelled: boolean;
};

export function countResults(results: readonly ProcessingResult[]): ProcessingCounts {
	const counts: ProcessingCounts = { Success: 0, Skipped: 0, Failed: 0 };
	for (const result of results) counts[result.status]++;
	return counts;
}

/**
 * Runs rename transactions through a bounded worker pool and records every
 * outcome in the audit log. A failing screenshot never stops the others.
 */
export class ScreenshotProcessor {
	private readonly queue: QueueObject<ScreenshotCandidate>;
	private readonly lock: FolderLock;
	private readonly inFlight = new Set<string>();
	private readonly renamedTo = new Set<string>();
	private readonly results: ProcessingResult[] = [];
	private readonly auditErrors: AuditLogError[] = [];
	private idleWaiters: Array<() => void> = [];
	private pending = 0;
	private notAttempted = 0;
	private closed = false;

	constructor(private readonly deps: ProcessorDeps) {
		this.lock = deps.lock ?? new FolderLock();
		this.queue = async.queue<ScreenshotCandidate>(
			(candidate: ScreenshotCandidate, callback: (error?: Error | null) => void) => {
				this.process(candidate).then(
					() => callback(),
					(error: unknown) => callback(error instanceof Error ? error : new Error(String(error))),
				);
			},
			deps.concurrency,
		);
	}

	/**
	 * Queues a candidate unless the same path is already queued or running.
	 * @returns whether the candidate was queued
	 */
	enqueue(candidate: ScreenshotCandidate): boolean {
		if (this.closed) {
			throw new Error("Cannot queue screenshots after the processor was closed");
		}
		if (this.inFlight.has(candidate.path)) {
			console.log(dim(`${candidate.filename} is already queued`));
			return false;
		}

		this.inFlight.add(candidate.path);
		this.pending++;
		this.queue.push(candidate, (error?: Error | null) => {
			if (error) {
				console.error(red(`Unexpected error processing ${candidate.filename}: ${error.message}`));
			}
			this.pending--;
			if (this.pending === 0) {
				const waiters = this.idleWaiters;
				this.idleWaiters = [];
				for (const resolve of waiters) resolve();
			}
		});
		return true;
	}

	/** Whether `filePath` is a name this processor renamed a screenshot to */
	isOwnOutput(filePath: string): boolean {
		return this.renamedTo.has(path.resolve(filePath));
	}

	/** Resolves once every queued candidate has reached a terminal state */
	whenIdle(): Promise<void> {
		if (this.pending === 0) return Promise.resolve();
		return new Promise((resolve) => this.idleWaiters.push(resolve));
	}

	/** Records a file the scanner could not read as a failed attempt */
	async recordUnreadable(file: UnreadableFile): Promise<void> {
		console.error(`${red("Failed")} ${file.filename} at Read (InvalidImage): ${file.reason}`);
		await this.record({
			originalPath: file.path,
			status: "Failed",
			failureStage: "Read",
			errorKind: "InvalidImage",
			errorMessage: file.reason,
		});
	}

	/** Feeds a folder snapshot through the pool and waits for it to finish */
	async processSnapshot(scan: ScanResult): Promise<void> {
		for (const file of scan.unreadable) {
			await this.recordUnreadable(file);
		}
		for (const candidate of scan.candidates) {
			this.enqueue(candidate);
		}
		await this.whenIdle();
	}

	/** Waits for queued work, then flushes and closes the audit log */
	async finish(): Promise<BatchSummary> {
		await this.whenIdle();
		this.closed = true;
		try {
			await this.deps.audit.close();
		} catch (error) {
			this.auditErrors.push(this.toAuditError(error));
			console.error(red(`Could not flush audit log: ${errorMessage(error)}`));
		}

		return {
			results: [...this.results],
			counts: countResults(this.results),
			notAttempted: this.notAttempted,
			auditPath: this.deps.audit.path,
			auditErrors: [...this.auditErrors],
			cancelled: this.deps.signal?.aborted ?? false,
		};
	}

	private async process(candidate: ScreenshotCandidate): Promise<void> {
		try {
			if (this.deps.signal?.aborted) {
				this.notAttempted++;
				return;
			}
			console.log(`Processing ${yellow(candidate.filename)}...`);
			const result = await new RenameTransaction(candidate, { ...this.deps, lock: this.lock }).run();
			if (result.newPath) this.renamedTo.add(path.resolve(result.newPath));
			await this.record(result);
		} finally {
			this.inFlight.delete(candidate.path);
		}
	}

	// The rename is the source of truth: a log failure is reported, never undone
	private async record(result: ProcessingResult): Promise<void> {
		this.results.push(result);
		try {
			await this.deps.audit.record(result);
		} catch (error) {
			this.auditErrors.push(this.toAuditError(error));
			console.error(red(`Could not write audit record for ${result.originalPath}: ${errorMessage(error)}`));
		}
	}

	private toAuditError(error: unknown): AuditLogError {
		if (error instanceof AuditLogError) return error;
		return new AuditLogError(this.deps.audit.path, errorMessage(error), { cause: error });
	}
}

export type BatchOptions = {
	folder: string;
	scan: ScanOptions;
	processor: Omit<ProcessorDeps, "audit">;
	/** opened after the folder scan succeeds */
	openAudit: () => Promise<AuditLogger>;
	/** runs after the snapshot is processed and before the audit log is closed */
	afterSnapshot?: (processor: ScreenshotProcessor) => Promise<void>;
};

/**
 * Processes one snapshot of a folder. Folder and audit-log problems throw
 * before any screenshot is touched; everything after that ends in a summary.
 */
export async function runBatch(options: BatchOptions): Promise<BatchSummary> {
	const scan = await scanFolder(options.folder, options.scan);
	const audit = await options.openAudit();
	const processor = new ScreenshotProcessor({ ...options.processor, audit });

	console.log(
		`Found ${yellow(String(scan.candidates.length))} screenshot(s) in ${yellow(options.folder)}`,
	);
	console.log(`Writing audit log to ${yellow(audit.path)}`);
	await processor.processSnapshot(scan);
	if (options.afterSnapshot) {
		await options.afterSnapshot(processor);
	}
	return processor.finish();
}
