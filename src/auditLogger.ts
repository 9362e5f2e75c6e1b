import fs from "node:fs";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";
import { AuditLogError, errorMessage } from "./errors";
import type { ProcessingResult } from "./types";
import { formatTimestamp, toCsvRow } from "./utils";

export const AUDIT_COLUMNS = [
	"original_path",
	"new_name",
	"description",
	"prompt_tokens",
	"total_tokens",
	"status",
	"failure_stage",
	"error_kind",
] as const;

export type AuditRecord = Record<(typeof AUDIT_COLUMNS)[number], string | number | undefined>;

/** Persists one record per attempted screenshot */
export interface AuditLogger {
	readonly path: string;
	record(result: ProcessingResult): Promise<void>;
	close(): Promise<void>;
}

const MAX_NAME_ATTEMPTS = 1000;

/** `attempt` > 0 adds a suffix for runs that start within the same second */
export function auditLogFileName(date: Date, attempt = 0): string {
	const suffix = attempt > 0 ? `_${attempt}` : "";
	return `rename_log_${formatTimestamp(date)}${suffix}.csv`;
}

function isAlreadyExists(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "EEXIST";
}

export function toAuditRecord(result: ProcessingResult): AuditRecord {
	return {
		original_path: result.originalPath,
		new_name: result.newPath ? path.basename(result.newPath) : undefined,
		description: result.description,
		prompt_tokens: result.promptTokens,
		total_tokens: result.totalTokens,
		status: result.status,
		failure_stage: result.failureStage,
		error_kind: result.errorKind,
	};
}

/**
 * Append-only CSV audit log. Rows are written in the order `record` is
 * called; `close` syncs the file to disk.
 */
export class CsvAuditLogger implements AuditLogger {
	private pending: Promise<void> = Promise.resolve();
	private closed = false;

	private constructor(
		readonly path: string,
		private readonly handle: FileHandle,
	) {}

	/** Creates a new log in `dir`; an existing log is never appended to */
	static async open(dir: string, now: Date = new Date()): Promise<CsvAuditLogger> {
		for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
			const logPath = path.join(dir, auditLogFileName(now, attempt));
			let handle: FileHandle | undefined;
			try {
				handle = await fs.promises.open(logPath, "wx");
				await handle.appendFile(toCsvRow(AUDIT_COLUMNS), "utf-8");
				return new CsvAuditLogger(logPath, handle);
			} catch (error) {
				if (!handle && isAlreadyExists(error)) continue;
				await handle?.close();
				throw new AuditLogError(logPath, errorMessage(error), { cause: error });
			}
		}
		const lastPath = path.join(dir, auditLogFileName(now, MAX_NAME_ATTEMPTS - 1));
		throw new AuditLogError(lastPath, `no free log name after ${MAX_NAME_ATTEMPTS} attempts`);
	}

	record(result: ProcessingResult): Promise<void> {
		if (this.closed) {
			return Promise.reject(new AuditLogError(this.path, "log is already closed"));
		}
		const record = toAuditRecord(result);
		const line = toCsvRow(AUDIT_COLUMNS.map((column) => record[column]));

		const write = this.pending.then(() => this.handle.appendFile(line, "utf-8"));
		// keep later writes queued behind this one even if it fails
		this.pending = write.catch(() => undefined);
		return write.catch((error: unknown) => {
			throw new AuditLogError(this.path, errorMessage(error), { cause: error });
		});
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		await this.pending;
		try {
			await this.handle.sync();
		} catch (error) {
			throw new AuditLogError(this.path, errorMessage(error), { cause: error });
		} finally {
			await this.handle.close();
		}
	}
}


