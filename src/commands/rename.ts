import path from "node:path";
import { dim, green, red, yellow } from "kleur/colors";
import { CsvAuditLogger } from "../auditLogger";
import { loadConfig } from "../config";
import { type BatchSummary, runBatch } from "../fileProcessor";
import { PngMetadataWriter } from "../metadata";
import { initializeProvider } from "../providers";
import { byPath } from "../scanner";
import type { RenameOptions } from "../types";
import { resolvePath } from "../utils";
import { watchFolder } from "../watcher";

/** Maps CLI flags onto config keys; unset flags leave the config untouched */
export function renameOverrides(options: RenameOptions): Record<string, unknown> {
	return {
		provider: options.provider,
		detail: options.detail,
		resize: options.resize,
		concurrency: options.concurrency,
		retry: options.retries === undefined ? undefined : { attempts: options.retries },
		logDir: options.logDir,
	};
}

export function formatSummary(summary: BatchSummary): string {
	const { counts } = summary;
	const lines = [
		`Done: ${green(`${counts.Success} renamed`)}, ${dim(`${counts.Skipped} skipped`)}, ${red(`${counts.Failed} failed`)}`,
	];
	if (summary.notAttempted > 0) {
		lines.push(yellow(`${summary.notAttempted} screenshot(s) not started because the run was cancelled`));
	}
	if (summary.auditErrors.length > 0) {
		lines.push(red(`${summary.auditErrors.length} audit log write(s) failed`));
	}
	lines.push(`Audit log: ${yellow(summary.auditPath)}`);
	return lines.join("\n");
}

export async function renameCommand(folder: string, options: RenameOptions): Promise<number> {
	const config = await loadConfig(options.config, renameOverrides(options));
	const provider = initializeProvider(config);
	const folderPath = path.resolve(resolvePath(folder) ?? folder);

	const controller = new AbortController();
	const onSigint = () => {
		console.log(yellow("\nCancelling: letting running screenshots finish..."));
		controller.abort();
	};
	process.once("SIGINT", onSigint);

	try {
		const summary = await runBatch({
			folder: folderPath,
			scan: {
				indicators: config.indicators,
				order: options.sort ? byPath : undefined,
			},
			processor: {
				extractor: provider,
				namer: provider,
				metadata: new PngMetadataWriter(),
				retry: config.retry,
				resize: config.resize,
				maxCollisionAttempts: config.maxCollisionAttempts,
				concurrency: config.concurrency,
				signal: controller.signal,
			},
			openAudit: () => CsvAuditLogger.open(config.logDir ?? folderPath),
			afterSnapshot: options.watch
				? async (processor) => {
						await watchFolder(folderPath, {
							indicators: config.indicators,
							processor,
							signal: controller.signal,
						});
						await processor.whenIdle();
					}
				: undefined,
		});

		console.log(formatSummary(summary));
		return summary.auditErrors.length > 0 ? 1 : 0;
	} finally {
		process.off("SIGINT", onSigint);
	}
}
