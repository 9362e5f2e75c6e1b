// src/watcher.ts
import path from "node:path";
import chokidar from "chokidar";
import { red, yellow } from "kleur/colors";
import { errorMessage } from "./errors";
import type { ScreenshotProcessor } from "./fileProcessor";
import type { ImageDimensions } from "./image";
import { candidateFromPath } from "./scanner";

export type WatchOptions = {
	indicators: readonly string[];
	processor: ScreenshotProcessor;
	/** the watcher closes when this is aborted */
	signal: AbortSignal;
	readDimensions?: (filePath: string) => Promise<ImageDimensions>;
};

/**
 * Feeds screenshots that appear in `folder` to the processor until the
 * signal is aborted. Resolves once the watcher is closed.
 */
export async function watchFolder(folder: string, options: WatchOptions): Promise<void> {
	const { indicators, processor, signal, readDimensions } = options;
	if (signal.aborted) return;

	console.log(`Watching for new screenshots in ${yellow(folder)}...`);
	const watcher = chokidar.watch(folder, {
		persistent: true,
		ignoreInitial: true, // the initial snapshot is processed separately
		depth: 0, // Don't watch subdirectories
		awaitWriteFinish: {
			stabilityThreshold: 2000, // Wait for file write to complete
			pollInterval: 500,
		},
	});

	watcher
		.on("add", (filePath: string) => {
			if (signal.aborted || processor.isOwnOutput(filePath)) return;
			candidateFromPath(filePath, indicators, readDimensions).then(
				(candidate) => {
					if (!candidate || signal.aborted) return;
					console.log(`New screenshot detected: ${yellow(path.basename(filePath))}`);
					processor.enqueue(candidate);
				},
				(error: unknown) => {
					console.warn(`Could not read ${yellow(filePath)}, skipping: ${errorMessage(error)}`);
				},
			);
		})
		.on("error", (error: unknown) => {
			console.error(red(`Watcher error for ${folder}: ${errorMessage(error)}`));
		});

	await new Promise<void>((resolve) => {
		signal.addEventListener("abort", () => resolve(), { once: true });
	});
	await watcher.close();
	console.log("Stopped watching.");
}
