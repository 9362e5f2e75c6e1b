import fs from "node:fs";
import path from "node:path";
import { yellow } from "kleur/colors";
import { createScreenshotClassifier } from "./classifier";
import { ConfigError, errorMessage } from "./errors";
import { type ImageDimensions, readImageDimensions } from "./image";
import type { ScreenshotCandidate } from "./types";

export type CandidateOrder = (a: ScreenshotCandidate, b: ScreenshotCandidate) => number;

/** Lexicographic order by path, for reproducible runs */
export const byPath: CandidateOrder = (a, b) =>
	a.path < b.path ? -1 : a.path > b.path ? 1 : 0;

export type ScanOptions = {
	indicators: readonly string[];
	/** descend into subdirectories */
	recursive?: boolean;
	/** listing order is kept when omitted */
	order?: CandidateOrder;
	readDimensions?: (filePath: string) => Promise<ImageDimensions>;
};

export type UnreadableFile = {
	path: string;
	filename: string;
	reason: string;
};

export type ScanResult = {
	folder: string;
	candidates: ScreenshotCandidate[];
	unreadable: UnreadableFile[];
	/** entries that were not screenshots */
	ignored: number;
};

/**
 * Throws ConfigError unless `folder` is an existing directory
 */
export async function assertFolder(folder: string): Promise<void> {
	let stats: fs.Stats;
	try {
		stats = await fs.promises.stat(folder);
	} catch (error) {
		throw new ConfigError(`Cannot access folder ${folder}: ${errorMessage(error)}`, {
			cause: error,
		});
	}
	if (!stats.isDirectory()) {
		throw new ConfigError(`${folder} is not a directory`);
	}
}

async function listFiles(folder: string, recursive: boolean): Promise<string[]> {
	const entries = await fs.promises.readdir(folder, { withFileTypes: true });
	const files: string[] = [];

	for (const entry of entries) {
		if (entry.name.startsWith(".")) continue;
		const entryPath = path.join(folder, entry.name);
		if (entry.isFile()) {
			files.push(entryPath);
		} else if (recursive && entry.isDirectory()) {
			files.push(...(await listFiles(entryPath, true)));
		}
	}
	return files;
}

/**
 * Takes one snapshot of the folder listing and turns every screenshot in it
 * into a candidate. Files renamed later in the run do not affect the result.
 */
export async function scanFolder(folder: string, options: ScanOptions): Promise<ScanResult> {
	const { indicators, recursive = false, order, readDimensions = readImageDimensions } = options;
	await assertFolder(folder);

	let files: string[];
	try {
		files = await listFiles(folder, recursive);
	} catch (error) {
		throw new ConfigError(`Cannot read folder ${folder}: ${errorMessage(error)}`, {
			cause: error,
		});
	}

	const classify = createScreenshotClassifier(indicators);
	const result: ScanResult = { folder, candidates: [], unreadable: [], ignored: 0 };

	for (const filePath of files) {
		const filename = path.basename(filePath);
		if (!classify(filename)) {
			result.ignored++;
			continue;
		}

		try {
			const stats = await fs.promises.stat(filePath);
			const { width, height } = await readDimensions(filePath);
			result.candidates.push({ path: filePath, filename, sizeBytes: stats.size, width, height });
		} catch (error) {
			console.warn(`Could not read ${yellow(filePath)}, skipping: ${errorMessage(error)}`);
			result.unreadable.push({ path: filePath, filename, reason: errorMessage(error) });
		}
	}

	if (order) result.candidates.sort(order);
	return result;
}

/** Builds a candidate for a single file, or null when it is not a readable screenshot */
export async function candidateFromPath(
	filePath: string,
	indicators: readonly string[],
	readDimensions: (filePath: string) => Promise<ImageDimensions> = readImageDimensions,
): Promise<ScreenshotCandidate | null> {
	const filename = path.basename(filePath);
	if (filename.startsWith(".") || !createScreenshotClassifier(indicators)(filename)) {
		return null;
	}
	const stats = await fs.promises.stat(filePath);
	if (!stats.isFile()) return null;
	const { width, height } = await readDimensions(filePath);
	return { path: filePath, filename, sizeBytes: stats.size, width, height };
}
