import fs from "node:fs";
import os from "node:os";

// Helper function: Resolve tilde (~) in paths
export function resolvePath(p: string | null | undefined): string | null {
	if (!p) return null;
	return p.replace(/^~/, os.homedir());
}

// Helper function: Deep merge two objects. Arrays and scalars from source replace target values.
export function deepMerge(
	target: Record<string, unknown>,
	source: Record<string, unknown>,
): Record<string, unknown> {
	const output: Record<string, unknown> = { ...target };
	for (const key of Object.keys(source)) {
		const sourceValue = source[key];
		if (sourceValue === undefined) continue;

		const targetValue = output[key];
		output[key] =
			isObject(sourceValue) && isObject(targetValue)
				? deepMerge(targetValue, sourceValue)
				: sourceValue;
	}
	return output;
}

// Helper function: Check if an item is an object
export function isObject(item: unknown): item is Record<string, unknown> {
	return Boolean(item && typeof item === "object" && !Array.isArray(item));
}

/**
 * Checks whether anything (file, directory, dangling symlink) exists at a path.
 * Errors other than ENOENT are rethrown.
 */
export async function pathExists(p: string): Promise<boolean> {
	try {
		await fs.promises.lstat(p);
		return true;
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			return false;
		}
		throw error;
	}
}

type CsvValue = string | number | undefined;

function escapeCsvField(value: CsvValue): string {
	if (value === undefined) return "";
	const text = String(value);
	if (/[",\r\n]/.test(text)) {
		return `"${text.replace(/"/g, '""')}"`;
	}
	return text;
}

/** Formats one CSV line (with trailing newline) */
export function toCsvRow(values: readonly CsvValue[]): string {
	return `${values.map(escapeCsvField).join(",")}\n`;
}

/** Local time as YYYYMMDD_HHMMSS, used in report file names */
export function formatTimestamp(date: Date): string {
	const pad = (n: number) => String(n).padStart(2, "0");
	return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(
		date.getHours(),
	)}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}
