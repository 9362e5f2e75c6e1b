import path from "node:path";
import { RenameCollisionExhaustedError } from "./errors";
import { pathExists } from "./utils";

export const RENAMED_EXTENSION = ".png";
export const MAX_FILENAME_BYTES = 255;

/** Byte budget for a base name so that `<base>_<max>.png` still fits in one path component */
export function maxBaseNameBytes(maxCollisionAttempts: number): number {
	const suffixBytes = `_${maxCollisionAttempts}`.length;
	return MAX_FILENAME_BYTES - RENAMED_EXTENSION.length - suffixBytes;
}

/** Cuts a string to at most `maxBytes` of UTF-8 without splitting a code point */
export function truncateUtf8(value: string, maxBytes: number): string {
	let out = "";
	let bytes = 0;
	for (const ch of value) {
		const size = Buffer.byteLength(ch, "utf8");
		if (bytes + size > maxBytes) break;
		out += ch;
		bytes += size;
	}
	return out;
}

/**
 * Turns a model's filename suggestion into a safe base name: no quotes around
 * it, no extension, no path separators, control or reserved characters, no
 * leading dots. May return an empty string.
 */
export function sanitizeFileName(raw: string, maxBytes: number): string {
	const cleaned = raw
		.trim()
		.replace(/^["'`]+|["'`]+$/g, "")
		.trim()
		.replace(/\.png$/i, "")
		.replace(/[/\\]/g, "")
		.replace(/[\u0000-\u001f\u007f]/g, "")
		.replace(/[<>:"|?*]/g, "")
		.trim()
		.replace(/^\.+/, "");

	return truncateUtf8(cleaned, maxBytes).trim();
}

/**
 * Finds the first free path among `<base>.png`, `<base>_1.png` … `<base>_<max>.png`.
 * Callers must hold the folder lock until the rename is done.
 */
export async function findAvailablePath(
	folder: string,
	baseName: string,
	maxAttempts: number,
	exists: (p: string) => Promise<boolean> = pathExists,
): Promise<string> {
	for (let attempt = 0; attempt <= maxAttempts; attempt++) {
		const name =
			attempt === 0
				? `${baseName}${RENAMED_EXTENSION}`
				: `${baseName}_${attempt}${RENAMED_EXTENSION}`;
		const candidate = path.join(folder, name);
		if (!(await exists(candidate))) return candidate;
	}
	throw new RenameCollisionExhaustedError(baseName, maxAttempts);
}
