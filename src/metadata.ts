import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { InvalidImageError, MetadataWriteError, errorMessage } from "./errors";
import { decodeChunks, encodeChunks, readTextEntry, setTextEntry } from "./pngText";

export const DESCRIPTION_KEY = "Description";

/** Embeds and reads back the description tag of an image container */
export interface MetadataWriter {
	embed(imagePath: string, description: string): Promise<void>;
	read(imagePath: string): Promise<string | undefined>;
}

/**
 * Replaces a file's contents through a temporary sibling and a rename, keeping
 * the original permission bits. The target is either fully old or fully new.
 */
export async function replaceFileAtomic(filePath: string, contents: Buffer): Promise<void> {
	const dir = path.dirname(filePath);
	const tempPath = path.join(dir, `.${path.basename(filePath)}.${randomUUID()}.tmp`);
	const { mode } = await fs.promises.stat(filePath);

	try {
		await fs.promises.writeFile(tempPath, contents, { mode });
		await fs.promises.rename(tempPath, filePath);
	} catch (error) {
		await fs.promises.rm(tempPath, { force: true });
		throw error;
	}
}

export class PngMetadataWriter implements MetadataWriter {
	constructor(private readonly key: string = DESCRIPTION_KEY) {}

	async read(imagePath: string): Promise<string | undefined> {
		const buffer = await fs.promises.readFile(imagePath);
		try {
			return readTextEntry(decodeChunks(buffer, imagePath), this.key);
		} catch (error) {
			if (error instanceof InvalidImageError) throw error;
			throw new InvalidImageError(imagePath, errorMessage(error), { cause: error });
		}
	}

	async embed(imagePath: string, description: string): Promise<void> {
		try {
			const buffer = await fs.promises.readFile(imagePath);
			const chunks = setTextEntry(decodeChunks(buffer, imagePath), this.key, description);
			await replaceFileAtomic(imagePath, encodeChunks(chunks));
		} catch (error) {
			throw new MetadataWriteError(imagePath, errorMessage(error), { cause: error });
		}
	}
}
