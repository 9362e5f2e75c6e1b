import zlib from "node:zlib";
import { InvalidImageError } from "./errors";

/**
 * Minimal PNG container codec: splits a file into chunks and reads or replaces
 * textual entries (tEXt, zTXt, iTXt) without touching image data chunks.
 */

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const TEXT_CHUNK_TYPES = new Set(["tEXt", "zTXt", "iTXt"]);

export type PngChunk = {
	type: string;
	data: Buffer;
};

// CRC-32 (ISO 3309) lookup table, as used by every PNG chunk
const CRC_TABLE = Array.from({ length: 256 }, (_, n) => {
	let c = n;
	for (let k = 0; k < 8; k++) {
		c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
	}
	return c >>> 0;
});

function crc32(parts: readonly Buffer[]): number {
	let crc = 0xffffffff;
	for (const part of parts) {
		for (const byte of part) {
			crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
		}
	}
	return (crc ^ 0xffffffff) >>> 0;
}

function chunkCrc(typeBytes: Buffer, data: Buffer): number {
	return crc32([typeBytes, data]);
}

export function decodeChunks(buffer: Buffer, source = "<buffer>"): PngChunk[] {
	if (buffer.length < PNG_SIGNATURE.length || !buffer.subarray(0, 8).equals(PNG_SIGNATURE)) {
		throw new InvalidImageError(source, "missing PNG signature");
	}

	const chunks: PngChunk[] = [];
	let offset = PNG_SIGNATURE.length;

	while (offset < buffer.length) {
		if (offset + 12 > buffer.length) {
			throw new InvalidImageError(source, `truncated chunk header at byte ${offset}`);
		}
		const length = buffer.readUInt32BE(offset);
		const typeBytes = buffer.subarray(offset + 4, offset + 8);
		const dataEnd = offset + 8 + length;
		if (dataEnd + 4 > buffer.length) {
			throw new InvalidImageError(source, `truncated chunk data at byte ${offset}`);
		}
		const data = buffer.subarray(offset + 8, dataEnd);
		const type = typeBytes.toString("latin1");

		if (buffer.readUInt32BE(dataEnd) !== chunkCrc(typeBytes, data)) {
			throw new InvalidImageError(source, `CRC mismatch in ${type} chunk`);
		}

		chunks.push({ type, data });
		offset = dataEnd + 4;
		if (type === "IEND") break;
	}

	if (chunks[0]?.type !== "IHDR") {
		throw new InvalidImageError(source, "first chunk is not IHDR");
	}
	if (chunks[chunks.length - 1]?.type !== "IEND") {
		throw new InvalidImageError(source, "missing IEND chunk");
	}
	return chunks;
}

export function encodeChunks(chunks: readonly PngChunk[]): Buffer {
	const parts: Buffer[] = [PNG_SIGNATURE];
	for (const chunk of chunks) {
		const header = Buffer.alloc(8);
		header.writeUInt32BE(chunk.data.length, 0);
		const typeBytes = Buffer.from(chunk.type, "latin1");
		typeBytes.copy(header, 4);

		const crc = Buffer.alloc(4);
		crc.writeUInt32BE(chunkCrc(typeBytes, chunk.data), 0);
		parts.push(header, chunk.data, crc);
	}
	return Buffer.concat(parts);
}

type TextEntry = { keyword: string; text: string };

function parseTextChunk(chunk: PngChunk): TextEntry | null {
	const { data } = chunk;
	const keywordEnd = data.indexOf(0);
	if (keywordEnd <= 0) return null;
	const keyword = data.subarray(0, keywordEnd).toString("latin1");

	switch (chunk.type) {
		case "tEXt":
			return { keyword, text: data.subarray(keywordEnd + 1).toString("latin1") };
		case "zTXt": {
			// compression method byte, then a zlib stream of Latin-1 text
			const compressed = data.subarray(keywordEnd + 2);
			return { keyword, text: zlib.inflateSync(compressed).toString("latin1") };
		}
		case "iTXt": {
			const compressed = data[keywordEnd + 1] === 1;
			const languageEnd = data.indexOf(0, keywordEnd + 3);
			if (languageEnd < 0) return null;
			const translatedEnd = data.indexOf(0, languageEnd + 1);
			if (translatedEnd < 0) return null;
			const textBytes = data.subarray(translatedEnd + 1);
			const raw = compressed ? zlib.inflateSync(textBytes) : textBytes;
			return { keyword, text: raw.toString("utf8") };
		}
		default:
			return null;
	}
}

/** Returns the first textual entry stored under `keyword`, if any */
export function readTextEntry(chunks: readonly PngChunk[], keyword: string): string | undefined {
	for (const chunk of chunks) {
		if (!TEXT_CHUNK_TYPES.has(chunk.type)) continue;
		const entry = parseTextChunk(chunk);
		if (entry?.keyword === keyword) return entry.text;
	}
	return undefined;
}

/** Builds an uncompressed iTXt chunk with empty language tag and translated keyword */
export function createITXtChunk(keyword: string, text: string): PngChunk {
	if (keyword.length < 1 || keyword.length > 79) {
		throw new RangeError(`PNG text keyword must be 1-79 characters, got "${keyword}"`);
	}
	const data = Buffer.concat([
		Buffer.from(keyword, "latin1"),
		Buffer.from([0, 0, 0, 0, 0]),
		Buffer.from(text, "utf8"),
	]);
	return { type: "iTXt", data };
}

/**
 * Replaces every text entry named `keyword` with a single iTXt chunk placed
 * before the first IDAT. Other chunks keep their order and bytes.
 */
export function setTextEntry(
	chunks: readonly PngChunk[],
	keyword: string,
	text: string,
): PngChunk[] {
	const kept = chunks.filter((chunk) => {
		if (!TEXT_CHUNK_TYPES.has(chunk.type)) return true;
		return parseTextChunk(chunk)?.keyword !== keyword;
	});

	const idatIndex = kept.findIndex((chunk) => chunk.type === "IDAT");
	const insertAt = idatIndex >= 0 ? idatIndex : kept.length - 1;
	return [...kept.slice(0, insertAt), createITXtChunk(keyword, text), ...kept.slice(insertAt)];
}
