import zlib from "node:zlib";
import { describe, expect, it } from "vitest";
import { InvalidImageError } from "../errors";
import {
	PNG_SIGNATURE,
	type PngChunk,
	createITXtChunk,
	decodeChunks,
	encodeChunks,
	readTextEntry,
	setTextEntry,
} from "../pngText";
import { makePng } from "./helpers/png";

function tEXt(keyword: string, text: string): PngChunk {
	return { type: "tEXt", data: Buffer.concat([Buffer.from(`${keyword}\0`, "latin1"), Buffer.from(text, "latin1")]) };
}

function zTXt(keyword: string, text: string): PngChunk {
	return {
		type: "zTXt",
		data: Buffer.concat([
			Buffer.from(`${keyword}\0`, "latin1"),
			Buffer.from([0]),
			zlib.deflateSync(Buffer.from(text, "latin1")),
		]),
	};
}

function compressedITXt(keyword: string, text: string): PngChunk {
	return {
		type: "iTXt",
		data: Buffer.concat([
			Buffer.from(`${keyword}\0`, "latin1"),
			Buffer.from([1, 0]),
			Buffer.from("en\0\0", "latin1"),
			zlib.deflateSync(Buffer.from(text, "utf8")),
		]),
	};
}

describe("decodeChunks", () => {
	it("splits a PNG into its chunks", () => {
		const chunks = decodeChunks(makePng(2, 2));
		expect(chunks.map((c) => c.type)).toEqual(["IHDR", "IDAT", "IEND"]);
		expect(chunks[0]?.data.readUInt32BE(0)).toBe(2);
	});

	it("re-encodes to the identical bytes", () => {
		const png = makePng(3, 1);
		expect(encodeChunks(decodeChunks(png)).equals(png)).toBe(true);
	});

	it("rejects data without the PNG signature", () => {
		expect(() => decodeChunks(Buffer.from("GIF89a"), "a.png")).toThrow(InvalidImageError);
	});

	it("rejects a corrupted chunk", () => {
		const png = makePng(2, 2);
		// flip a byte inside the IHDR payload
		png[PNG_SIGNATURE.length + 8] ^= 0xff;
		expect(() => decodeChunks(png)).toThrow(/CRC mismatch in IHDR/);
	});

	it("rejects a truncated file", () => {
		const png = makePng(2, 2);
		expect(() => decodeChunks(png.subarray(0, png.length - 6))).toThrow(InvalidImageError);
	});

	it("rejects a file whose first chunk is not IHDR", () => {
		const png = encodeChunks([{ type: "IEND", data: Buffer.alloc(0) }]);
		expect(() => decodeChunks(png)).toThrow(/first chunk is not IHDR/);
	});
});

describe("readTextEntry", () => {
	it("reads tEXt, zTXt and compressed iTXt entries", () => {
		const chunks = decodeChunks(
			makePng(1, 1, [
				tEXt("Author", "someone"),
				zTXt("Comment", "zipped text"),
				compressedITXt("Description", "Graphique des ventes"),
			]),
		);
		expect(readTextEntry(chunks, "Author")).toBe("someone");
		expect(readTextEntry(chunks, "Comment")).toBe("zipped text");
		expect(readTextEntry(chunks, "Description")).toBe("Graphique des ventes");
	});

	it("returns undefined when the keyword is absent", () => {
		expect(readTextEntry(decodeChunks(makePng(1, 1)), "Description")).toBeUndefined();
	});
});

describe("createITXtChunk", () => {
	it("stores UTF-8 text uncompressed", () => {
		const chunk = createITXtChunk("Description", "Graph – ÿ");
		expect(chunk.type).toBe("iTXt");
		expect(chunk.data.subarray(0, 12).toString("latin1")).toBe("Description\0");
		expect([...chunk.data.subarray(12, 16)]).toEqual([0, 0, 0, 0]);
		expect(chunk.data.subarray(16).toString("utf8")).toBe("Graph – ÿ");
	});

	it("rejects empty and overlong keywords", () => {
		expect(() => createITXtChunk("", "x")).toThrow(RangeError);
		expect(() => createITXtChunk("k".repeat(80), "x")).toThrow(RangeError);
	});
});

describe("setTextEntry", () => {
	it("inserts the entry before the first IDAT", () => {
		const chunks = setTextEntry(decodeChunks(makePng(1, 1)), "Description", "A chart");
		expect(chunks.map((c) => c.type)).toEqual(["IHDR", "iTXt", "IDAT", "IEND"]);
		expect(readTextEntry(chunks, "Description")).toBe("A chart");
	});

	it("replaces every existing entry with the same keyword and keeps others", () => {
		const original = decodeChunks(
			makePng(1, 1, [tEXt("Description", "old"), tEXt("Author", "someone"), zTXt("Description", "older")]),
		);
		const chunks = setTextEntry(original, "Description", "new");
		expect(chunks.map((c) => c.type)).toEqual(["IHDR", "tEXt", "iTXt", "IDAT", "IEND"]);
		expect(readTextEntry(chunks, "Description")).toBe("new");
		expect(readTextEntry(chunks, "Author")).toBe("someone");
	});

	it("leaves image data untouched", () => {
		const original = decodeChunks(makePng(4, 4));
		const updated = setTextEntry(original, "Description", "A chart");
		const idat = (list: PngChunk[]) => list.find((c) => c.type === "IDAT")?.data;
		expect(idat(updated)?.equals(idat(original) ?? Buffer.alloc(0))).toBe(true);
	});
});
