import sharp from "sharp";
import { halveDimension } from "./costEstimator";
import { InvalidImageError, errorMessage } from "./errors";

sharp.cache({ items: 10, memory: 200 });

export type ImageDimensions = {
	width: number;
	height: number;
};

export async function readImageDimensions(filePath: string): Promise<ImageDimensions> {
	let metadata: sharp.Metadata;
	try {
		metadata = await sharp(filePath).metadata();
	} catch (error) {
		throw new InvalidImageError(filePath, errorMessage(error), { cause: error });
	}

	if (!metadata.width || !metadata.height) {
		throw new InvalidImageError(filePath, "unable to read image dimensions");
	}
	return { width: metadata.width, height: metadata.height };
}

/**
 * Re-encodes an image at half its width and height (each at least 1px),
 * matching the halved geometry the cost report prices.
 */
export async function downscaleForSubmission(image: Buffer): Promise<Buffer> {
	const { width, height } = await sharp(image).metadata();
	if (!width || !height) {
		throw new InvalidImageError("<submission>", "unable to read image dimensions");
	}
	return sharp(image)
		.resize(halveDimension(width), halveDimension(height), { fit: "fill" })
		.png()
		.toBuffer();
}
