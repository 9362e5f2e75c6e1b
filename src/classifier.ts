export const DEFAULT_SCREENSHOT_INDICATORS = [
	"screenshot",
	"screen_shot",
	"screenclip",
	"capture",
	"snip",
] as const;

const SCREENSHOT_EXTENSION = ".png";

/** Lower-cases a filename and removes every whitespace character */
export function normalizeFileName(filename: string): string {
	return filename.toLowerCase().replace(/\s+/g, "");
}

/**
 * Builds a screenshot predicate for a set of indicator substrings.
 * Indicators are normalized like filenames, so "Screen Shot" matches "screenshot".
 */
export function createScreenshotClassifier(
	indicators: readonly string[] = DEFAULT_SCREENSHOT_INDICATORS,
): (filename: string) => boolean {
	const normalized = indicators.map(normalizeFileName).filter((i) => i !== "");

	return (filename: string) => {
		const name = normalizeFileName(filename);
		if (!name.endsWith(SCREENSHOT_EXTENSION)) return false;
		return normalized.some((indicator) => name.includes(indicator));
	};
}

export function isScreenshot(
	filename: string,
	indicators: readonly string[] = DEFAULT_SCREENSHOT_INDICATORS,
): boolean {
	return createScreenshotClassifier(indicators)(filename);
}
