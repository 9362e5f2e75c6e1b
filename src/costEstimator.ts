import { InvalidDimensionError } from "./errors";
import type { CostEstimate, Pricing, ScreenshotCandidate, TileEstimate } from "./types";

// gpt-4o-mini image pricing: fixed base tokens plus a per-512px-tile charge
export const TILE_SIZE_PX = 512;
export const BASE_TOKENS = 2833;
export const TILE_TOKENS = 5667;
export const PRICE_PER_MILLION_TOKENS = 0.15;

export const DEFAULT_PRICING: Pricing = {
	tileSizePx: TILE_SIZE_PX,
	baseTokens: BASE_TOKENS,
	tileTokens: TILE_TOKENS,
	pricePerMillionTokens: PRICE_PER_MILLION_TOKENS,
};

export type CostTotals = {
	files: number;
	sizeBytes: number;
	originalTokens: number;
	originalCostUsd: number;
	halvedTokens: number;
	halvedCostUsd: number;
	savingsUsd: number;
};

function isValidDimension(px: number): boolean {
	return Number.isFinite(px) && px > 0;
}

export function estimate(
	width: number,
	height: number,
	pricing: Pricing = DEFAULT_PRICING,
): TileEstimate {
	if (!isValidDimension(width) || !isValidDimension(height)) {
		throw new InvalidDimensionError(width, height);
	}

	const tilesX = Math.ceil(width / pricing.tileSizePx);
	const tilesY = Math.ceil(height / pricing.tileSizePx);
	const tiles = tilesX * tilesY;
	const tokens = pricing.baseTokens + pricing.tileTokens * tiles;
	const costUsd = (tokens / 1_000_000) * pricing.pricePerMillionTokens;

	return { tiles, tokens, costUsd };
}

/** Half of a dimension, never below one pixel */
export function halveDimension(px: number): number {
	return Math.max(1, Math.floor(px / 2));
}

export function estimateCandidate(
	candidate: ScreenshotCandidate,
	pricing: Pricing = DEFAULT_PRICING,
): CostEstimate {
	const original = estimate(candidate.width, candidate.height, pricing);
	const halvedWidthPx = halveDimension(candidate.width);
	const halvedHeightPx = halveDimension(candidate.height);
	const halved = estimate(halvedWidthPx, halvedHeightPx, pricing);

	return {
		path: candidate.path,
		widthPx: candidate.width,
		heightPx: candidate.height,
		sizeBytes: candidate.sizeBytes,
		originalTiles: original.tiles,
		originalTokens: original.tokens,
		originalCostUsd: original.costUsd,
		halvedWidthPx,
		halvedHeightPx,
		halvedTiles: halved.tiles,
		halvedTokens: halved.tokens,
		halvedCostUsd: halved.costUsd,
		savingsUsd: original.costUsd - halved.costUsd,
	};
}

export function summarizeEstimates(estimates: readonly CostEstimate[]): CostTotals {
	const totals: CostTotals = {
		files: 0,
		sizeBytes: 0,
		originalTokens: 0,
		originalCostUsd: 0,
		halvedTokens: 0,
		halvedCostUsd: 0,
		savingsUsd: 0,
	};

	for (const e of estimates) {
		totals.files++;
		totals.sizeBytes += e.sizeBytes;
		totals.originalTokens += e.originalTokens;
		totals.originalCostUsd += e.originalCostUsd;
		totals.halvedTokens += e.halvedTokens;
		totals.halvedCostUsd += e.halvedCostUsd;
		totals.savingsUsd += e.savingsUsd;
	}

	return totals;
}
