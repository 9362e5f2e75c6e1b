import fs from "node:fs";
import type { CostEstimate } from "./types";
import { toCsvRow } from "./utils";

export const COST_REPORT_COLUMNS = [
	"file_path",
	"width_px",
	"height_px",
	"size_kb",
	"original_tiles",
	"original_tokens",
	"original_cost_usd",
	"halved_width_px",
	"halved_height_px",
	"halved_tiles",
	"halved_tokens",
	"halved_cost_usd",
	"savings_usd",
] as const;

const usd = (value: number) => value.toFixed(6);

export function costReportRow(e: CostEstimate): string[] {
	return [
		e.path,
		String(e.widthPx),
		String(e.heightPx),
		(e.sizeBytes / 1024).toFixed(2),
		String(e.originalTiles),
		String(e.originalTokens),
		usd(e.originalCostUsd),
		String(e.halvedWidthPx),
		String(e.halvedHeightPx),
		String(e.halvedTiles),
		String(e.halvedTokens),
		usd(e.halvedCostUsd),
		usd(e.savingsUsd),
	];
}

export function formatCostReport(estimates: readonly CostEstimate[]): string {
	return [COST_REPORT_COLUMNS, ...estimates.map(costReportRow)].map(toCsvRow).join("");
}

export async function writeCostReport(
	filePath: string,
	estimates: readonly CostEstimate[],
): Promise<void> {
	await fs.promises.writeFile(filePath, formatCostReport(estimates), "utf-8");
}
