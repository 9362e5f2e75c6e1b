import path from "node:path";
import { green, yellow } from "kleur/colors";
import { loadConfig } from "../config";
import { type CostTotals, estimateCandidate, summarizeEstimates } from "../costEstimator";
import { writeCostReport } from "../costReport";
import { byPath, scanFolder } from "../scanner";
import type { CostOptions } from "../types";
import { formatTimestamp, resolvePath } from "../utils";

export function formatTotals(totals: CostTotals): string {
	return [
		`Screenshots: ${yellow(String(totals.files))} (${(totals.sizeBytes / 1024 / 1024).toFixed(2)} MB)`,
		`Estimated cost at full size: $${totals.originalCostUsd.toFixed(4)} (${totals.originalTokens} tokens)`,
		`Estimated cost at half size: $${totals.halvedCostUsd.toFixed(4)} (${totals.halvedTokens} tokens)`,
		`Potential savings: ${green(`$${totals.savingsUsd.toFixed(4)}`)}`,
	].join("\n");
}

/**
 * Estimates the cost of describing every screenshot in a folder, offline
 */
export async function costCommand(folder: string, options: CostOptions): Promise<number> {
	const config = await loadConfig(options.config);
	const folderPath = path.resolve(resolvePath(folder) ?? folder);

	const scan = await scanFolder(folderPath, {
		indicators: config.indicators,
		recursive: options.recursive ?? false,
		order: byPath,
	});
	const estimates = scan.candidates.map((candidate) =>
		estimateCandidate(candidate, config.pricing),
	);

	const output = path.resolve(
		resolvePath(options.output) ?? `screenshot_costs_${formatTimestamp(new Date())}.csv`,
	);
	await writeCostReport(output, estimates);

	console.log(formatTotals(summarizeEstimates(estimates)));
	if (scan.unreadable.length > 0) {
		console.warn(yellow(`${scan.unreadable.length} screenshot(s) could not be read and were left out`));
	}
	console.log(`Cost report written to ${yellow(output)}`);
	return 0;
}
