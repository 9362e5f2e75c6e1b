import type { Config } from "./configSchema";

export type { Config, Pricing, ProviderOptions, RetryPolicy } from "./configSchema";

export type ProviderName = Config["provider"];

/** CLI options for the `rename` command, layered over the config file */
export type RenameOptions = {
	/** API provider */
	provider?: ProviderName;
	/** image resolution used for inference */
	detail?: Config["detail"];
	/** downscale images to half size before submission */
	resize?: boolean;
	/** number of screenshots processed in parallel */
	concurrency?: number;
	/** total attempts per external call */
	retries?: number;
	/** directory the audit log is written to (defaults to the processed folder) */
	logDir?: string;
	/** process candidates in lexicographic order instead of listing order */
	sort?: boolean;
	/** keep watching the folder for new screenshots */
	watch?: boolean;
	/** path to a user config file */
	config?: string;
};

export type CostOptions = {
	recursive?: boolean;
	output?: string;
	config?: string;
};

/** Read-only view of a file considered for processing */
export type ScreenshotCandidate = {
	path: string;
	filename: string;
	sizeBytes: number;
	width: number;
	height: number;
};

export type TokenUsage = {
	promptTokens: number;
	completionTokens: number;
	totalTokens: number;
};

export type ExtractedContent = {
	description: string;
	usage: TokenUsage;
};

export type TransactionState =
	| "Pending"
	| "ContentExtracted"
	| "Named"
	| "MetadataEmbedded"
	| "Renamed";

export type FailureStage =
	| "Read"
	| "ContentExtraction"
	| "Naming"
	| "MetadataEmbed"
	| "Rename";

/** Error classes reported by the content and naming services */
export type ServiceErrorKind =
	| "Network"
	| "Quota"
	| "Timeout"
	| "Rejected"
	| "MalformedResponse";

export type ErrorKind =
	| ServiceErrorKind
	| "MetadataWriteError"
	| "RenameCollisionExhausted"
	| "FilesystemError"
	| "InvalidImage"
	| "Cancelled";

export type ProcessingStatus = "Success" | "Skipped" | "Failed";

export type ProcessingResult = {
	originalPath: string;
	newPath?: string;
	description?: string;
	promptTokens?: number;
	totalTokens?: number;
	status: ProcessingStatus;
	failureStage?: FailureStage;
	errorKind?: ErrorKind;
	errorMessage?: string;
};

export type TileEstimate = {
	tiles: number;
	tokens: number;
	costUsd: number;
};

export type CostEstimate = {
	path: string;
	widthPx: number;
	heightPx: number;
	sizeBytes: number;
	originalTiles: number;
	originalTokens: number;
	originalCostUsd: number;
	halvedWidthPx: number;
	halvedHeightPx: number;
	halvedTiles: number;
	halvedTokens: number;
	halvedCostUsd: number;
	savingsUsd: number;
};

export type ProcessingCounts = Record<ProcessingStatus, number>;
