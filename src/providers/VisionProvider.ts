import { yellow } from "kleur/colors";
import {
	ContentExtractionError,
	InvalidImageError,
	NamingError,
	errorMessage,
} from "../errors";
import { downscaleForSubmission } from "../image";
import type { ExtractedContent, ProviderOptions, ServiceErrorKind, TokenUsage } from "../types";

export type ExtractOptions = {
	/** downscale to half width and height before submission */
	resize: boolean;
};

/** Image bytes → description and token usage */
export interface ContentExtractionAdapter {
	extractContent(
		image: Buffer,
		options: ExtractOptions,
		signal?: AbortSignal,
	): Promise<ExtractedContent>;
}

/** Description → raw filename suggestion, without extension */
export interface NamingEngine {
	generateName(description: string, signal?: AbortSignal): Promise<string>;
}

export type ProviderPrompts = {
	/** instruction sent along with the image */
	description: string;
	/** instruction for turning a description into a filename */
	naming: string;
};

export const NAMING_SYSTEM_PROMPT =
	"You are a helpful assistant that generates concise, descriptive filenames based on image content.";

function statusOf(error: unknown): number | undefined {
	if (typeof error !== "object" || error === null) return undefined;
	if ("status" in error && typeof error.status === "number") return error.status;
	// ollama's ResponseError
	if ("status_code" in error && typeof error.status_code === "number") {
		return error.status_code;
	}
	return undefined;
}

/**
 * Maps anything a provider client throws onto the service error kinds.
 * Connection failures carry no HTTP status and count as Network.
 */
export function classifyServiceError(error: unknown): ServiceErrorKind {
	if (error instanceof ContentExtractionError || error instanceof NamingError) {
		return error.kind;
	}
	if (error instanceof InvalidImageError) return "Rejected";
	if (error instanceof Error && error.name === "AbortError") return "Timeout";
	if (error instanceof SyntaxError) return "MalformedResponse";

	const status = statusOf(error);
	if (status === undefined) return "Network";
	if (status === 429) return "Quota";
	if (status === 408 || status === 409 || status >= 500) return "Network";
	return "Rejected";
}

export function toContentExtractionError(error: unknown): ContentExtractionError {
	if (error instanceof ContentExtractionError) return error;
	return new ContentExtractionError(classifyServiceError(error), errorMessage(error), {
		cause: error,
	});
}

export function toNamingError(error: unknown): NamingError {
	if (error instanceof NamingError) return error;
	return new NamingError(classifyServiceError(error), errorMessage(error), { cause: error });
}

/**
 * Shared behaviour for vision-capable chat providers: resizing, reply
 * validation and error normalization. Subclasses only talk to their client.
 */
export abstract class VisionProvider implements ContentExtractionAdapter, NamingEngine {
	protected abstract readonly label: string;

	constructor(
		protected readonly opts: ProviderOptions,
		protected readonly prompts: ProviderPrompts,
	) {}

	/**
	 * Ask the model to describe a base64-encoded PNG
	 */
	protected abstract describe(base64: string, signal?: AbortSignal): Promise<ExtractedContent>;

	/**
	 * Ask the model for a filename matching a description
	 */
	protected abstract suggestName(description: string, signal?: AbortSignal): Promise<string>;

	async extractContent(
		image: Buffer,
		options: ExtractOptions,
		signal?: AbortSignal,
	): Promise<ExtractedContent> {
		try {
			const payload = options.resize ? await downscaleForSubmission(image) : image;
			console.log(`Describing image with ${yellow(this.opts.model)}`);
			const { description, usage } = await this.describe(payload.toString("base64"), signal);

			const trimmed = description.trim();
			if (!trimmed) {
				throw new ContentExtractionError(
					"MalformedResponse",
					`${this.label} returned an empty description`,
				);
			}
			return { description: trimmed, usage };
		} catch (error) {
			throw toContentExtractionError(error);
		}
	}

	async generateName(description: string, signal?: AbortSignal): Promise<string> {
		try {
			console.log(`Generating filename with ${yellow(this.opts.namingModel)}`);
			const suggestion = (await this.suggestName(description, signal)).trim();
			if (!suggestion) {
				throw new NamingError("MalformedResponse", `${this.label} returned an empty filename`);
			}
			return suggestion;
		} catch (error) {
			throw toNamingError(error);
		}
	}

	protected static usage(promptTokens = 0, completionTokens = 0): TokenUsage {
		return {
			promptTokens,
			completionTokens,
			totalTokens: promptTokens + completionTokens,
		};
	}

	protected namingRequest(description: string): string {
		return `${this.prompts.naming}\n\nImage content: ${description}`;
	}
}
