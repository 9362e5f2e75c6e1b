import { yellow } from "kleur/colors";
import { Ollama } from "ollama";
import { ContentExtractionError, NamingError } from "../errors";
import type { ExtractedContent, ProviderOptions } from "../types";
import { NAMING_SYSTEM_PROMPT, type ProviderPrompts, VisionProvider } from "./VisionProvider";

/**
 * Provider implementation for local Ollama models using the ollama npm package
 */
export class OllamaProvider extends VisionProvider {
	protected readonly label = "Ollama";

	/**
	 * Create a new OllamaProvider
	 * @param opts - Provider options; baseURL is the Ollama host
	 * @param prompts - Description and naming instructions
	 */
	constructor(opts: ProviderOptions, prompts: ProviderPrompts) {
		super(opts, prompts);
		console.log(`Initialized Ollama provider with model ${yellow(this.opts.model)}`);
	}

	// A client per call so each request is bound to its attempt's AbortSignal
	private client(signal?: AbortSignal): Ollama {
		return new Ollama({
			host: this.opts.baseURL,
			fetch: (input, init) => fetch(input, { ...init, signal: signal ?? init?.signal }),
		});
	}

	protected async describe(base64: string, signal?: AbortSignal): Promise<ExtractedContent> {
		const response = await this.client(signal).chat({
			model: this.opts.model,
			messages: [{ role: "user", content: this.prompts.description, images: [base64] }],
			options: { num_predict: this.opts.maxTokens },
			stream: false,
		});

		if (!response.message?.content) {
			throw new ContentExtractionError("MalformedResponse", "Ollama response has no content");
		}

		return {
			description: response.message.content,
			usage: OllamaProvider.usage(response.prompt_eval_count, response.eval_count),
		};
	}

	protected async suggestName(description: string, signal?: AbortSignal): Promise<string> {
		const response = await this.client(signal).chat({
			model: this.opts.namingModel,
			messages: [
				{ role: "system", content: NAMING_SYSTEM_PROMPT },
				{ role: "user", content: this.namingRequest(description) },
			],
			options: { num_predict: this.opts.namingMaxTokens },
			stream: false,
		});

		if (!response.message?.content) {
			throw new NamingError("MalformedResponse", "Ollama naming response has no content");
		}
		return response.message.content;
	}
}
