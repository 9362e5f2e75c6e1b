import { yellow } from "kleur/colors";
import OpenAI from "openai";
import { ContentExtractionError, NamingError } from "../errors";
import type { Config, ExtractedContent, ProviderOptions } from "../types";
import { NAMING_SYSTEM_PROMPT, type ProviderPrompts, VisionProvider } from "./VisionProvider";

/**
 * Provider implementation using OpenAI chat completions with image input
 */
export class OpenAIProvider extends VisionProvider {
	protected readonly label = "OpenAI";
	private client: OpenAI;

	/**
	 * Create a new OpenAIProvider
	 * @param opts - Provider options (model, baseURL, token limits)
	 * @param prompts - Description and naming instructions
	 * @param apiKey - OpenAI API key
	 * @param detail - Image detail level for analysis
	 */
	constructor(
		opts: ProviderOptions,
		prompts: ProviderPrompts,
		apiKey: string,
		private readonly detail: Config["detail"],
	) {
		super(opts, prompts);
		// retries are handled by callWithRetry
		this.client = new OpenAI({ baseURL: opts.baseURL, apiKey, maxRetries: 0 });
		console.log(`Initialized OpenAI provider with model ${yellow(this.opts.model)}`);
	}

	protected async describe(base64: string, signal?: AbortSignal): Promise<ExtractedContent> {
		const response = await this.client.chat.completions.create(
			{
				model: this.opts.model,
				messages: [
					{
						role: "user",
						content: [
							{ type: "text", text: this.prompts.description },
							{
								type: "image_url",
								image_url: {
									url: `data:image/png;base64,${base64}`,
									detail: this.detail,
								},
							},
						],
					},
				],
				max_tokens: this.opts.maxTokens,
			},
			{ signal },
		);

		const content = response.choices[0]?.message.content;
		if (!content) {
			throw new ContentExtractionError("MalformedResponse", "OpenAI response has no content");
		}

		return {
			description: content,
			usage: {
				promptTokens: response.usage?.prompt_tokens ?? 0,
				completionTokens: response.usage?.completion_tokens ?? 0,
				totalTokens: response.usage?.total_tokens ?? 0,
			},
		};
	}

	protected async suggestName(description: string, signal?: AbortSignal): Promise<string> {
		const response = await this.client.chat.completions.create(
			{
				model: this.opts.namingModel,
				messages: [
					{ role: "system", content: NAMING_SYSTEM_PROMPT },
					{ role: "user", content: this.namingRequest(description) },
				],
				max_tokens: this.opts.namingMaxTokens,
			},
			{ signal },
		);

		const content = response.choices[0]?.message.content;
		if (!content) {
			throw new NamingError("MalformedResponse", "OpenAI naming response has no content");
		}
		return content;
	}
}
