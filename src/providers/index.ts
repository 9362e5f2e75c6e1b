import type { Config } from "../types";
import { resolveApiKey } from "../utils/resolveApiKey";
import { OllamaProvider } from "./OllamaProvider";
import { OpenAIProvider } from "./OpenAIProvider";
import type { VisionProvider } from "./VisionProvider";

/**
 * Builds the configured provider. Missing credentials fail here, before any
 * file is looked at.
 */
export function initializeProvider(config: Config): VisionProvider {
	switch (config.provider) {
		case "openai":
			return new OpenAIProvider(config.openai, config.prompts, resolveApiKey(), config.detail);
		case "ollama":
			return new OllamaProvider(config.ollama, config.prompts);
	}
}
