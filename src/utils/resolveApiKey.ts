import dotenv from "dotenv";
import { ConfigError } from "../errors";

/**
 * Resolves the OpenAI API key from environment variables or .env file.
 * Environment variables take priority over the .env file.
 * @throws ConfigError if no API key is found
 */
export function resolveApiKey(): string {
	// First check if API key is already in environment (e.g., from shell config)
	if (process.env.OPENAI_API_KEY) {
		console.log("Using OpenAI API key from environment variables");
		return process.env.OPENAI_API_KEY;
	}

	// If not found in environment, try to load from .env file
	dotenv.config();

	if (process.env.OPENAI_API_KEY) {
		console.log("Using OpenAI API key from .env file");
		return process.env.OPENAI_API_KEY;
	}

	throw new ConfigError(
		"OPENAI_API_KEY not found. Set it in your shell or create a .env file with OPENAI_API_KEY=your_key",
	);
}
