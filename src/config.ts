// src/config.ts
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { yellow } from "kleur/colors";
import { DEFAULT_SCREENSHOT_INDICATORS } from "./classifier";
import { configSchema } from "./configSchema";
import { ConfigError, errorMessage } from "./errors";
import type { Config } from "./types";
import { deepMerge, isObject, resolvePath } from "./utils";

// Application default configuration. There is deliberately no default folder:
// the folder to process is always given on the command line.
export const appDefaults: Config = {
	provider: "openai",
	detail: "low",
	resize: false,
	concurrency: 1,
	indicators: [...DEFAULT_SCREENSHOT_INDICATORS],
	maxCollisionAttempts: 1000,
	retry: {
		attempts: 3,
		baseDelayMs: 1000,
		maxDelayMs: 10_000,
		timeoutMs: 60_000,
	},
	pricing: {
		tileSizePx: 512,
		baseTokens: 2833,
		tileTokens: 5667,
		pricePerMillionTokens: 0.15,
	},
	prompts: {
		description: "Describe the content of this image concisely.",
		naming: `Generate a concise filename (without extension) for an image with this content.
Use lowercase words separated by underscores and reply with the filename only.`,
	},
	logDir: null,
	ollama: {
		baseURL: "http://localhost:11434",
		model: "llava",
		namingModel: "llama3.2",
		maxTokens: 300,
		namingMaxTokens: 30,
	},
	openai: {
		baseURL: "https://api.openai.com/v1",
		model: "gpt-4o-mini",
		namingModel: "gpt-4o-mini",
		maxTokens: 300,
		namingMaxTokens: 30,
	},
};

export function defaultConfigPath(): string {
	const moduleDir = path.dirname(fileURLToPath(import.meta.url));
	return path.resolve(moduleDir, "../user.config.json");
}

// Load the user configuration file. A missing default file is fine; a missing
// explicitly requested file or a malformed one is a configuration error.
export async function loadUserConfig(
	configPath?: string,
): Promise<Record<string, unknown>> {
	const explicit = configPath !== undefined;
	const filePath = resolvePath(configPath) ?? defaultConfigPath();

	let fileContent: string;
	try {
		fileContent = await fs.promises.readFile(filePath, "utf-8");
	} catch (error) {
		if (
			!explicit &&
			error instanceof Error &&
			"code" in error &&
			error.code === "ENOENT"
		) {
			return {};
		}
		throw new ConfigError(
			`Cannot read config file ${filePath}: ${errorMessage(error)}`,
			{ cause: error },
		);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(fileContent);
	} catch (error) {
		throw new ConfigError(
			`Config file ${filePath} is not valid JSON: ${errorMessage(error)}`,
			{ cause: error },
		);
	}
	if (!isObject(parsed)) {
		throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
	}

	console.log(`Using configuration from ${yellow(filePath)}`);
	return parsed;
}

/** Validates a merged configuration object, listing every problem at once */
export function parseConfig(raw: Record<string, unknown>): Config {
	const result = configSchema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("\n");
		throw new ConfigError(`Invalid configuration:\n${issues}`);
	}
	return result.data;
}

// Function to load and process configuration: defaults < user config file < CLI overrides
export async function loadConfig(
	configPath?: string,
	overrides: Record<string, unknown> = {},
): Promise<Config> {
	const userConfig = await loadUserConfig(configPath);
	const merged = deepMerge(deepMerge(appDefaults, userConfig), overrides);
	const config = parseConfig(merged);

	return {
		...config,
		logDir: resolvePath(config.logDir),
	};
}
