import { z } from "zod";

const providerSchema = z.object({
	baseURL: z.string().url("baseURL must be a valid URL"),
	model: z.string().min(1, "model cannot be empty"),
	namingModel: z.string().min(1, "namingModel cannot be empty"),
	maxTokens: z.number().int().positive(),
	namingMaxTokens: z.number().int().positive(),
});

const retrySchema = z.object({
	attempts: z.number().int().min(1).max(10),
	baseDelayMs: z.number().int().min(0),
	maxDelayMs: z.number().int().min(0),
	timeoutMs: z.number().int().positive(),
});

const pricingSchema = z.object({
	tileSizePx: z.number().int().positive(),
	baseTokens: z.number().int().min(0),
	tileTokens: z.number().int().min(0),
	pricePerMillionTokens: z.number().min(0),
});

export const configSchema = z.object({
	provider: z.enum(["openai", "ollama"]),
	detail: z.enum(["low", "high", "auto"]),
	resize: z.boolean(),
	concurrency: z.number().int().min(1).max(16),
	indicators: z
		.array(z.string().trim().min(1, "indicators cannot contain empty strings"))
		.min(1, "at least one screenshot indicator is required"),
	maxCollisionAttempts: z.number().int().min(1).max(100_000),
	retry: retrySchema,
	pricing: pricingSchema,
	prompts: z.object({
		description: z.string().min(1),
		naming: z.string().min(1),
	}),
	/** Directory for audit logs; null means the processed folder */
	logDir: z.string().min(1).nullable(),
	ollama: providerSchema,
	openai: providerSchema,
});

export type Config = z.infer<typeof configSchema>;
export type ProviderOptions = z.infer<typeof providerSchema>;
export type RetryPolicy = z.infer<typeof retrySchema>;
export type Pricing = z.infer<typeof pricingSchema>;
