import { z } from 'zod';
import { numberFromString } from '../../utils/schema.js';

export const SUPPORTED_PROVIDERS = ['openai'] as const;

export const LLMConfigSchema = z
	.object({
		provider: z
			.string()
			.nonempty()
			.default('openai')
			.describe("The LLM provider. Any OpenAI-compatible endpoint works through 'openai' and baseURL"),
		model: z
			.string()
			.nonempty()
			.default('gpt-4o')
			.describe('Model used by the reasoning agent'),
		chatModel: z
			.string()
			.nonempty()
			.default('gpt-4o-mini')
			.describe('Model used for plain chat turns'),
		apiKey: z
			.string()
			.optional()
			.describe('API key for the provider (can be set via environment variables using $VAR syntax)'),
		baseURL: z.string().url().optional().describe('Base URL of an OpenAI-compatible API'),
		temperature: numberFromString(z.number().min(0).max(2)).default(0.1),
		maxIterations: numberFromString(z.number().int().positive())
			.default(10)
			.describe('Maximum number of tool-calling rounds per agent turn'),
	})
	.strict()
	.superRefine((data, ctx) => {
		const providerLower = data.provider.toLowerCase();
		if (!SUPPORTED_PROVIDERS.some(provider => provider === providerLower)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['provider'],
				message: `Provider '${data.provider}' is not supported. Supported: ${SUPPORTED_PROVIDERS.join(', ')}`,
			});
		}
	});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type LLMConfigInput = z.input<typeof LLMConfigSchema>;
