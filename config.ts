import { z } from "zod";
import {
	CATEGORY_DIRECTORY,
	DEFAULT_BATCH_SIZE,
	DEFAULT_MAX_RETRIES,
	DEFAULT_MAX_TOKENS,
	DEFAULT_MODEL_NAME,
	DEFAULT_NUM_DEBUG_SAMPLES,
	DEFAULT_TEMPERATURE,
	DEFAULT_TIMEOUT_SECONDS,
	OUTPUT_DIRECTORY,
	RETRY_DELAY_INCREMENT_SECONDS,
} from "./constants.ts";

export class ConfigError extends Error {
	override name = "ConfigError";
}

const EnvSchema = z.object({
	OPENROUTER_API_KEY: z
		.string({ required_error: "OPENROUTER_API_KEY is required" })
		.min(1, "OPENROUTER_API_KEY is required")
		.refine((key: string) => key.startsWith("sk-"), {
			message: "OPENROUTER_API_KEY should start with 'sk-'",
		}),
	MODEL_NAME: z.string().min(1).default(DEFAULT_MODEL_NAME),
});

export type Env = z.infer<typeof EnvSchema>;

// cac yields `true` for a bare flag; an explicit "false" should still mean false.
const FlagSchema = z
	.union([z.boolean(), z.enum(["true", "false"]).transform((v) => v === "true")])
	.default(false);

/**
 * CLI options schema
 */
export const CLIOptionsSchema = z.object({
	isDebug: FlagSchema,
	numDebugSamples: z.coerce.number().int().positive().default(DEFAULT_NUM_DEBUG_SAMPLES),
	batchSize: z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE),
	maxRetries: z.coerce.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
	maxTokens: z.coerce.number().int().positive().default(DEFAULT_MAX_TOKENS),
	temperature: z.coerce.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
	timeout: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_SECONDS),
	model: z.string().optional(),
	dataset: z.string().optional(),
	categoryDir: z.string().default(CATEGORY_DIRECTORY),
	outputDir: z.string().default(OUTPUT_DIRECTORY),
	evaluateOnly: z.string().optional(),
});

export type CLIOptions = z.infer<typeof CLIOptionsSchema>;

/**
 * Everything a run needs, resolved once at startup
 */
export type BenchmarkConfig = Omit<CLIOptions, "model" | "timeout"> & {
	apiKey: string;
	modelName: string;
	timeoutSeconds: number;
	delayIncrementMs: number;
};

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ");
}

export function validateEnv(env: Record<string, string | undefined>): Env {
	const result = EnvSchema.safeParse(env);
	if (!result.success) {
		throw new ConfigError(
			`Environment configuration error: ${formatIssues(result.error)}`,
		);
	}
	return result.data;
}

/**
 * Maps cac's raw option bag (snake_case flags) onto the validated option set
 */
export function parseCliOptions(options: Record<string, unknown>): CLIOptions {
	const result = CLIOptionsSchema.safeParse({
		isDebug: options.is_debug,
		numDebugSamples: options.num_debug_samples,
		batchSize: options.batch_size,
		maxRetries: options.max_retries,
		maxTokens: options.max_tokens,
		temperature: options.temperature,
		timeout: options.timeout,
		model: options.model,
		dataset: options.dataset,
		categoryDir: options.category_dir,
		outputDir: options.output_dir,
		evaluateOnly: options.evaluate_only,
	});
	if (!result.success) {
		throw new ConfigError(`Invalid options: ${formatIssues(result.error)}`);
	}
	return result.data;
}

export function resolveConfig(env: Env, options: CLIOptions): BenchmarkConfig {
	const { model, timeout, ...rest } = options;
	return {
		...rest,
		apiKey: env.OPENROUTER_API_KEY,
		modelName: model ?? env.MODEL_NAME,
		timeoutSeconds: timeout,
		delayIncrementMs: RETRY_DELAY_INCREMENT_SECONDS * 1000,
	};
}
