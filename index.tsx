#!/usr/bin/env tsx
import "dotenv/config";

import { cac } from "cac";
import { render } from "ink";
import {
	ConfigError,
	parseCliOptions,
	resolveConfig,
	validateEnv,
	type BenchmarkConfig,
} from "./config.ts";
import {
	CATEGORY_DIRECTORY,
	DEFAULT_BATCH_SIZE,
	DEFAULT_MAX_RETRIES,
	DEFAULT_MAX_TOKENS,
	DEFAULT_NUM_DEBUG_SAMPLES,
	DEFAULT_TEMPERATURE,
	DEFAULT_TIMEOUT_SECONDS,
	OUTPUT_DIRECTORY,
} from "./constants.ts";
import { loadDataset } from "./dataset.ts";
import { evaluateResults, formatCategoryTable } from "./evaluate.ts";
import { createBenchmarkModel, createModelInvoker } from "./models.ts";
import { resultPathFor, saveResults } from "./persistence.ts";
import { buildQuestionItems } from "./questions.ts";
import { BenchmarkApp } from "./react-ui.tsx";
import { BenchmarkRunner, type BatchReport } from "./runner.ts";
import { formatTimespan } from "./utils.ts";

const PREVIEW_IDS = 5;

function describeBatch(report: BatchReport): string {
	const ids = report.itemIds.slice(0, PREVIEW_IDS).join(", ");
	const more = report.itemIds.length > PREVIEW_IDS ? ", ..." : "";
	return `batch ${report.batchIndex + 1}/${report.totalBatches} [${ids}${more}]`;
}

function logBatchOutcome(report: BatchReport): void {
	switch (report.outcome) {
		case "success":
			return;
		case "rate-limit-exhausted":
			console.error(
				`[ERROR] Max retries reached for ${describeBatch(report)}. Skipping to next batch.`,
			);
			return;
		case "bad-request":
			console.error(
				`[ERROR] Bad request: ${report.error}. Skipping ${describeBatch(report)}.`,
			);
			return;
		case "failed":
			console.error(`[ERROR] Error in ${describeBatch(report)}: ${report.error}`);
			return;
	}
}

async function printEvaluation(csvPath: string, categoryDir: string): Promise<void> {
	console.log(`[INFO] ====== [START] Evaluation - CSV_PATH: ${csvPath} =====`);
	const report = await evaluateResults(csvPath, categoryDir);
	console.log("");
	console.log(formatCategoryTable(report.categories, report.total));
	console.log("");
	console.log("[INFO] ====== [DONE] Evaluation =====");
}

async function runBenchmark(config: BenchmarkConfig): Promise<void> {
	const records = await loadDataset({
		path: config.dataset,
		limit: config.isDebug ? config.numDebugSamples : undefined,
	});
	console.log(`[INFO] Loaded ${records.length} records`);

	const step = Math.max(1, Math.floor(records.length / 10));
	const items = buildQuestionItems(records, (done, total) => {
		if (done % step === 0 || done === total) {
			console.log(`[INFO] Preparing questions: ${done}/${total}`);
		}
	});

	const model = createBenchmarkModel(config.modelName, config.apiKey);
	const runner = new BenchmarkRunner({
		invoke: createModelInvoker(model, {
			maxTokens: config.maxTokens,
			temperature: config.temperature,
			timeoutSeconds: config.timeoutSeconds,
		}),
		batchSize: config.batchSize,
		maxRetries: config.maxRetries,
		delayIncrementMs: config.delayIncrementMs,
	});

	runner.on("batch:retry", ({ message, delayMs }) => {
		console.warn(`[WARN] ${message}. Retrying in ${delayMs / 1000} seconds...`);
	});
	runner.on("batch:complete", logBatchOutcome);

	console.log("[INFO] ====== [START] Generate answers to questions given by LLM. =====");

	const ui = render(
		<BenchmarkApp
			runner={runner}
			modelName={model.name}
			totalItems={items.length}
			batchSize={config.batchSize}
			maxRetries={config.maxRetries}
		/>,
	);

	// Allow UI to mount and attach listeners
	await new Promise((resolve) => setTimeout(resolve, 100));

	const startTime = Date.now();
	const results = await runner.run(items);

	// Wait a moment for UI to update with final state
	await new Promise((resolve) => setTimeout(resolve, 200));
	ui.unmount();

	console.log(
		`[INFO] ===== [DONE] Generating answers took ${formatTimespan((Date.now() - startTime) / 1000)}`,
	);

	const csvPath = await saveResults(
		resultPathFor(config.outputDir, config.modelName),
		results,
	);
	console.log(`[OK] ${results.length} result rows written to ${csvPath}`);

	await printEvaluation(csvPath, config.categoryDir);
}

async function main() {
	const cli = cac("click-bench");

	cli
		.command("[...args]", "Run the multiple-choice benchmark")
		.option("--is_debug", "Only run the first --num_debug_samples questions")
		.option("--num_debug_samples <n>", "Number of questions in debug mode", {
			default: DEFAULT_NUM_DEBUG_SAMPLES,
		})
		.option("--batch_size <n>", "Questions per batch (also the request concurrency)", {
			default: DEFAULT_BATCH_SIZE,
		})
		.option("--max_retries <n>", "Rate-limit retries per batch", {
			default: DEFAULT_MAX_RETRIES,
		})
		.option("--max_tokens <n>", "Max tokens per response", {
			default: DEFAULT_MAX_TOKENS,
		})
		.option("--temperature <t>", "Sampling temperature", {
			default: DEFAULT_TEMPERATURE,
		})
		.option("--timeout <seconds>", "Timeout in seconds for each request", {
			default: DEFAULT_TIMEOUT_SECONDS,
		})
		.option("--model <id>", "OpenRouter model id (overrides MODEL_NAME)")
		.option("--dataset <path>", "Local JSON/JSONL file or directory instead of the Hugging Face dataset")
		.option("--category_dir <path>", "Root of the per-category metadata directories", {
			default: CATEGORY_DIRECTORY,
		})
		.option("--output_dir <path>", "Directory for the result table", {
			default: OUTPUT_DIRECTORY,
		})
		.option("--evaluate_only <csv>", "Only evaluate an existing result table")
		.action(async (_args: string[], options: Record<string, unknown>) => {
			try {
				const cliOptions = parseCliOptions(options);

				if (cliOptions.evaluateOnly) {
					await printEvaluation(cliOptions.evaluateOnly, cliOptions.categoryDir);
					return;
				}

				const env = validateEnv(process.env);
				await runBenchmark(resolveConfig(env, cliOptions));
			} catch (error) {
				const prefix = error instanceof ConfigError ? "[ERROR] Configuration:" : "[ERROR]";
				console.error(
					prefix,
					error instanceof Error ? error.message : String(error),
				);
				process.exit(1);
			}
		});

	cli.help();
	cli.version("0.1.0");

	cli.parse(process.argv, { run: false });
	await cli.runMatchedCommand();
}

main().catch((error) => {
	console.error("[ERROR]", error instanceof Error ? error.message : String(error));
	process.exit(1);
});
