import { EventEmitter } from "events";
import { parseResponse } from "./parser.ts";
import type {
	InvocationResult,
	ModelInvoker,
	QuestionItem,
	ResultRecord,
} from "./types.ts";
import { chunk, sleep as defaultSleep } from "./utils.ts";

export type BatchOutcome =
	| "success"
	| "rate-limit-exhausted"
	| "bad-request"
	| "failed";

export type BatchReport = {
	batchIndex: number;
	totalBatches: number;
	size: number;
	outcome: BatchOutcome;
	retries: number;
	records: ResultRecord[];
	/** Items of this batch that produced no record */
	dropped: number;
	itemIds: string[];
	error?: string;
};

export type RunnerEvents = {
	"benchmark:start": {
		totalItems: number;
		totalBatches: number;
		batchSize: number;
	};
	"batch:start": { batchIndex: number; totalBatches: number; size: number };
	/** Emitted before every request round of a batch, retries included */
	"batch:attempt": { batchIndex: number; totalBatches: number; retries: number };
	"batch:retry": {
		batchIndex: number;
		totalBatches: number;
		retries: number;
		delayMs: number;
		message: string;
	};
	"batch:complete": BatchReport;
	"benchmark:complete": {
		results: ResultRecord[];
		dropped: number;
		durationMs: number;
	};
};

export type RunnerConfig = {
	invoke: ModelInvoker;
	batchSize: number;
	maxRetries: number;
	delayIncrementMs: number;
	sleep?: (ms: number) => Promise<void>;
};

export class BenchmarkRunner extends EventEmitter {
	private invoke: ModelInvoker;
	private batchSize: number;
	private maxRetries: number;
	private delayIncrementMs: number;
	private sleep: (ms: number) => Promise<void>;

	constructor(config: RunnerConfig) {
		super();
		if (!Number.isInteger(config.batchSize) || config.batchSize < 1) {
			throw new Error(`batchSize must be a positive integer, got ${config.batchSize}`);
		}
		if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
			throw new Error(`maxRetries must be a non-negative integer, got ${config.maxRetries}`);
		}
		this.invoke = config.invoke;
		this.batchSize = config.batchSize;
		this.maxRetries = config.maxRetries;
		this.delayIncrementMs = config.delayIncrementMs;
		this.sleep = config.sleep ?? defaultSleep;
	}

	override emit<K extends keyof RunnerEvents>(
		event: K,
		payload: RunnerEvents[K],
	): boolean {
		return super.emit(event, payload);
	}

	override on<K extends keyof RunnerEvents>(
		event: K,
		listener: (payload: RunnerEvents[K]) => void,
	): this {
		return super.on(event, listener as (...args: unknown[]) => void);
	}

	async run(items: readonly QuestionItem[]): Promise<ResultRecord[]> {
		const startTime = Date.now();
		const batches = chunk(items, this.batchSize);
		const results: ResultRecord[] = [];
		let dropped = 0;

		this.emit("benchmark:start", {
			totalItems: items.length,
			totalBatches: batches.length,
			batchSize: this.batchSize,
		});

		for (const [batchIndex, batch] of batches.entries()) {
			const report = await this.processBatch(batch, batchIndex, batches.length);
			// Only whole batches are appended; a failed batch leaves no partial rows.
			results.push(...report.records);
			dropped += report.dropped;
			this.emit("batch:complete", report);
		}

		this.emit("benchmark:complete", {
			results: [...results],
			dropped,
			durationMs: Date.now() - startTime,
		});
		return results;
	}

	private async processBatch(
		batch: QuestionItem[],
		batchIndex: number,
		totalBatches: number,
	): Promise<BatchReport> {
		const base = {
			batchIndex,
			totalBatches,
			size: batch.length,
			itemIds: batch.map((item) => item.id),
		};
		const abandon = (
			outcome: Exclude<BatchOutcome, "success">,
			retries: number,
			error: string,
		): BatchReport => ({
			...base,
			outcome,
			retries,
			records: [],
			dropped: batch.length,
			error,
		});

		this.emit("batch:start", { batchIndex, totalBatches, size: batch.length });

		const prompts = batch.map((item) => item.prompt);
		let retries = 0;

		while (retries <= this.maxRetries) {
			this.emit("batch:attempt", { batchIndex, totalBatches, retries });
			const result = await this.attempt(prompts);

			if (result.ok) {
				const records = batch.map((item, i): ResultRecord => {
					const { pred, response } = parseResponse(result.responses[i] ?? "");
					return {
						id: item.id,
						trial: 0,
						answer: item.expectedAnswer,
						pred,
						response,
					};
				});
				return { ...base, outcome: "success", retries, records, dropped: 0 };
			}

			const { error } = result;
			if (error.kind === "bad-request") {
				return abandon("bad-request", retries, error.message);
			}
			if (error.kind === "other") {
				return abandon("failed", retries, error.message);
			}

			const delayMs = (retries + 1) * this.delayIncrementMs;
			this.emit("batch:retry", {
				batchIndex,
				totalBatches,
				retries: retries + 1,
				delayMs,
				message: error.message,
			});
			await this.sleep(delayMs);
			retries++;

			if (retries > this.maxRetries) {
				return abandon("rate-limit-exhausted", retries, error.message);
			}
		}

		// Unreachable for maxRetries >= 0, kept so the return type holds.
		return abandon("rate-limit-exhausted", retries, "Max retries reached");
	}

	/**
	 * Calls the invoker and folds anything unexpected into an "other" failure
	 */
	private async attempt(prompts: string[]): Promise<InvocationResult> {
		try {
			const result = await this.invoke(prompts, prompts.length);
			if (result.ok && result.responses.length !== prompts.length) {
				return {
					ok: false,
					error: {
						kind: "other",
						message: `Expected ${prompts.length} responses, got ${result.responses.length}`,
					},
				};
			}
			return result;
		} catch (error) {
			return {
				ok: false,
				error: {
					kind: "other",
					message: error instanceof Error ? error.message : String(error),
				},
			};
		}
	}
}
