import { describe, it, expect, vi } from "vitest";
import { BenchmarkRunner, type BatchReport } from "./runner.ts";
import type {
	InvocationResult,
	ModelInvoker,
	QuestionItem,
} from "./types.ts";

const items: QuestionItem[] = [
	{ id: "q1", prompt: "p1", expectedAnswer: "A" },
	{ id: "q2", prompt: "p2", expectedAnswer: "B" },
	{ id: "q3", prompt: "p3", expectedAnswer: "C" },
];

const rateLimited: InvocationResult = {
	ok: false,
	error: { kind: "rate-limited", message: "Rate limit exceeded" },
};

// Answers every prompt "pN" with the Nth letter
const answerAll: ModelInvoker = async (prompts) => ({
	ok: true,
	responses: prompts.map((p) => ["A", "B", "C", "D"][Number(p.slice(1)) - 1] ?? "?"),
});

function createRunner(invoke: ModelInvoker, overrides: { batchSize?: number; maxRetries?: number } = {}) {
	const sleeps: number[] = [];
	const runner = new BenchmarkRunner({
		invoke,
		batchSize: overrides.batchSize ?? 2,
		maxRetries: overrides.maxRetries ?? 3,
		delayIncrementMs: 30_000,
		sleep: async (ms) => {
			sleeps.push(ms);
		},
	});
	const reports: BatchReport[] = [];
	runner.on("batch:complete", (report) => reports.push(report));
	return { runner, sleeps, reports };
}

describe("BenchmarkRunner", () => {
	it("should submit fixed-size batches with concurrency equal to the batch length", async () => {
		const invoke = vi.fn(answerAll);
		const { runner } = createRunner(invoke);

		const results = await runner.run(items);

		expect(invoke.mock.calls).toEqual([
			[["p1", "p2"], 2],
			[["p3"], 1],
		]);
		expect(results).toEqual([
			{ id: "q1", trial: 0, answer: "A", pred: "A", response: "A" },
			{ id: "q2", trial: 0, answer: "B", pred: "B", response: "B" },
			{ id: "q3", trial: 0, answer: "C", pred: "C", response: "C" },
		]);
	});

	it("should parse responses and keep wrong or unparseable answers", async () => {
		const invoke: ModelInvoker = async () => ({
			ok: true,
			responses: ['"C) Incheon"', "I don't know"],
		});
		const { runner } = createRunner(invoke);

		const results = await runner.run(items.slice(0, 2));

		expect(results).toEqual([
			{ id: "q1", trial: 0, answer: "A", pred: "C", response: "C) Incheon" },
			{ id: "q2", trial: 0, answer: "B", pred: "", response: "I dont know" },
		]);
	});

	it("should retry a rate-limited batch with linear backoff", async () => {
		const invoke = vi
			.fn<ModelInvoker>()
			.mockResolvedValueOnce(rateLimited)
			.mockResolvedValueOnce(rateLimited)
			.mockImplementation(answerAll);
		const { runner, sleeps, reports } = createRunner(invoke, { maxRetries: 3 });
		const retries = vi.fn();
		runner.on("batch:retry", retries);

		const results = await runner.run(items.slice(0, 2));

		expect(results.map((r) => r.id)).toEqual(["q1", "q2"]);
		expect(sleeps).toEqual([30_000, 60_000]);
		expect(invoke).toHaveBeenCalledTimes(3);
		expect(retries.mock.calls.map(([e]) => [e.retries, e.delayMs])).toEqual([
			[1, 30_000],
			[2, 60_000],
		]);
		expect(reports).toHaveLength(1);
		expect(reports[0]).toMatchObject({ outcome: "success", retries: 2, dropped: 0 });
	});

	it("should drop a batch once retries are exhausted and move on", async () => {
		const invoke = vi.fn<ModelInvoker>(async (prompts) =>
			prompts.includes("p1") ? rateLimited : answerAll(prompts, prompts.length),
		);
		const { runner, sleeps, reports } = createRunner(invoke, { maxRetries: 1 });

		const results = await runner.run(items);

		expect(results.map((r) => r.id)).toEqual(["q3"]);
		expect(sleeps).toEqual([30_000, 60_000]);
		expect(invoke).toHaveBeenCalledTimes(3);
		expect(reports.map((r) => [r.outcome, r.records.length, r.dropped])).toEqual([
			["rate-limit-exhausted", 0, 2],
			["success", 1, 0],
		]);
		expect(reports[0]?.retries).toBe(2);
	});

	it("should not retry when maxRetries is zero", async () => {
		const invoke = vi.fn<ModelInvoker>().mockResolvedValue(rateLimited);
		const { runner, sleeps, reports } = createRunner(invoke, { maxRetries: 0 });

		const results = await runner.run(items.slice(0, 2));

		expect(results).toEqual([]);
		expect(invoke).toHaveBeenCalledTimes(1);
		expect(sleeps).toEqual([30_000]);
		expect(reports[0]?.outcome).toBe("rate-limit-exhausted");
	});

	it("should abandon a bad request batch without retrying", async () => {
		const invoke = vi
			.fn<ModelInvoker>()
			.mockResolvedValueOnce({
				ok: false,
				error: { kind: "bad-request", message: "content filtered" },
			})
			.mockImplementation(answerAll);
		const { runner, sleeps, reports } = createRunner(invoke);

		const results = await runner.run(items);

		expect(results.map((r) => r.id)).toEqual(["q3"]);
		expect(sleeps).toEqual([]);
		expect(invoke).toHaveBeenCalledTimes(2);
		expect(reports[0]).toMatchObject({
			outcome: "bad-request",
			error: "content filtered",
			itemIds: ["q1", "q2"],
			dropped: 2,
		});
	});

	it("should abandon a batch on any other failure", async () => {
		const invoke = vi
			.fn<ModelInvoker>()
			.mockResolvedValueOnce({
				ok: false,
				error: { kind: "other", message: "socket hang up" },
			})
			.mockImplementation(answerAll);
		const { runner, sleeps, reports } = createRunner(invoke);

		const results = await runner.run(items);

		expect(results.map((r) => r.id)).toEqual(["q3"]);
		expect(sleeps).toEqual([]);
		expect(reports[0]).toMatchObject({ outcome: "failed", error: "socket hang up" });
	});

	it("should treat a throwing invoker as a failed batch", async () => {
		const invoke = vi
			.fn<ModelInvoker>()
			.mockRejectedValueOnce(new Error("unexpected"))
			.mockImplementation(answerAll);
		const { runner, reports } = createRunner(invoke);

		const results = await runner.run(items);

		expect(results.map((r) => r.id)).toEqual(["q3"]);
		expect(reports[0]).toMatchObject({ outcome: "failed", error: "unexpected" });
	});

	it("should fail a batch whose response count does not match", async () => {
		const invoke: ModelInvoker = async () => ({ ok: true, responses: ["A"] });
		const { runner, reports } = createRunner(invoke);

		const results = await runner.run(items.slice(0, 2));

		expect(results).toEqual([]);
		expect(reports[0]).toMatchObject({
			outcome: "failed",
			error: "Expected 2 responses, got 1",
		});
	});

	it("should report progress once per batch and summarize the run", async () => {
		const invoke = vi
			.fn<ModelInvoker>()
			.mockResolvedValueOnce(rateLimited)
			.mockImplementation(answerAll);
		const { runner, reports } = createRunner(invoke);
		const start = vi.fn();
		const complete = vi.fn();
		runner.on("benchmark:start", start);
		runner.on("benchmark:complete", complete);

		await runner.run(items);

		expect(start).toHaveBeenCalledWith({ totalItems: 3, totalBatches: 2, batchSize: 2 });
		expect(reports.map((r) => `${r.batchIndex + 1}/${r.totalBatches}`)).toEqual([
			"1/2",
			"2/2",
		]);
		expect(complete).toHaveBeenCalledTimes(1);
		expect(complete.mock.calls[0]?.[0]).toMatchObject({ dropped: 0 });
		expect(complete.mock.calls[0]?.[0].results).toHaveLength(3);
	});

	it("should announce every attempt so a retry wait can be cleared", async () => {
		const invoke = vi
			.fn<ModelInvoker>()
			.mockResolvedValueOnce(rateLimited)
			.mockResolvedValueOnce(rateLimited)
			.mockImplementation(answerAll);
		const { runner } = createRunner(invoke);
		const events: string[] = [];
		runner.on("batch:attempt", ({ retries }) => events.push(`attempt ${retries}`));
		runner.on("batch:retry", ({ retries }) => events.push(`retry ${retries}`));

		await runner.run(items.slice(0, 2));

		expect(events).toEqual([
			"attempt 0",
			"retry 1",
			"attempt 1",
			"retry 2",
			"attempt 2",
		]);
	});

	it("should keep results separate between runs", async () => {
		const { runner } = createRunner(answerAll);
		const complete = vi.fn();
		runner.on("benchmark:complete", complete);

		const first = await runner.run(items.slice(0, 1));
		const second = await runner.run(items.slice(1, 2));

		expect(first.map((r) => r.id)).toEqual(["q1"]);
		expect(second.map((r) => r.id)).toEqual(["q2"]);
		expect(second).not.toBe(first);
		expect(complete.mock.calls[1]?.[0].results).toEqual(second);
		expect(complete.mock.calls[1]?.[0].results).not.toBe(second);
	});

	it("should reject an invalid batch size", () => {
		expect(
			() =>
				new BenchmarkRunner({
					invoke: answerAll,
					batchSize: 0,
					maxRetries: 3,
					delayIncrementMs: 1,
				}),
		).toThrow("batchSize must be a positive integer, got 0");
	});
});
