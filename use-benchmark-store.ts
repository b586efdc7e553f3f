import { useState, useEffect, useRef, useCallback } from "react";
import type { BatchReport, BenchmarkRunner, RunnerEvents } from "./runner.ts";

export type ActiveBatch = {
	batchIndex: number;
	size: number;
	retries: number;
	/** Set while the batch is sleeping after a rate limit */
	waitingMs: number | null;
	startTime: number;
};

export type BatchError = {
	batchIndex: number;
	outcome: BatchReport["outcome"];
	message: string;
};

export type BenchmarkStoreState = {
	// Config info
	modelName: string;
	batchSize: number;
	maxRetries: number;

	// Progress
	totalItems: number;
	totalBatches: number;
	completedBatches: number;
	processedItems: number;
	recordedItems: number;
	droppedItems: number;
	correctItems: number;
	unparsedItems: number;

	// Timing
	startTime: number | null;
	elapsedMs: number;

	activeBatch: ActiveBatch | null;
	recentBatches: BatchReport[];
	errors: BatchError[];

	isComplete: boolean;
};

const RECENT_BATCH_LIMIT = 8;

export function useBenchmarkStore(
	runner: BenchmarkRunner,
	config: {
		modelName: string;
		totalItems: number;
		batchSize: number;
		maxRetries: number;
	},
): BenchmarkStoreState {
	const [state, setState] = useState<BenchmarkStoreState>({
		modelName: config.modelName,
		batchSize: config.batchSize,
		maxRetries: config.maxRetries,
		totalItems: config.totalItems,
		totalBatches: Math.ceil(config.totalItems / config.batchSize),
		completedBatches: 0,
		processedItems: 0,
		recordedItems: 0,
		droppedItems: 0,
		correctItems: 0,
		unparsedItems: 0,
		startTime: Date.now(),
		elapsedMs: 0,
		activeBatch: null,
		recentBatches: [],
		errors: [],
		isComplete: false,
	});

	const activeBatchRef = useRef<ActiveBatch | null>(null);
	const recentBatchesRef = useRef<BatchReport[]>([]);
	const errorsRef = useRef<BatchError[]>([]);

	const syncRefs = useCallback((patch: Partial<BenchmarkStoreState> = {}) => {
		setState((prev) => ({
			...prev,
			...patch,
			activeBatch: activeBatchRef.current,
			recentBatches: [...recentBatchesRef.current],
			errors: [...errorsRef.current],
		}));
	}, []);

	// Elapsed time ticker
	useEffect(() => {
		if (state.isComplete) return;

		const interval = setInterval(() => {
			setState((prev) => ({
				...prev,
				elapsedMs: Date.now() - (prev.startTime ?? Date.now()),
			}));
		}, 100);

		return () => clearInterval(interval);
	}, [state.isComplete]);

	// Subscribe to runner events
	useEffect(() => {
		const handleBenchmarkStart = (payload: RunnerEvents["benchmark:start"]) => {
			setState((prev) => ({
				...prev,
				totalItems: payload.totalItems,
				totalBatches: payload.totalBatches,
				batchSize: payload.batchSize,
				startTime: Date.now(),
			}));
		};

		const handleBatchStart = (payload: RunnerEvents["batch:start"]) => {
			activeBatchRef.current = {
				batchIndex: payload.batchIndex,
				size: payload.size,
				retries: 0,
				waitingMs: null,
				startTime: Date.now(),
			};
			syncRefs();
		};

		const handleBatchAttempt = (payload: RunnerEvents["batch:attempt"]) => {
			const active = activeBatchRef.current;
			if (active && active.waitingMs !== null) {
				activeBatchRef.current = {
					...active,
					retries: payload.retries,
					waitingMs: null,
				};
				syncRefs();
			}
		};

		const handleBatchRetry = (payload: RunnerEvents["batch:retry"]) => {
			if (activeBatchRef.current) {
				activeBatchRef.current = {
					...activeBatchRef.current,
					retries: payload.retries,
					waitingMs: payload.delayMs,
				};
			}
			syncRefs();
		};

		const handleBatchComplete = (report: BatchReport) => {
			activeBatchRef.current = null;
			recentBatchesRef.current = [report, ...recentBatchesRef.current].slice(
				0,
				RECENT_BATCH_LIMIT,
			);
			if (report.outcome !== "success") {
				errorsRef.current.push({
					batchIndex: report.batchIndex,
					outcome: report.outcome,
					message: report.error ?? report.outcome,
				});
			}

			setState((prev) => ({
				...prev,
				activeBatch: null,
				recentBatches: [...recentBatchesRef.current],
				errors: [...errorsRef.current],
				completedBatches: prev.completedBatches + 1,
				processedItems: prev.processedItems + report.size,
				recordedItems: prev.recordedItems + report.records.length,
				droppedItems: prev.droppedItems + report.dropped,
				correctItems:
					prev.correctItems +
					report.records.filter((r) => r.pred === r.answer).length,
				unparsedItems:
					prev.unparsedItems + report.records.filter((r) => r.pred === "").length,
			}));
		};

		const handleBenchmarkComplete = (
			payload: RunnerEvents["benchmark:complete"],
		) => {
			activeBatchRef.current = null;
			syncRefs({ isComplete: true, elapsedMs: payload.durationMs });
		};

		runner.on("benchmark:start", handleBenchmarkStart);
		runner.on("batch:start", handleBatchStart);
		runner.on("batch:attempt", handleBatchAttempt);
		runner.on("batch:retry", handleBatchRetry);
		runner.on("batch:complete", handleBatchComplete);
		runner.on("benchmark:complete", handleBenchmarkComplete);

		return () => {
			runner.removeListener("benchmark:start", handleBenchmarkStart);
			runner.removeListener("batch:start", handleBatchStart);
			runner.removeListener("batch:attempt", handleBatchAttempt);
			runner.removeListener("batch:retry", handleBatchRetry);
			runner.removeListener("batch:complete", handleBatchComplete);
			runner.removeListener("benchmark:complete", handleBenchmarkComplete);
		};
	}, [runner, syncRefs]);

	return state;
}
