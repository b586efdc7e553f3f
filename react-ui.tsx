import type React from "react";
import { useState, useEffect } from "react";
import { Box, Text, useStdout } from "ink";
import Spinner from "ink-spinner";
import { useBenchmarkStore, type ActiveBatch } from "./use-benchmark-store.ts";
import type { BatchReport, BenchmarkRunner } from "./runner.ts";

type Color = "green" | "yellow" | "red" | "cyan";

function useTerminalWidth(): number {
    const { stdout } = useStdout();
    const [width, setWidth] = useState(stdout?.columns ?? 80);

    useEffect(() => {
        if (!stdout) return;

        const handleResize = () => {
            setWidth(stdout.columns ?? 80);
        };

        stdout.on("resize", handleResize);
        return () => {
            stdout.off("resize", handleResize);
        };
    }, [stdout]);

    return width;
}

function rateColor(rate: number): Color {
    return rate >= 80 ? "green" : rate >= 50 ? "yellow" : "red";
}

const Header: React.FC<{
    modelName: string;
    totalItems: number;
    totalBatches: number;
    batchSize: number;
    maxRetries: number;
    terminalWidth: number;
}> = ({ modelName, totalItems, totalBatches, batchSize, maxRetries, terminalWidth }) => {
    const separatorWidth = Math.min(terminalWidth, 100);

    return (
        <Box flexDirection="column" marginBottom={1}>
            <Box>
                <Text bold color="cyan">
                    {"=".repeat(separatorWidth)}
                </Text>
            </Box>
            <Box>
                <Text bold color="cyan">
                    {" "}
                    ClickBench - Multiple-Choice Benchmark
                </Text>
            </Box>
            <Box>
                <Text bold color="cyan">
                    {"=".repeat(separatorWidth)}
                </Text>
            </Box>
            <Box marginTop={1}>
                <Text>
                    <Text dimColor>Model:</Text> <Text bold>{modelName}</Text>
                </Text>
            </Box>
            <Box>
                <Text>
                    <Text dimColor>Questions:</Text> {totalItems}
                    {"  "}
                    <Text dimColor>Batches:</Text> {totalBatches}
                    {"  "}
                    <Text dimColor>Batch Size:</Text> {batchSize}
                    {"  "}
                    <Text dimColor>Max Retries:</Text> {maxRetries}
                </Text>
            </Box>
        </Box>
    );
};

const ProgressStats: React.FC<{
    totalItems: number;
    totalBatches: number;
    completedBatches: number;
    processedItems: number;
    recordedItems: number;
    droppedItems: number;
    correctItems: number;
    elapsedMs: number;
}> = ({
    totalItems,
    totalBatches,
    completedBatches,
    processedItems,
    recordedItems,
    droppedItems,
    correctItems,
    elapsedMs,
}) => {
        const accuracy = recordedItems > 0 ? (correctItems / recordedItems) * 100 : 0;
        const elapsed = (elapsedMs / 1000).toFixed(1);
        const progress =
            totalItems > 0 ? ((processedItems / totalItems) * 100).toFixed(0) : "0";

        const barWidth = 30;
        const filledWidth = Math.round(
            (processedItems / Math.max(totalItems, 1)) * barWidth,
        );
        const progressBar = `[${"#".repeat(filledWidth)}${"-".repeat(barWidth - filledWidth)}]`;

        return (
            <Box flexDirection="column" marginBottom={1}>
                <Box>
                    <Text dimColor>Progress: </Text>
                    <Text color="cyan">{progressBar}</Text>
                    <Text>
                        {" "}
                        {processedItems}/{totalItems} ({progress}%)
                        {"  "}
                        <Text dimColor>current_batch:</Text> {completedBatches}/{totalBatches}
                    </Text>
                </Box>
                <Box>
                    <Text>
                        <Text color="green">[RECORDED] {recordedItems}</Text>
                        {"  "}
                        <Text color="red">[DROPPED] {droppedItems}</Text>
                        {"  "}
                        <Text dimColor>Running accuracy:</Text>{" "}
                        <Text color={rateColor(accuracy)}>{accuracy.toFixed(1)}%</Text>
                    </Text>
                </Box>
                <Box>
                    <Text>
                        <Text dimColor>Elapsed:</Text> {elapsed}s
                    </Text>
                </Box>
            </Box>
        );
    };

const ActiveBatchIndicator: React.FC<{
    activeBatch: ActiveBatch | null;
    totalBatches: number;
}> = ({ activeBatch, totalBatches }) => {
    if (!activeBatch) {
        return (
            <Box marginBottom={1}>
                <Text dimColor>No active batch</Text>
            </Box>
        );
    }

    return (
        <Box flexDirection="column" marginBottom={1}>
            <Box>
                <Text color="yellow">
                    <Spinner type="dots" />
                </Text>
                <Text>
                    {" "}
                    Batch {activeBatch.batchIndex + 1}/{totalBatches} ({activeBatch.size} question
                    {activeBatch.size !== 1 ? "s" : ""})
                </Text>
            </Box>
            {activeBatch.waitingMs !== null && (
                <Box marginLeft={3}>
                    <Text color="yellow">
                        • Rate limited, retry {activeBatch.retries} in {activeBatch.waitingMs / 1000}s
                    </Text>
                </Box>
            )}
        </Box>
    );
};

const TableRow: React.FC<{
    cells: Array<{ content: string; width: number; color?: Color }>;
    isHeader?: boolean;
}> = ({ cells, isHeader = false }) => {
    return (
        <Box>
            {cells.map((cell, idx) => (
                <Box key={`${cell.content}-${idx}`} width={cell.width}>
                    <Text bold={isHeader} color={cell.color} dimColor={isHeader}>
                        {cell.content.padEnd(cell.width).substring(0, cell.width)}
                    </Text>
                </Box>
            ))}
        </Box>
    );
};

const OUTCOME_LABELS: Record<BatchReport["outcome"], { label: string; color: Color }> = {
    success: { label: "[OK]", color: "green" },
    "rate-limit-exhausted": { label: "[LIMIT]", color: "red" },
    "bad-request": { label: "[BAD]", color: "red" },
    failed: { label: "[FAIL]", color: "red" },
};

const RecentBatchesTable: React.FC<{
    recentBatches: BatchReport[];
    terminalWidth: number;
}> = ({ recentBatches, terminalWidth }) => {
    const separatorWidth = Math.min(terminalWidth, 100);

    const cols = {
        status: 9,
        batch: 10,
        size: 6,
        retries: 9,
        correct: 9,
        unparsed: 10,
    };

    return (
        <Box flexDirection="column">
            <Box>
                <Text bold dimColor>
                    {"-".repeat(separatorWidth)}
                </Text>
            </Box>
            <TableRow
                isHeader
                cells={[
                    { content: "STATUS", width: cols.status },
                    { content: "BATCH", width: cols.batch },
                    { content: "SIZE", width: cols.size },
                    { content: "RETRIES", width: cols.retries },
                    { content: "CORRECT", width: cols.correct },
                    { content: "UNPARSED", width: cols.unparsed },
                ]}
            />
            <Box>
                <Text dimColor>{"-".repeat(separatorWidth)}</Text>
            </Box>
            {recentBatches.length === 0 ? (
                <Box>
                    <Text dimColor>No completed batches yet...</Text>
                </Box>
            ) : (
                recentBatches.map((report) => {
                    const status = OUTCOME_LABELS[report.outcome];
                    const correct = report.records.filter((r) => r.pred === r.answer).length;
                    const unparsed = report.records.filter((r) => r.pred === "").length;
                    return (
                        <TableRow
                            key={report.batchIndex}
                            cells={[
                                { content: status.label, width: cols.status, color: status.color },
                                {
                                    content: `${report.batchIndex + 1}/${report.totalBatches}`,
                                    width: cols.batch,
                                },
                                { content: String(report.size), width: cols.size },
                                { content: String(report.retries), width: cols.retries },
                                {
                                    content: report.outcome === "success" ? String(correct) : "-",
                                    width: cols.correct,
                                },
                                {
                                    content: report.outcome === "success" ? String(unparsed) : "-",
                                    width: cols.unparsed,
                                },
                            ]}
                        />
                    );
                })
            )}
        </Box>
    );
};

const FinalSummary: React.FC<{
    totalItems: number;
    recordedItems: number;
    droppedItems: number;
    correctItems: number;
    unparsedItems: number;
    elapsedMs: number;
    terminalWidth: number;
}> = ({
    totalItems,
    recordedItems,
    droppedItems,
    correctItems,
    unparsedItems,
    elapsedMs,
    terminalWidth,
}) => {
        const separatorWidth = Math.min(terminalWidth, 100);
        const accuracy = recordedItems > 0 ? (correctItems / recordedItems) * 100 : 0;

        return (
            <Box flexDirection="column" marginTop={1}>
                <Box>
                    <Text bold color="cyan">
                        {"=".repeat(separatorWidth)}
                    </Text>
                </Box>
                <Box>
                    <Text bold color="cyan">
                        {" "}
                        GENERATION COMPLETE
                    </Text>
                </Box>
                <Box>
                    <Text bold color="cyan">
                        {"=".repeat(separatorWidth)}
                    </Text>
                </Box>

                <Box flexDirection="column" marginTop={1} marginBottom={1}>
                    <Box>
                        <Text>
                            <Text dimColor>Questions:</Text> {totalItems}
                        </Text>
                    </Box>
                    <Box>
                        <Text>
                            <Text dimColor>Recorded:</Text>{" "}
                            <Text color="green">{recordedItems}</Text>
                            {"  "}
                            <Text dimColor>Dropped:</Text> <Text color="red">{droppedItems}</Text>
                            {"  "}
                            <Text dimColor>Unparsed:</Text> {unparsedItems}
                        </Text>
                    </Box>
                    <Box>
                        <Text>
                            <Text dimColor>Accuracy:</Text>{" "}
                            <Text color={rateColor(accuracy)}>{accuracy.toFixed(1)}%</Text>
                        </Text>
                    </Box>
                    <Box>
                        <Text>
                            <Text dimColor>Total Time:</Text> {(elapsedMs / 1000).toFixed(2)}s
                        </Text>
                    </Box>
                </Box>
            </Box>
        );
    };

export const BenchmarkApp: React.FC<{
    runner: BenchmarkRunner;
    modelName: string;
    totalItems: number;
    batchSize: number;
    maxRetries: number;
}> = ({ runner, modelName, totalItems, batchSize, maxRetries }) => {
    const terminalWidth = useTerminalWidth();
    const state = useBenchmarkStore(runner, {
        modelName,
        totalItems,
        batchSize,
        maxRetries,
    });

    return (
        <Box flexDirection="column">
            <Header
                modelName={state.modelName}
                totalItems={state.totalItems}
                totalBatches={state.totalBatches}
                batchSize={state.batchSize}
                maxRetries={state.maxRetries}
                terminalWidth={terminalWidth}
            />

            <ProgressStats
                totalItems={state.totalItems}
                totalBatches={state.totalBatches}
                completedBatches={state.completedBatches}
                processedItems={state.processedItems}
                recordedItems={state.recordedItems}
                droppedItems={state.droppedItems}
                correctItems={state.correctItems}
                elapsedMs={state.elapsedMs}
            />

            {!state.isComplete && (
                <ActiveBatchIndicator
                    activeBatch={state.activeBatch}
                    totalBatches={state.totalBatches}
                />
            )}

            <RecentBatchesTable recentBatches={state.recentBatches} terminalWidth={terminalWidth} />

            {state.isComplete && (
                <FinalSummary
                    totalItems={state.totalItems}
                    recordedItems={state.recordedItems}
                    droppedItems={state.droppedItems}
                    correctItems={state.correctItems}
                    unparsedItems={state.unparsedItems}
                    elapsedMs={state.elapsedMs}
                    terminalWidth={terminalWidth}
                />
            )}

            {state.errors.length > 0 && (
                <Box flexDirection="column" marginTop={1}>
                    <Text bold color="red">
                        Dropped batches:
                    </Text>
                    {state.errors.map((err) => (
                        <Box key={`${err.batchIndex}-${err.outcome}`}>
                            <Text color="red">
                                - Batch {err.batchIndex + 1} ({err.outcome}): {err.message}
                            </Text>
                        </Box>
                    ))}
                </Box>
            )}
        </Box>
    );
};
