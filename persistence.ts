import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { ResultRecordSchema, type ResultRecord } from "./types.ts";
import { sanitizeForFilename } from "./utils.ts";

export const RESULT_COLUMNS = ["id", "trial", "answer", "pred", "response"] as const;

/**
 * Path of the result table for a model, e.g. results/openai-gpt-4o-mini.csv
 */
export function resultPathFor(outputDir: string, modelName: string): string {
	return join(outputDir, `${sanitizeForFilename(modelName)}.csv`);
}

/**
 * Writes the result table, replacing any previous file at the same path
 */
export async function saveResults(
	csvPath: string,
	records: readonly ResultRecord[],
): Promise<string> {
	await mkdir(dirname(csvPath), { recursive: true });

	const content = stringify(
		records.map((r) => [r.id, r.trial, r.answer, r.pred, r.response]),
		{ header: true, columns: [...RESULT_COLUMNS] },
	);

	// Write to a temp file then rename
	const tempPath = `${csvPath}.tmp`;
	await writeFile(tempPath, content, "utf-8");
	await rename(tempPath, csvPath);

	return csvPath;
}

export async function readResults(csvPath: string): Promise<ResultRecord[]> {
	const content = await readFile(csvPath, "utf-8");
	const rows: unknown[] = parse(content, {
		columns: true,
		skip_empty_lines: true,
	});

	return rows.map((row, index) => {
		const result = ResultRecordSchema.safeParse(row);
		if (!result.success) {
			throw new Error(
				`Invalid result row ${index + 1} in ${csvPath}: ${result.error.message}`,
			);
		}
		return result.data;
	});
}
