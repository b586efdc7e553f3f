// =============================================================================
// CLICK-BENCH - Dataset Loading
// =============================================================================
// Records come from a local JSON / JSONL file, a directory of JSON files, or
// the Hugging Face datasets-server rows API. Every record is validated before
// anything is sent to the model.
// =============================================================================

import { existsSync } from "fs";
import { readdir, readFile, stat } from "fs/promises";
import { extname, join } from "path";
import { z } from "zod";
import {
	HF_DATASET,
	HF_PAGE_SIZE,
	HF_ROWS_ENDPOINT,
	HF_SPLIT,
} from "./constants.ts";
import { DatasetRecordSchema, type DatasetRecord } from "./types.ts";

export class DatasetError extends Error {
	override name = "DatasetError";
}

export type LoadDatasetOptions = {
	/** Local file or directory; the Hugging Face dataset is used when omitted */
	path?: string;
	/** Keep only the first `limit` records (debug runs) */
	limit?: number;
};

const RowsResponseSchema = z.object({
	rows: z.array(z.object({ row_idx: z.number(), row: z.unknown() })),
	num_rows_total: z.number(),
});

function validateRecords(raw: unknown[], source: string): DatasetRecord[] {
	return raw.map((entry, index) => {
		const result = DatasetRecordSchema.safeParse(entry);
		if (!result.success) {
			throw new DatasetError(
				`Invalid record #${index} in ${source}: ${result.error.issues
					.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
					.join("; ")}`,
			);
		}
		return result.data;
	});
}

async function readJsonArray(filePath: string): Promise<unknown[]> {
	const content = await readFile(filePath, "utf-8");
	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch (error) {
		throw new DatasetError(
			`Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
		);
	}
	if (!Array.isArray(parsed)) {
		throw new DatasetError(`Expected a JSON array in ${filePath}`);
	}
	return parsed;
}

async function readJsonLines(filePath: string): Promise<unknown[]> {
	const content = await readFile(filePath, "utf-8");
	return content
		.split(/\r?\n/)
		.filter((line) => line.trim() !== "")
		.map((line, index) => {
			try {
				const parsed: unknown = JSON.parse(line);
				return parsed;
			} catch {
				throw new DatasetError(`Invalid JSON on line ${index + 1} of ${filePath}`);
			}
		});
}

/**
 * Lists `*.json` files in a directory (and below it when `recursive`), sorted
 * so record order is stable
 */
export async function listJsonFiles(
	dir: string,
	{ recursive = false }: { recursive?: boolean } = {},
): Promise<string[]> {
	const entries = await readdir(dir, { recursive });
	return entries
		.filter((entry) => extname(entry) === ".json")
		.sort()
		.map((entry) => join(dir, entry));
}

async function loadLocalRecords(path: string): Promise<unknown[]> {
	if (!existsSync(path)) {
		throw new DatasetError(`Dataset not found: ${path}`);
	}

	if ((await stat(path)).isDirectory()) {
		const files = await listJsonFiles(path, { recursive: true });
		const records: unknown[] = [];
		for (const file of files) {
			records.push(...(await readJsonArray(file)));
		}
		return records;
	}

	return extname(path) === ".jsonl"
		? readJsonLines(path)
		: readJsonArray(path);
}

async function fetchHuggingFaceRows(limit?: number): Promise<unknown[]> {
	const rows: unknown[] = [];
	let total = limit ?? Number.POSITIVE_INFINITY;

	while (rows.length < total) {
		const length = Math.min(HF_PAGE_SIZE, total - rows.length);
		const url = new URL(HF_ROWS_ENDPOINT);
		url.searchParams.set("dataset", HF_DATASET);
		url.searchParams.set("config", "default");
		url.searchParams.set("split", HF_SPLIT);
		url.searchParams.set("offset", String(rows.length));
		url.searchParams.set("length", String(length));

		const response = await fetch(url);
		if (!response.ok) {
			throw new DatasetError(
				`Failed to fetch ${HF_DATASET} rows (HTTP ${response.status})`,
			);
		}

		const page = RowsResponseSchema.parse(await response.json());
		rows.push(...page.rows.map((r) => r.row));
		total = Math.min(total, page.num_rows_total);

		if (page.rows.length === 0) {
			break;
		}
	}

	return rows;
}

export async function loadDataset(
	options: LoadDatasetOptions = {},
): Promise<DatasetRecord[]> {
	const { path, limit } = options;
	const raw = path
		? await loadLocalRecords(path)
		: await fetchHuggingFaceRows(limit);
	const truncated = limit === undefined ? raw : raw.slice(0, limit);
	return validateRecords(truncated, path ?? HF_DATASET);
}
