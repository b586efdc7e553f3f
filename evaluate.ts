// =============================================================================
// CLICK-BENCH - Category Evaluation
// =============================================================================
// Joins a result table against the per-category metadata directories and
// reports accuracy per category. It can be run standalone or imported by
// index.tsx.
// =============================================================================

import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { join, resolve } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import {
	CATEGORY_DIRECTORIES,
	CATEGORY_DIRECTORY,
	UNCATEGORIZED,
} from "./constants.ts";
import { listJsonFiles } from "./dataset.ts";
import { readResults } from "./persistence.ts";
import { RecordIdSchema, type CategoryAccuracy, type ResultRecord } from "./types.ts";

const CategoryFileSchema = z.array(
	z.object({ id: RecordIdSchema }).passthrough(),
);

export type CategoryMap = ReadonlyMap<string, string>;

export type EvaluationReport = {
	csvPath: string;
	categories: CategoryAccuracy[];
	total: CategoryAccuracy;
	uncategorized: number;
};

/**
 * Scans each category directory for JSON files and maps every record id to the category
 */
export async function buildCategoryMap(
	rootDir: string,
	categoryDirs: Readonly<Record<string, string>> = CATEGORY_DIRECTORIES,
): Promise<CategoryMap> {
	const idToCategory = new Map<string, string>();

	for (const [category, dir] of Object.entries(categoryDirs)) {
		const dirPath = join(rootDir, dir);
		if (!existsSync(dirPath)) {
			console.warn(`[WARN] Category directory not found: ${dirPath}`);
			continue;
		}

		for (const filePath of await listJsonFiles(dirPath)) {
			const content = await readFile(filePath, "utf-8");
			const entries = CategoryFileSchema.parse(JSON.parse(content));
			for (const entry of entries) {
				idToCategory.set(entry.id, category);
			}
		}
	}

	return idToCategory;
}

function toAccuracy(category: string, records: readonly ResultRecord[]): CategoryAccuracy {
	const correct = records.filter((r) => r.pred === r.answer).length;
	return {
		category,
		accuracy: records.length > 0 ? correct / records.length : 0,
		correct,
		count: records.length,
	};
}

/**
 * Per-category accuracy. Ids missing from the map are counted under "Uncategorized".
 */
export function aggregateByCategory(
	records: readonly ResultRecord[],
	categoryMap: CategoryMap,
): CategoryAccuracy[] {
	const byCategory = new Map<string, ResultRecord[]>();
	for (const record of records) {
		const category = categoryMap.get(record.id) ?? UNCATEGORIZED;
		const existing = byCategory.get(category) ?? [];
		existing.push(record);
		byCategory.set(category, existing);
	}

	return [...byCategory.entries()]
		.map(([category, rows]) => toAccuracy(category, rows))
		.sort((a, b) => a.category.localeCompare(b.category));
}

export function formatCategoryTable(
	rows: readonly CategoryAccuracy[],
	total?: CategoryAccuracy,
): string {
	const cols = { category: 16, accuracy: 10, correct: 9, count: 7 };
	const line = (cells: [string, string, string, string]) =>
		[
			cells[0].padEnd(cols.category),
			cells[1].padStart(cols.accuracy),
			cells[2].padStart(cols.correct),
			cells[3].padStart(cols.count),
		].join("");
	const toCells = (row: CategoryAccuracy): [string, string, string, string] => [
		row.category,
		row.accuracy.toFixed(4),
		String(row.correct),
		String(row.count),
	];
	const width = cols.category + cols.accuracy + cols.correct + cols.count;

	const lines = [
		line(["CATEGORY", "ACCURACY", "CORRECT", "COUNT"]),
		"-".repeat(width),
		...rows.map((row) => line(toCells(row))),
	];
	if (total) {
		lines.push("-".repeat(width), line(toCells(total)));
	}
	return lines.join("\n");
}

export async function evaluateResults(
	csvPath: string,
	categoryRoot: string = CATEGORY_DIRECTORY,
): Promise<EvaluationReport> {
	const resolvedPath = resolve(process.cwd(), csvPath);
	if (!existsSync(resolvedPath)) {
		throw new Error(`Result table not found: ${resolvedPath}`);
	}

	const records = await readResults(resolvedPath);
	const categoryMap = await buildCategoryMap(resolve(process.cwd(), categoryRoot));
	const categories = aggregateByCategory(records, categoryMap);

	const uncategorized =
		categories.find((c) => c.category === UNCATEGORIZED)?.count ?? 0;
	if (uncategorized > 0) {
		console.warn(
			`[WARN] ${uncategorized} result(s) have no category in ${categoryRoot}`,
		);
	}

	return {
		csvPath: resolvedPath,
		categories,
		total: toAccuracy("TOTAL", records),
		uncategorized,
	};
}

// =============================================================================
// Standalone CLI Support
// =============================================================================

const isMain =
	process.argv[1] !== undefined &&
	resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isMain) {
	const csvPath = process.argv[2];
	const categoryRoot = process.argv[3] ?? CATEGORY_DIRECTORY;

	if (!csvPath) {
		console.error("Usage: npm run evaluate -- <results.csv> [category-root]");
		process.exit(1);
	}

	console.log(`[INFO] Evaluating ${csvPath}`);
	evaluateResults(csvPath, categoryRoot)
		.then((report) => {
			console.log("");
			console.log(formatCategoryTable(report.categories, report.total));
			console.log("");
		})
		.catch((error) => {
			console.error(
				"[ERROR]",
				error instanceof Error ? error.message : String(error),
			);
			process.exit(1);
		});
}
