import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { DatasetError, loadDataset } from "./dataset.ts";

const rawRecord = (id: string | number, extra: Record<string, unknown> = {}) => ({
	id,
	paragraph: "",
	question: `Question ${id}`,
	choices: ["one", "two", "three", "four"],
	answer: "one",
	...extra,
});

describe("loadDataset", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "click-bench-dataset-"));
	});

	afterEach(async () => {
		vi.unstubAllGlobals();
		await rm(dir, { recursive: true, force: true });
	});

	it("should read a JSON array and normalize ids to strings", async () => {
		const file = join(dir, "records.json");
		await writeFile(file, JSON.stringify([rawRecord(7), rawRecord("b")]));

		const records = await loadDataset({ path: file });

		expect(records.map((r) => r.id)).toEqual(["7", "b"]);
		expect(records[0]?.question).toBe("Question 7");
	});

	it("should default a missing or null paragraph to an empty string", async () => {
		const file = join(dir, "records.json");
		const { paragraph: _, ...withoutParagraph } = rawRecord("a");
		await writeFile(
			file,
			JSON.stringify([withoutParagraph, rawRecord("b", { paragraph: null })]),
		);

		const records = await loadDataset({ path: file });

		expect(records.map((r) => r.paragraph)).toEqual(["", ""]);
	});

	it("should read JSON lines", async () => {
		const file = join(dir, "records.jsonl");
		await writeFile(
			file,
			`${JSON.stringify(rawRecord("a"))}\n\n${JSON.stringify(rawRecord("b"))}\n`,
		);

		const records = await loadDataset({ path: file });

		expect(records.map((r) => r.id)).toEqual(["a", "b"]);
	});

	it("should read every JSON file below a directory in path order", async () => {
		await mkdir(join(dir, "Culture", "History"), { recursive: true });
		await mkdir(join(dir, "Language"), { recursive: true });
		await writeFile(join(dir, "Language", "grammar.json"), JSON.stringify([rawRecord("g1")]));
		await writeFile(
			join(dir, "Culture", "History", "history.json"),
			JSON.stringify([rawRecord("h1"), rawRecord("h2")]),
		);
		await writeFile(join(dir, "README.md"), "not data");

		const records = await loadDataset({ path: dir });

		expect(records.map((r) => r.id)).toEqual(["h1", "h2", "g1"]);
	});

	it("should keep only the first records when limited", async () => {
		const file = join(dir, "records.json");
		await writeFile(file, JSON.stringify([rawRecord(1), rawRecord(2), rawRecord(3)]));

		const records = await loadDataset({ path: file, limit: 2 });

		expect(records.map((r) => r.id)).toEqual(["1", "2"]);
	});

	it("should reject records that do not match the schema", async () => {
		const file = join(dir, "records.json");
		await writeFile(file, JSON.stringify([rawRecord(1), { id: 2, question: "?" }]));

		await expect(loadDataset({ path: file })).rejects.toThrow(DatasetError);
		await expect(loadDataset({ path: file })).rejects.toThrow(/^Invalid record #1 in /);
	});

	it("should fail on a missing path", async () => {
		await expect(loadDataset({ path: join(dir, "nope.json") })).rejects.toThrow(
			"Dataset not found",
		);
	});

	it("should fetch only the needed rows from the Hugging Face API", async () => {
		const fetchMock = vi.fn(async (_url: URL) =>
			new Response(
				JSON.stringify({
					rows: [0, 1, 2].map((i) => ({ row_idx: i, row: rawRecord(`hf-${i}`) })),
					num_rows_total: 1995,
				}),
			),
		);
		vi.stubGlobal("fetch", fetchMock);

		const records = await loadDataset({ limit: 3 });

		expect(records.map((r) => r.id)).toEqual(["hf-0", "hf-1", "hf-2"]);
		expect(fetchMock).toHaveBeenCalledTimes(1);
		const url = fetchMock.mock.calls[0]?.[0];
		expect(url?.searchParams.get("dataset")).toBe("EunsuKim/CLIcK");
		expect(url?.searchParams.get("split")).toBe("train");
		expect(url?.searchParams.get("offset")).toBe("0");
		expect(url?.searchParams.get("length")).toBe("3");
	});

	it("should page through the whole split without a limit", async () => {
		const fetchMock = vi.fn(async (url: URL) => {
			const offset = Number(url.searchParams.get("offset"));
			const count = offset === 0 ? 100 : 20;
			return new Response(
				JSON.stringify({
					rows: Array.from({ length: count }, (_, i) => ({
						row_idx: offset + i,
						row: rawRecord(offset + i),
					})),
					num_rows_total: 120,
				}),
			);
		});
		vi.stubGlobal("fetch", fetchMock);

		const records = await loadDataset();

		expect(records).toHaveLength(120);
		expect(records[119]?.id).toBe("119");
		expect(fetchMock).toHaveBeenCalledTimes(2);
		expect(fetchMock.mock.calls[1]?.[0].searchParams.get("offset")).toBe("100");
	});

	it("should surface HTTP errors from the rows API", async () => {
		vi.stubGlobal(
			"fetch",
			vi.fn(async () => new Response("busy", { status: 503 })),
		);

		await expect(loadDataset({ limit: 1 })).rejects.toThrow(
			"Failed to fetch EunsuKim/CLIcK rows (HTTP 503)",
		);
	});
});
