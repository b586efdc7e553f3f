import { z } from "zod";

export const CHOICE_LETTERS = ["A", "B", "C", "D", "E"] as const;

export type ChoiceLetter = (typeof CHOICE_LETTERS)[number];

/**
 * A predicted letter, or "" when the response did not start with one
 */
export type Prediction = ChoiceLetter | "";

/**
 * Ids arrive as strings or numbers depending on the source; they are compared as strings.
 */
export const RecordIdSchema = z
	.union([z.string(), z.number()])
	.transform((id) => String(id));

/**
 * Zod schema for a single multiple-choice dataset record
 */
export const DatasetRecordSchema = z.object({
	id: RecordIdSchema,
	paragraph: z.string().nullish().transform((p) => p ?? ""),
	question: z.string(),
	choices: z.array(z.string()),
	answer: z.string(),
});

export type DatasetRecord = z.infer<typeof DatasetRecordSchema>;

/**
 * A prepared question, ready to be sent to the model
 */
export type QuestionItem = {
	readonly id: string;
	readonly prompt: string;
	readonly expectedAnswer: ChoiceLetter;
};

/**
 * One row of the persisted result table
 */
export type ResultRecord = {
	id: string;
	trial: 0;
	answer: ChoiceLetter;
	pred: Prediction;
	response: string;
};

/**
 * Zod schema for validating a ResultRecord read back from the CSV table
 */
export const ResultRecordSchema = z.object({
	id: z.string(),
	trial: z.coerce.number().pipe(z.literal(0)),
	answer: z.enum(CHOICE_LETTERS),
	pred: z.union([z.enum(CHOICE_LETTERS), z.literal("")]),
	response: z.string(),
});

export type InvocationErrorKind = "rate-limited" | "bad-request" | "other";

export type InvocationError = {
	kind: InvocationErrorKind;
	message: string;
};

/**
 * Outcome of one batch call: every response in prompt order, or a single classified failure
 */
export type InvocationResult =
	| { ok: true; responses: string[] }
	| { ok: false; error: InvocationError };

export type ModelInvoker = (
	prompts: readonly string[],
	concurrency: number,
) => Promise<InvocationResult>;

export type CategoryAccuracy = {
	category: string;
	accuracy: number;
	correct: number;
	count: number;
};
