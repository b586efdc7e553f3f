import {
	CONTEXT_FIVE_CHOICES,
	CONTEXT_FOUR_CHOICES,
	FIVE_CHOICES,
	FOUR_CHOICES,
} from "./prompts.ts";
import {
	CHOICE_LETTERS,
	type ChoiceLetter,
	type DatasetRecord,
	type QuestionItem,
} from "./types.ts";

export class InvalidChoiceCountError extends Error {
	override name = "InvalidChoiceCountError";

	constructor(
		readonly count: number,
		readonly recordId: string,
	) {
		super(`Invalid number of choices: ${count} (ID: ${recordId})`);
	}
}

export class AnswerNotFoundError extends Error {
	override name = "AnswerNotFoundError";

	constructor(
		readonly answer: string,
		readonly recordId: string,
	) {
		super(`Answer not found in choices: ${answer} (ID: ${recordId})`);
	}
}

type TemplateKey = "CONTEXT" | "QUESTION" | ChoiceLetter;

function fillTemplate(
	template: string,
	values: Partial<Record<TemplateKey, string>>,
): string {
	// Single pass, so placeholder-looking text inside a value is left alone.
	return template.replace(
		/\{(CONTEXT|QUESTION|A|B|C|D|E)\}/g,
		(match, key: TemplateKey) => values[key] ?? match,
	);
}

function choiceValues(
	choices: readonly string[],
): Partial<Record<ChoiceLetter, string>> {
	const values: Partial<Record<ChoiceLetter, string>> = {};
	choices.forEach((choice, index) => {
		const letter = CHOICE_LETTERS[index];
		if (letter) {
			values[letter] = choice;
		}
	});
	return values;
}

/**
 * Picks the template by choice count (4 or 5) and whether the record has a passage.
 */
export function buildPrompt(
	record: Pick<DatasetRecord, "id" | "paragraph" | "question" | "choices">,
): string {
	const count = record.choices.length;
	if (count !== 4 && count !== 5) {
		throw new InvalidChoiceCountError(count, record.id);
	}

	const hasContext = record.paragraph !== "";
	const template =
		count === 4
			? hasContext
				? CONTEXT_FOUR_CHOICES
				: FOUR_CHOICES
			: hasContext
				? CONTEXT_FIVE_CHOICES
				: FIVE_CHOICES;

	return fillTemplate(template, {
		...choiceValues(record.choices),
		QUESTION: record.question,
		...(hasContext ? { CONTEXT: record.paragraph } : {}),
	});
}

/**
 * Maps the answer text to its choice letter. Both sides are trimmed, since the
 * source data carries stray whitespace on either the answer or the choices.
 */
export function extractAnswer(
	record: Pick<DatasetRecord, "id" | "choices" | "answer">,
): ChoiceLetter {
	const answer = record.answer.trim();
	const index = record.choices.findIndex((choice) => choice.trim() === answer);
	const letter = CHOICE_LETTERS[index];
	if (index === -1 || !letter) {
		throw new AnswerNotFoundError(record.answer, record.id);
	}
	return letter;
}

/**
 * Prepares every record up front. Any invalid record aborts the whole run.
 */
export function buildQuestionItems(
	records: readonly DatasetRecord[],
	onProgress?: (done: number, total: number) => void,
): QuestionItem[] {
	return records.map((record, index) => {
		const item: QuestionItem = {
			id: record.id,
			prompt: buildPrompt(record),
			expectedAnswer: extractAnswer(record),
		};
		onProgress?.(index + 1, records.length);
		return item;
	});
}
