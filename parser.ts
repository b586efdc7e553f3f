import { CHOICE_LETTERS, type ChoiceLetter, type Prediction } from "./types.ts";

export type ParsedResponse = {
	pred: Prediction;
	response: string;
};

function isChoiceLetter(value: string): value is ChoiceLetter {
	return (CHOICE_LETTERS as readonly string[]).includes(value);
}

/**
 * Normalizes a raw model response into a choice letter.
 * Anything that doesn't start with A-E (after trimming and dropping quotes)
 * is scored as a wrong answer rather than treated as an error.
 */
export function parseResponse(raw: string): ParsedResponse {
	const response = raw.trim().replace(/["']/g, "");
	const first = response.charAt(0);
	return {
		pred: isChoiceLetter(first) ? first : "",
		response,
	};
}
