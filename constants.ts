export const OUTPUT_DIRECTORY = "results";
export const CATEGORY_DIRECTORY = "CLIcK/Dataset";

export const DEFAULT_MODEL_NAME = "openai/gpt-4o-mini";
export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_MAX_TOKENS = 256;
export const DEFAULT_TEMPERATURE = 0.0;
export const DEFAULT_NUM_DEBUG_SAMPLES = 10;
export const DEFAULT_TIMEOUT_SECONDS = 300;

// Linear backoff: the nth consecutive rate limit on a batch waits n * increment.
export const RETRY_DELAY_INCREMENT_SECONDS = 30;

export const HF_DATASET = "EunsuKim/CLIcK";
export const HF_SPLIT = "train";
export const HF_ROWS_ENDPOINT = "https://datasets-server.huggingface.co/rows";
export const HF_PAGE_SIZE = 100;

export const UNCATEGORIZED = "Uncategorized";

/**
 * Category label -> metadata directory, relative to the CLIcK `Dataset` root.
 */
export const CATEGORY_DIRECTORIES: Readonly<Record<string, string>> = {
	History: "Culture/Korean History",
	Geography: "Culture/Korean Geography",
	Law: "Culture/Korean Law",
	Politics: "Culture/Korean Politics",
	Society: "Culture/Korean Society",
	Tradition: "Culture/Korean Tradition",
	Economy: "Culture/Korean Economy",
	"Pop Culture": "Culture/Korean Popular",
	Textual: "Language/Textual",
	Functional: "Language/Functional",
	Grammar: "Language/Grammar",
};
