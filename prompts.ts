// =============================================================================
// CLICK-BENCH - Prompt Templates
// =============================================================================
// One template per (choice count, has context) combination.
// Placeholders are filled by `fillTemplate` in questions.ts.
// =============================================================================

export const SYSTEM_PROMPT =
	"You are an AI assistant who reads a given question and solves multiple choice questions.";

export const CONTEXT_FOUR_CHOICES = `Read the following passage and answer the question.

Passage:
{CONTEXT}

Question:
{QUESTION}

Choices:
A. {A}
B. {B}
C. {C}
D. {D}

Answer with a single letter (A, B, C or D) and nothing else.`;

export const FOUR_CHOICES = `Answer the following question.

Question:
{QUESTION}

Choices:
A. {A}
B. {B}
C. {C}
D. {D}

Answer with a single letter (A, B, C or D) and nothing else.`;

export const CONTEXT_FIVE_CHOICES = `Read the following passage and answer the question.

Passage:
{CONTEXT}

Question:
{QUESTION}

Choices:
A. {A}
B. {B}
C. {C}
D. {D}
E. {E}

Answer with a single letter (A, B, C, D or E) and nothing else.`;

export const FIVE_CHOICES = `Answer the following question.

Question:
{QUESTION}

Choices:
A. {A}
B. {B}
C. {C}
D. {D}
E. {E}

Answer with a single letter (A, B, C, D or E) and nothing else.`;
