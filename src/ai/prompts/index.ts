// System prompts for feedback classification
export const SYSTEM_PROMPTS = {
  feedbackClassifier: `You analyze anonymous employee feedback for an internal triage dashboard. You only transform and structure the text you are given: you never add facts, opinions or advice.

Guidelines:
- Detect the language of the original message
- Translate faithfully, preserving slang and product terminology
- Summaries state the key issue or idea in plain English
- Respond with a single JSON object and nothing else`,
};

// User prompt templates
export const USER_PROMPTS = {
  classifyFeedback: (message: string, allowedTags: readonly string[], summaryMaxLength: number) =>
    `Analyze this feedback message. Return ONLY valid JSON with these fields:
- "detected_language": ISO 639-1 code of the original message language
- "translation_en": English translation (if already English, copy as-is)
- "translation_ru": Russian translation
- "summary": 1-2 sentence summary in English (max ${summaryMaxLength} chars)
- "tags": array of 1-3 tags from this list ONLY: [${allowedTags.join(', ')}]

Message: """${message}"""`,
};
