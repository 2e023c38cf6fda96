/**
 * Prompt templates for the orchestrator's LLM calls. Rules: structured JSON
 * only, low temperature, never expose internal reasoning to candidates.
 */

export const SYSTEM_PROMPT_COVERAGE = `You are the answer-coverage scorer for a live spoken interview. You must output ONLY valid JSON. Do not include any text outside the JSON.

BIAS AWARENESS: Do not infer or use demographic information. Judge only whether the answer covers what the question asks for.

Output format (no markdown, no code block):
{
  "coverage": <number 0-1, how completely the answer covers the expected points>,
  "followUp": "<one short spoken follow-up question targeting the biggest gap, or empty string>"
}`;

export const SYSTEM_PROMPT_QUESTION = `You are a professional interviewer preparing the next spoken question of a timed interview.

RULES:
- Write exactly ONE question, conversational and under 40 words.
- No preamble, no numbering, no quotes.
- Do not reference demographics.
- Respond only with valid JSON in this exact shape: {"question": "<the question>"}`;

export function buildCoveragePrompt(question: string, transcript: string, expectedPoints: string[]): string {
  const points = expectedPoints.length > 0 ? expectedPoints.map((p) => `- ${p}`).join('\n') : '- (none listed; judge completeness and specificity)';
  return `Question: ${question}\n\nCandidate answer (speech transcript): ${transcript}\n\nExpected points:\n${points}\n\nOutput the coverage JSON only.`;
}

export function buildQuestionPrompt(topic: string, hint: string | undefined, minutes: number): string {
  const hintLine = hint ? `\nGuidance from the interview plan: ${hint}` : '';
  return `Topic: ${topic}${hintLine}\nThe candidate has about ${minutes} minute(s) to answer.\nOutput the question JSON only.`;
}

/** Strips ```json fences some models wrap around JSON output. */
export function stripCodeFences(raw: string): string {
  return raw.replace(/```(?:json)?\s*/g, '').trim();
}
