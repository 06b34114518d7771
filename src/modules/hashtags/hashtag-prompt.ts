export type HashtagPromptParams = {
  text: string;
  count: number;
  model: string;
  language: string;
};

/** Prompt for Ollama's `/api/generate`; asks for the same JSON shape the API returns. */
export function buildHashtagPrompt(params: HashtagPromptParams): string {
  const example = JSON.stringify({ model: params.model, count: params.count, hashtags: ['#hashtag1', '#hashtag2'] });
  return [
    `Generate exactly ${params.count} hashtags in ${params.language}, without spaces and without duplicates.`,
    `Answer in this JSON format: ${example}`,
    `Topic: ${params.text.trim()}`,
    'Respond with valid JSON only.',
  ].join('\n');
}
