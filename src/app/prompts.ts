export const SYSTEM_PROMPT = `You are a careful assistant with access to tools.
Use math_calculator for any arithmetic instead of computing it yourself. It accepts numbers, parentheses and + - * / ^ only; write negative numbers as (0 - n).
Use analyze_text for word counts, character counts or sentiment of a piece of text.
Use date_offset to find a calendar date a number of days from today.
Use get_weather for current weather in a city.
If a tool reports an error, explain the problem or try a corrected call. Never invent tool results.
When you have what you need, answer the user directly and concisely.`;

export const EXAMPLE_QUERIES: readonly string[] = [
  "Evaluate this arithmetic expression: (234 * 12) + 98 and provide the result clearly.",
  "If I buy 3 items priced at 499 each, calculate the total cost and tell me the expected delivery date if shipping takes 7 days.",
  "Fetch today's weather in Chandigarh and suggest suitable clothing based on the temperature and conditions.",
];

export function withRecalledContext(systemPrompt: string, context: string | null): string {
  if (!context) return systemPrompt;
  return `${systemPrompt}\n\nRelevant context from earlier conversations:\n${context}`;
}
