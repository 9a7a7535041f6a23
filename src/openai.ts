import OpenAI from "openai";

export interface OpenAIClientSettings {
  apiKey?: string;
  baseURL?: string;
  timeoutMs: number;
  maxRetries: number;
}

export function createOpenAI(settings: OpenAIClientSettings): OpenAI {
  if (!settings.apiKey) {
    throw new Error("OPENAI_API_KEY is missing. Set it in your environment.");
  }
  return new OpenAI({
    apiKey: settings.apiKey,
    baseURL: settings.baseURL,
    timeout: settings.timeoutMs,
    maxRetries: settings.maxRetries,
  });
}
