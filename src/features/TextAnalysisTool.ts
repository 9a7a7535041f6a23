import { z } from "zod";
import type { ToolExecutionResult, ToolSpec } from "../ports/tools/ToolRegistryPort";
import { succeed } from "../ports/tools/ToolRegistryPort";

const POSITIVE_WORDS: ReadonlySet<string> = new Set(["good", "great", "excellent", "happy", "love"]);
const NEGATIVE_WORDS: ReadonlySet<string> = new Set(["bad", "poor", "sad", "hate", "terrible"]);

export type Sentiment = "Positive" | "Negative" | "Neutral";

export interface TextAnalysis {
  word_count: number;
  character_count: number;
  sentiment: Sentiment;
}

export function analyzeText(text: string): TextAnalysis {
  const words = text.split(/\s+/).filter((word) => word.length > 0);

  let score = 0;
  for (const word of words) {
    const lower = word.toLowerCase();
    if (POSITIVE_WORDS.has(lower)) score++;
    else if (NEGATIVE_WORDS.has(lower)) score--;
  }

  return {
    word_count: words.length,
    character_count: Array.from(text).length,
    sentiment: score > 0 ? "Positive" : score < 0 ? "Negative" : "Neutral",
  };
}

const parameters = z.strictObject({
  text: z.string().describe("The text to analyze."),
});

export class TextAnalysisTool implements ToolSpec<typeof parameters> {
  readonly name = "analyze_text";
  readonly description =
    "Count words and characters in a text and classify its sentiment as Positive, Negative or Neutral.";
  readonly parameters = parameters;
  readonly effect = "pure";

  async exec(args: z.infer<typeof parameters>): Promise<ToolExecutionResult> {
    const { word_count, character_count, sentiment } = analyzeText(args.text);
    return succeed({ word_count, character_count, sentiment });
  }
}
