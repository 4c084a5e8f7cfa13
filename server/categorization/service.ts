import OpenAI from "openai";
import { CATEGORIES } from "@shared/schema";
import { createError } from "../errors";

export interface CategorizeRequestOptions {
  signal?: AbortSignal;
}

/**
 * Boundary to whatever labels a transaction description. Returns the raw label
 * or null when the service answered with nothing usable.
 */
export interface CategorizationService {
  categorize(description: string, options?: CategorizeRequestOptions): Promise<string | null>;
}

export interface OpenAICategorizerConfig {
  apiKey?: string;
  baseURL?: string;
  model: string;
}

export function buildCategorizationPrompt(description: string): string {
  return `You classify personal credit card expenses.

Classify the expense below into ONE of these categories:
${CATEGORIES.map((category) => `- ${category}`).join("\n")}

EXPENSE DESCRIPTION: ${description}

INSTRUCTIONS:
- Answer ONLY with the category name
- Use exactly one of the names listed above
- Do not add explanations or comments

CATEGORY:`;
}

export class OpenAICategorizer implements CategorizationService {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: OpenAICategorizerConfig) {
    if (!config.apiKey) {
      throw createError("CATEGORIZER_NOT_CONFIGURED", { model: config.model });
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });
    this.model = config.model;
    console.log(`[categorizer] Using model ${this.model}${config.baseURL ? ` via ${config.baseURL}` : ""}`);
  }

  async categorize(description: string, options: CategorizeRequestOptions = {}): Promise<string | null> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [{ role: "user", content: buildCategorizationPrompt(description) }],
        max_tokens: 20,
        temperature: 0,
      },
      // Retries are handled by the gate
      { signal: options.signal, maxRetries: 0 }
    );

    const content = completion.choices[0]?.message?.content;
    return content ? content.trim() : null;
  }
}
