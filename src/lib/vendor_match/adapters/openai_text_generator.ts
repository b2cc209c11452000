import OpenAI from "openai";
import { createLogger, describeError, type Logger } from "@/src/lib/logging/logger";
import type { TextGenerator } from "../types";

export type OpenAiTextGeneratorOptions = {
  api_key: string;
  model: string;
  logger?: Logger;
};

/** Chat-completion backed generator. Failures and empty output come back as null. */
export class OpenAiTextGenerator implements TextGenerator {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly logger: Logger;

  constructor(options: OpenAiTextGeneratorOptions) {
    this.client = new OpenAI({ apiKey: options.api_key });
    this.model = options.model;
    this.logger = options.logger ?? createLogger("openai_text");
  }

  async generate(prompt: string, temperature?: number): Promise<string | null> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        ...(temperature !== undefined ? { temperature } : {}),
      });
      const content = response.choices[0]?.message?.content ?? "";
      if (!content.trim()) {
        this.logger.warn("no content generated; response was empty or filtered");
        return null;
      }
      return content;
    } catch (error) {
      this.logger.error(`generation failed: ${describeError(error)}`);
      return null;
    }
  }
}
