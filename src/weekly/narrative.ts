import Anthropic from "@anthropic-ai/sdk";
import { requireSetting } from "../config";
import { Logger, silentLogger } from "../logger";

export const DEFAULT_MODEL = "claude-sonnet-4-5-20250929";

const SYSTEM_PROMPT =
  "You are a technical weekly-report assistant. You analyze code commit history and write clear, professional weekly engineering reports.";

/** Text generation behind the weekly report. */
export interface NarrativeModel {
  complete(prompt: string): Promise<string>;
}

export type AnthropicNarrativeOptions = {
  apiKey: string;
  model?: string;
  logger?: Logger;
};

export class AnthropicNarrativeModel implements NarrativeModel {
  private client: Anthropic | undefined;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly logger: Logger;

  constructor(options: AnthropicNarrativeOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_MODEL;
    this.logger = options.logger ?? silentLogger();
  }

  async complete(prompt: string): Promise<string> {
    this.logger.info(`Requesting narrative from ${this.model}`);
    const response = await this.getClient().messages.create({
      model: this.model,
      max_tokens: 4096,
      temperature: 0.7,
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: prompt }],
    });

    return response.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map((block) => block.text)
      .join("");
  }

  // created on first use so the service starts without a key
  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({ apiKey: requireSetting(this.apiKey, "llm.api_key") });
    }
    return this.client;
  }
}
