import Anthropic from '@anthropic-ai/sdk';
import { ReasoningUnavailableError } from '../errors.js';

/** Text generation used by Stage 3. */
export interface ReasoningService {
  generate(prompt: string): Promise<string>;
}

export interface ReasoningClientConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

const SYSTEM_PROMPT =
  'You are an email security analyst. You assess emails for social engineering ' +
  'and phishing. Answer only with the JSON object requested.';

/**
 * Reasoning service backed by the Anthropic Messages API.
 */
export class AnthropicReasoningClient implements ReasoningService {
  private client: Anthropic;

  constructor(private config: ReasoningClientConfig) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: 1,
    });
  }

  async generate(prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      system: SYSTEM_PROMPT,
      messages: [{ role: 'user', content: prompt }],
    }).catch((error: unknown) => {
      throw new ReasoningUnavailableError(
        `Reasoning request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    });

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === 'text') parts.push(block.text);
    }

    const text = parts.join('\n').trim();
    if (!text) throw new ReasoningUnavailableError('Reasoning service returned no text');
    return text;
  }
}
