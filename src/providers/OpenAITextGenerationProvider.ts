/**
 * OpenAI chat-completions provider for analysis and brief generation.
 */

import OpenAI from 'openai';
import type {
  ITextGenerationProvider,
  TextGenerationRequest,
} from './ITextGenerationProvider.js';
import { GatewayUnavailableError } from '../errors.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const GATEWAY = 'OpenAI chat';

export class OpenAITextGenerationProvider implements ITextGenerationProvider {
  private client: OpenAI;
  readonly model: string;
  private readonly temperature: number;

  constructor(opts: { apiKey: string; model?: string; temperature?: number }) {
    this.client = new OpenAI({ apiKey: opts.apiKey });
    this.model = opts.model ?? DEFAULT_MODEL;
    this.temperature = opts.temperature ?? 0.2;
  }

  async complete(request: TextGenerationRequest): Promise<string> {
    let completion: OpenAI.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
      });
    } catch (err) {
      throw new GatewayUnavailableError(
        GATEWAY,
        err instanceof Error ? err.message : String(err),
        err
      );
    }

    return completion.choices[0]?.message.content?.trim() ?? '';
  }
}
