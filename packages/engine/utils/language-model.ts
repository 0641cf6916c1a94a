// Language model collaborator backed by the Anthropic SDK
// Stateless between calls; the SDK is loaded lazily so the engine runs without it

import type { CompletionRequest, LanguageModel } from '../types/collaborators.js';

type AnthropicClient = InstanceType<typeof import('@anthropic-ai/sdk').default>;

export const DEFAULT_LANGUAGE_MODEL = 'claude-haiku-4-5-20251001';

export interface AnthropicLanguageModelOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
}

export class AnthropicLanguageModel implements LanguageModel {
  readonly model: string;
  private readonly apiKey: string;
  private readonly maxTokens: number;
  private clientPromise: Promise<AnthropicClient> | null = null;

  constructor(options: AnthropicLanguageModelOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_LANGUAGE_MODEL;
    this.maxTokens = options.maxTokens ?? 512;
  }

  private getClient(): Promise<AnthropicClient> {
    if (!this.clientPromise) {
      this.clientPromise = import('@anthropic-ai/sdk').then(mod => new mod.default({ apiKey: this.apiKey }));
    }
    return this.clientPromise;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const client = await this.getClient();
    const response = await client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens ?? this.maxTokens,
        ...(request.system ? { system: request.system } : {}),
        messages: [{ role: 'user', content: request.prompt }],
      },
      { signal: request.signal },
    );

    const text = response.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('')
      .trim();
    if (!text) throw new Error(`Empty response from ${this.model}`);
    return text;
  }
}

/**
 * Create the language model from the environment.
 * Returns null when ANTHROPIC_API_KEY is not set.
 */
export function createLanguageModel(model?: string, env: NodeJS.ProcessEnv = process.env): LanguageModel | null {
  const apiKey = env.ANTHROPIC_API_KEY;
  if (!apiKey) return null;
  return new AnthropicLanguageModel({ apiKey, model });
}

/** First JSON object in a model reply, or undefined */
export function extractJsonObject(text: string): unknown {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) return undefined;
  try {
    return JSON.parse(match[0]);
  } catch {
    return undefined;
  }
}
