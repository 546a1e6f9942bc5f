import { generateText } from 'ai';
import { fetch } from 'node-fetch-native';
import { createOllama } from 'ollama-ai-provider';
import { z } from 'zod';
import { REFUSAL_TEXT, citationMarker } from './prompt.js';

export interface CompletionOptions {
  maxTokens: number;
  temperature: number;
  topP: number;
  signal?: AbortSignal;
}

/** The text-completion capability the answer generator calls. */
export interface CompletionFunction {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export enum CompletionProvider {
  Mock = 'mock', // For testing
  Ollama = 'ollama',
  Http = 'http',
}

const MockConfigSchema = z.object({
  provider: z.literal(CompletionProvider.Mock),
  /** Fixed reply. Without it the mock quotes the first evidence block it finds in the prompt. */
  response: z.string().optional(),
});

const OllamaConfigSchema = z.object({
  provider: z.literal(CompletionProvider.Ollama),
  modelName: z.string().default('llama3.1'),
  baseURL: z.string().url().optional(),
});

const HttpConfigSchema = z.object({
  provider: z.literal(CompletionProvider.Http),
  /** Base URL of an OpenAI-compatible API, e.g. `http://localhost:8000/v1`. */
  baseURL: z.string().url('A valid base URL for the completion endpoint is required'),
  modelName: z.string(),
  apiKey: z.string().optional(),
});

export const CompletionConfigSchema = z.discriminatedUnion('provider', [
  MockConfigSchema,
  OllamaConfigSchema,
  HttpConfigSchema,
]);

export type CompletionConfig = z.infer<typeof CompletionConfigSchema>;

export const defaultCompletionConfig: CompletionConfig = { provider: CompletionProvider.Mock };

const EVIDENCE_PATTERN = /^\[\[(.+?)\]\] Quelle: .*\n(.+)$/m;

export class MockCompletionFunction implements CompletionFunction {
  constructor(private readonly response?: string) {}

  public async complete(prompt: string, _options?: CompletionOptions): Promise<string> {
    if (this.response !== undefined) return this.response;
    const match = EVIDENCE_PATTERN.exec(prompt);
    if (!match) return REFUSAL_TEXT;
    return `${match[2].trim()} ${citationMarker(match[1])}`;
  }
}

export class OllamaCompletionFunction implements CompletionFunction {
  private ollamaInstance: ReturnType<typeof createOllama>;
  private modelId: string;

  constructor(modelName: string, baseURL?: string) {
    this.ollamaInstance = createOllama({ baseURL });
    this.modelId = modelName;
    console.log(`[OllamaCompletionFunction] Initialized for model: ${this.modelId}, BaseURL: ${baseURL || 'default'}`);
  }

  public async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const { text } = await generateText({
      model: this.ollamaInstance(this.modelId),
      prompt,
      maxTokens: options.maxTokens,
      temperature: options.temperature,
      topP: options.topP,
      abortSignal: options.signal,
    });
    return text;
  }
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

// Http Implementation: OpenAI-compatible `POST /chat/completions`
export class HttpCompletionFunction implements CompletionFunction {
  private url: string;

  constructor(
    baseURL: string,
    private readonly modelId: string,
    private readonly apiKey?: string,
  ) {
    this.url = `${baseURL.replace(/\/+$/, '')}/chat/completions`;
    console.log(`[HttpCompletionFunction] Initialized for URL: ${this.url}, Model: ${this.modelId}`);
  }

  public async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    const response = await fetch(this.url, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        model: this.modelId,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        top_p: options.topP,
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new Error(`HTTP error ${response.status}: ${response.statusText}. Body: ${errorBody}`);
    }

    const parsed = ChatCompletionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Invalid response format from completion API. Expected { "choices": [{ "message": ... }] }.');
    }
    return parsed.data.choices[0].message.content ?? '';
  }
}

export function createCompletionFunction(config: CompletionConfig): CompletionFunction {
  switch (config.provider) {
    case CompletionProvider.Mock:
      return new MockCompletionFunction(config.response);
    case CompletionProvider.Ollama:
      return new OllamaCompletionFunction(config.modelName, config.baseURL);
    case CompletionProvider.Http:
      return new HttpCompletionFunction(config.baseURL, config.modelName, config.apiKey);
    default: {
      const exhaustiveCheck: never = config;
      throw new Error(`Unhandled completion provider: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}
