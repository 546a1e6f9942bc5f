import { fetch } from 'node-fetch-native';
import { z } from 'zod';

/**
 * Optical recognition over a rendered page image.
 */
export interface OcrFunction {
  recognize(image: Uint8Array, signal?: AbortSignal): Promise<string>;
}

export enum OcrProvider {
  None = 'none',
  Mock = 'mock',
  Http = 'http',
}

const NoneConfigSchema = z.object({
  provider: z.literal(OcrProvider.None),
});

const MockConfigSchema = z.object({
  provider: z.literal(OcrProvider.Mock),
  text: z.string().default('Erkannter Text einer gescannten Seite.'),
});

const HttpConfigSchema = z.object({
  provider: z.literal(OcrProvider.Http),
  url: z.string().url('A valid URL for the OCR endpoint is required'),
  headers: z.record(z.string()).optional(),
});

export const OcrConfigSchema = z.discriminatedUnion('provider', [
  NoneConfigSchema,
  MockConfigSchema,
  HttpConfigSchema,
]);

export type OcrConfig = z.infer<typeof OcrConfigSchema>;

export const defaultOcrConfig: OcrConfig = { provider: OcrProvider.None };

// Returns the same text for every page.
export class MockOcrFunction implements OcrFunction {
  constructor(private readonly text: string) {}

  public async recognize(): Promise<string> {
    return this.text;
  }
}

const OcrResponseSchema = z.object({ text: z.string() });

/**
 * Posts `{ image }` (base64 PNG) and expects `{ text }` back.
 */
export class HttpOcrFunction implements OcrFunction {
  private readonly headers: Record<string, string>;

  constructor(
    private readonly url: string,
    headers?: Record<string, string>,
  ) {
    this.headers = headers ?? {};
    console.log(`[HttpOcrFunction] Initialized for URL: ${this.url}`);
  }

  public async recognize(image: Uint8Array, signal?: AbortSignal): Promise<string> {
    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...this.headers },
        body: JSON.stringify({ image: Buffer.from(image).toString('base64') }),
        signal,
      });
      if (!response.ok) {
        const errorBody = await response.text();
        throw new Error(`HTTP error ${response.status}: ${response.statusText}. Body: ${errorBody}`);
      }
      const parsed = OcrResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('Invalid response format from OCR API. Expected { "text": "..." }.');
      }
      return parsed.data.text;
    } catch (error) {
      throw new Error(`HTTP OCR failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

/** `null` means recognition is disabled and scanned documents fail extraction. */
export function createOcrFunction(config: OcrConfig): OcrFunction | null {
  switch (config.provider) {
    case OcrProvider.None:
      return null;
    case OcrProvider.Mock:
      return new MockOcrFunction(config.text);
    case OcrProvider.Http:
      return new HttpOcrFunction(config.url, config.headers);
    default: {
      const exhaustiveCheck: never = config;
      throw new Error(`Unhandled OCR provider: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}
