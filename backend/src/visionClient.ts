/**
 * AI Analysis Client
 * Sends a food photo to a vision-capable chat-completion model and returns the
 * parsed JSON payload. Two variants share the VisionAnalyzer interface:
 * ChatVisionAnalyzer talks to a provider, FallbackVisionAnalyzer answers with a
 * fixed low-confidence payload when no provider is configured.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";

import type { AiConfig } from "./config.js";
import { incrementMetric } from "./metrics.js";
import {
  HttpError,
  TimeoutError,
  createTimeoutSignal,
  isAbortError,
  isTransientError,
  withRetry,
} from "./resilience.js";
import { parseJsonObject } from "./responseText.js";

// ============================================================================
// PROMPT
// ============================================================================

export const NUTRITION_ANALYSIS_PROMPT = `Analyze this food image and provide detailed nutritional information. Return a JSON response with the following structure:
{
  "food_items": ["list of identified food items"],
  "confidence_score": 0.85,
  "nutritional_info": {
    "calories": 250.5,
    "protein_g": 15.2,
    "carbohydrates_g": 30.1,
    "total_fat_g": 8.5,
    "saturated_fat_g": 3.2,
    "fiber_g": 5.1,
    "sugar_g": 12.3,
    "sodium_mg": 450.0
  },
  "estimated_portion_g": 150.0,
  "vitamins": {
    "vitamin_c_mg": 25.0,
    "vitamin_a_iu": 500.0,
    "folate_mcg": 40.0
  },
  "minerals": {
    "calcium_mg": 120.0,
    "iron_mg": 2.1,
    "potassium_mg": 300.0
  },
  "allergens": [
    {
      "name": "gluten",
      "confidence": 0.9,
      "detected_in": "bread"
    }
  ]
}

Be as accurate as possible. For foods you can't identify clearly, set confidence_score lower.
Include common allergens like: gluten, dairy, eggs, nuts, shellfish, soy, fish.
All nutritional values should be per 100g unless otherwise specified.`;

const MAX_OUTPUT_TOKENS = 2000;
const TEMPERATURE = 0.1;

// ============================================================================
// PROVIDER
// ============================================================================

export interface ChatCompletionRequest {
  model: string;
  prompt: string;
  imageDataUrl: string;
  maxTokens: number;
  temperature: number;
}

export interface ChatCompletionResponse {
  choices: Array<{ message?: { content?: string | null } }>;
}

/** The only operation the analyzer needs from an AI provider. */
export interface ChatCompletionProvider {
  submit(request: ChatCompletionRequest): Promise<ChatCompletionResponse>;
}

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z
        .object({
          content: z.string().nullable().optional(),
        })
        .optional(),
    }),
  ),
});

export interface HttpChatProviderOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs?: number;
  fetchImpl?: typeof fetch;
}

/** OpenAI-compatible `/chat/completions` over fetch. */
export class HttpChatCompletionProvider implements ChatCompletionProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpChatProviderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  submit(request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
    return withRetry((attempt) => this.post(request, attempt), {
      maxAttempts: this.options.maxAttempts,
      baseDelayMs: this.options.retryDelayMs ?? 500,
      maxDelayMs: 4000,
      jitterRatio: 0.2,
      shouldRetry: isTransientError,
      onRetry: (error, attempt) =>
        console.warn(
          `[Vision] Retry ${attempt}/${this.options.maxAttempts - 1} after error:`,
          error instanceof Error ? error.message : error,
        ),
    });
  }

  private async post(request: ChatCompletionRequest, attempt: number): Promise<ChatCompletionResponse> {
    const timeout = createTimeoutSignal(this.options.timeoutMs);
    try {
      const response = await this.fetchImpl(`${this.options.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({
          model: request.model,
          messages: [
            {
              role: "user",
              content: [
                { type: "text", text: request.prompt },
                { type: "image_url", image_url: { url: request.imageDataUrl } },
              ],
            },
          ],
          max_tokens: request.maxTokens,
          temperature: request.temperature,
        }),
        signal: timeout.signal,
      });

      if (!response.ok) {
        const detail = await response.text();
        console.error(`[Vision] Provider returned ${response.status} (attempt ${attempt})`, detail.slice(0, 500));
        throw new HttpError(response.status, `AI provider error: ${response.status}`);
      }

      const parsed = ChatCompletionResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error("AI provider returned a malformed chat completion");
      }
      return parsed.data;
    } catch (error) {
      if (error instanceof TimeoutError || isAbortError(error)) {
        throw new TimeoutError(`AI provider timeout after ${this.options.timeoutMs}ms`);
      }
      throw error;
    } finally {
      timeout.clear();
    }
  }
}

// ============================================================================
// ANALYZERS
// ============================================================================

/** Untyped model output; fields are validated when mapped onto an analysis. */
export type AnalysisPayload = Record<string, unknown>;

export interface VisionAnalyzer {
  readonly model: string;
  /** False for the fixed fallback. */
  readonly live: boolean;
  analyzeImage(bytes: Buffer, mimeType?: string): Promise<AnalysisPayload | null>;
  analyzeImageFile(filePath: string, mimeType?: string): Promise<AnalysisPayload | null>;
}

abstract class BaseVisionAnalyzer implements VisionAnalyzer {
  abstract readonly model: string;
  abstract readonly live: boolean;

  abstract analyzeImage(bytes: Buffer, mimeType?: string): Promise<AnalysisPayload | null>;

  async analyzeImageFile(filePath: string, mimeType?: string): Promise<AnalysisPayload | null> {
    let bytes: Buffer;
    try {
      bytes = await readFile(filePath);
    } catch (error) {
      console.error(`[Vision] Failed to read image file ${filePath}:`, error instanceof Error ? error.message : error);
      return null;
    }
    return this.analyzeImage(bytes, mimeType);
  }
}

export class ChatVisionAnalyzer extends BaseVisionAnalyzer {
  readonly live = true;

  constructor(
    private readonly provider: ChatCompletionProvider,
    readonly model: string,
  ) {
    super();
  }

  async analyzeImage(bytes: Buffer, mimeType = "image/jpeg"): Promise<AnalysisPayload | null> {
    const imageDataUrl = `data:${mimeType};base64,${bytes.toString("base64")}`;

    let content: string | null | undefined;
    try {
      const response = await this.provider.submit({
        model: this.model,
        prompt: NUTRITION_ANALYSIS_PROMPT,
        imageDataUrl,
        maxTokens: MAX_OUTPUT_TOKENS,
        temperature: TEMPERATURE,
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      console.error("[Vision] Error analyzing image with AI:", error instanceof Error ? error.message : error);
      return null;
    }

    if (!content) {
      console.error("[Vision] Provider returned no message content");
      return null;
    }

    const parsed = parseJsonObject(content);
    if (!parsed) {
      console.error("[Vision] Response was not a JSON object:", content.slice(0, 200));
    }
    return parsed;
  }
}

const FALLBACK_PAYLOAD = {
  food_items: ["unknown food"],
  confidence_score: 0.1,
  nutritional_info: {
    calories: 0,
    protein_g: 0,
    carbohydrates_g: 0,
    total_fat_g: 0,
  },
  allergens: [],
} as const;

export class FallbackVisionAnalyzer extends BaseVisionAnalyzer {
  readonly live = false;
  readonly model = "fallback";

  async analyzeImage(): Promise<AnalysisPayload> {
    console.warn("[Vision] No AI provider configured, returning fallback payload");
    incrementMetric("ai_fallback_used");
    return structuredClone(FALLBACK_PAYLOAD);
  }
}

/** Picks the analyzer variant once, at start-up. */
export function createVisionAnalyzer(config: AiConfig, fetchImpl?: typeof fetch): VisionAnalyzer {
  if (!config.apiKey) {
    console.warn("[Vision] AI_API_KEY not set, using fallback analyzer");
    return new FallbackVisionAnalyzer();
  }

  const provider = new HttpChatCompletionProvider({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    maxAttempts: config.maxAttempts,
    fetchImpl,
  });
  return new ChatVisionAnalyzer(provider, config.model);
}
