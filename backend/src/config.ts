import path from "node:path";

export interface AiConfig {
  apiKey: string | null;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  maxAttempts: number;
}

export interface AppConfig {
  port: number;
  uploadDir: string;
  maxUploadBytes: number;
  maxImageDimension: number;
  supabase: {
    url: string;
    serviceRoleKey: string;
  };
  ai: AiConfig;
}

export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;
export const DEFAULT_MAX_IMAGE_DIMENSION = 2048;
const DEFAULT_AI_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_AI_MODEL = "gpt-4o-mini";

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const nonEmpty = (value: string | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePositiveInt(env.PORT, 3001),
    uploadDir: path.resolve(process.cwd(), env.UPLOAD_DIR ?? "uploads"),
    maxUploadBytes: parsePositiveInt(env.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
    maxImageDimension: parsePositiveInt(env.MAX_IMAGE_DIMENSION, DEFAULT_MAX_IMAGE_DIMENSION),
    supabase: {
      url: env.SUPABASE_URL ?? "",
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY ?? "",
    },
    ai: {
      apiKey: nonEmpty(env.AI_API_KEY),
      baseUrl: (nonEmpty(env.AI_BASE_URL) ?? DEFAULT_AI_BASE_URL).replace(/\/+$/, ""),
      model: nonEmpty(env.AI_MODEL) ?? DEFAULT_AI_MODEL,
      timeoutMs: parsePositiveInt(env.AI_TIMEOUT_MS, 60_000),
      maxAttempts: parsePositiveInt(env.AI_MAX_ATTEMPTS, 2),
    },
  };
}
