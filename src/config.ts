import "dotenv/config";

function optional(key: string, fallback = ""): string {
  return process.env[key] || fallback;
}

function integer(key: string, fallback: number): number {
  const parsed = parseInt(optional(key), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const config = {
  port: integer("PORT", 3030),
  openai: {
    apiKey: optional("OPENAI_API_KEY"),
  },
  textModel: {
    model: optional("OPENAI_MODEL", "gpt-4o-mini"),
    host: optional("TEXT_MODEL_HOST"),
    timeoutMs: integer("TEXT_MODEL_TIMEOUT_MS", 120_000),
  },
  transcription: {
    model: optional("TRANSCRIPTION_MODEL", "whisper-1"),
    host: optional("TRANSCRIPTION_HOST"),
    timeoutMs: integer("TRANSCRIPTION_TIMEOUT_MS", 300_000),
  },
  teams: {
    webhookUrl: optional("TEAMS_WEBHOOK_URL"),
    timeoutMs: integer("WEBHOOK_TIMEOUT_MS", 10_000),
  },
  uploadDir: optional("UPLOAD_DIR", "data/uploads"),
} as const;

export type AppConfig = typeof config;
