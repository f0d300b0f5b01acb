import { config, type AppConfig } from "../config.js";
import { TextProcessor } from "../knowledge/textProcessor.js";
import { Transcriber } from "../transcription/transcriber.js";
import type { PipelineServices } from "./audioPipeline.js";

/** Per-run choice of models; anything left out falls back to the configuration. */
export interface ModelOverrides {
  transcriptionModel?: string;
  textModel?: string;
  textModelHost?: string;
}

export type ServiceFactory = (overrides?: ModelOverrides) => Promise<PipelineServices>;

function pick(override: string | undefined, fallback: string): string {
  return override?.trim() || fallback;
}

/** Bind the transcription and text models for one run. */
export async function buildServices(
  cfg: AppConfig = config,
  overrides: ModelOverrides = {}
): Promise<PipelineServices> {
  const transcriber = await Transcriber.load(pick(overrides.transcriptionModel, cfg.transcription.model), {
    apiKey: cfg.openai.apiKey,
    host: cfg.transcription.host,
    timeoutMs: cfg.transcription.timeoutMs,
  });
  const processor = await TextProcessor.connect(pick(overrides.textModel, cfg.textModel.model), {
    apiKey: cfg.openai.apiKey,
    host: pick(overrides.textModelHost, cfg.textModel.host),
    timeoutMs: cfg.textModel.timeoutMs,
  });
  return { transcriber, processor };
}
