import { randomUUID } from "crypto";
import type { TextProcessor } from "../knowledge/textProcessor.js";
import type { LoadedTranscriber } from "../transcription/transcriber.js";
import { fmtActionItemsTitle } from "../teams/format.js";
import { InvalidConfigError, NotificationPoster, describeDelivery, type PosterOptions } from "../teams/poster.js";
import {
  describeError,
  type AudioHandle,
  type Notice,
  type NoticeLevel,
  type PipelineError,
  type PipelineSession,
  type PipelineState,
  type Stage,
} from "./types.js";

/** Model bindings for one run; built fresh per run by the caller. */
export interface PipelineServices {
  transcriber: LoadedTranscriber;
  processor: TextProcessor;
}

export interface PostOptions extends PosterOptions {
  webhookUrl?: string;
}

function now(): string {
  return new Date().toISOString();
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function withState(session: PipelineSession, state: PipelineState, ...notices: Notice[]): PipelineSession {
  return {
    ...session,
    state,
    notices: [...session.notices, ...notices],
    updatedAt: now(),
  };
}

function notice(level: NoticeLevel, text: string): Notice {
  return { level, text };
}

function failed(session: PipelineSession, failedAt: Stage, error: PipelineError): PipelineSession {
  console.error(`[pipeline] ${session.id} failed at ${failedAt}: ${error.message}`);
  return withState(session, { stage: "failed", failedAt, error }, notice("error", describeError(error)));
}

export function createSession(id: string = randomUUID()): PipelineSession {
  return {
    id,
    state: { stage: "idle" },
    audio: null,
    transcript: null,
    summary: null,
    actionItems: null,
    notices: [],
    updatedAt: now(),
  };
}

/** Start a new run on the given audio. Everything a previous run produced is dropped. */
export function attachAudio(session: PipelineSession, audio: AudioHandle): PipelineSession {
  return {
    ...createSession(session.id),
    state: { stage: "has_audio" },
    audio,
    notices: [notice("info", `Ready to process ${audio.name}`)],
  };
}

/** Record a failure to obtain audio, e.g. a missing upload, without touching a previous run. */
export function audioFailed(session: PipelineSession, error: PipelineError): PipelineSession {
  return failed(createSession(session.id), "audio", error);
}

async function transcribeStage(session: PipelineSession, services: PipelineServices): Promise<PipelineSession> {
  const loaded = services.transcriber;
  if (loaded.transcriber === null) {
    return failed(session, "transcription", { kind: "model_unavailable", message: loaded.diagnostic });
  }
  if (!session.audio) {
    return failed(session, "transcription", { kind: "file_not_found", message: "No audio attached to this run." });
  }

  const result = await loaded.transcriber.transcribe(session.audio);
  if (!result.ok) return failed(session, "transcription", result.error);

  return {
    ...withState(session, { stage: "transcribed" }, notice("success", "Transcription complete.")),
    transcript: result.value,
  };
}

async function processStage(session: PipelineSession, services: PipelineServices): Promise<PipelineSession> {
  const { processor } = services;
  const transcript = session.transcript ?? "";
  const notices: Notice[] = [];

  if (processor.availabilityWarning) {
    notices.push(notice("warning", processor.availabilityWarning));
  }

  // Summary and action items are independent: one failing does not stop the other
  const summary = await processor.summarize(transcript);
  if (!summary.ok) {
    notices.push(notice("warning", `Summarization issue: ${describeError(summary.error)}`));
  }

  const actionItems = await processor.extractActionItems(transcript);
  if (!actionItems.ok) {
    notices.push(notice("warning", `Action item generation issue: ${describeError(actionItems.error)}`));
  } else if (actionItems.value.kind === "none") {
    notices.push(notice("info", "No specific action items were found, so there is nothing to post."));
  }

  notices.push(notice("success", "Text processing complete."));
  return {
    ...withState(session, { stage: "processed" }, ...notices),
    summary,
    actionItems,
  };
}

async function guarded(
  session: PipelineSession,
  stage: Stage,
  run: () => Promise<PipelineSession>
): Promise<PipelineSession> {
  try {
    return await run();
  } catch (err) {
    const kind = stage === "transcription" ? "transcription_error" : "processing_error";
    return failed(session, stage, { kind, message: `Unexpected error during ${stage}: ${errorMessage(err)}` });
  }
}

/**
 * Transcribe the attached audio, then summarize it and extract action items.
 * Never throws; failures end in a `failed` state with an error notice.
 */
export async function runPipeline(session: PipelineSession, services: PipelineServices): Promise<PipelineSession> {
  if (session.state.stage !== "has_audio") {
    return withState(session, session.state, notice("error", "Attach an audio file before processing."));
  }
  console.log(`[pipeline] ${session.id}: processing ${session.audio?.path}`);

  const transcribed = await guarded(session, "transcription", () => transcribeStage(session, services));
  if (transcribed.state.stage !== "transcribed") return transcribed;
  console.log(`[pipeline] Transcript: ${transcribed.transcript?.slice(0, 100)}...`);

  const processed = await guarded(transcribed, "processing", () => processStage(transcribed, services));
  console.log(`[pipeline] ${session.id}: ${processed.state.stage}`);
  return processed;
}

/** Whether the session holds action items worth posting. */
export function canPost(session: PipelineSession): boolean {
  const { state, actionItems } = session;
  const ready = state.stage === "processed" || (state.stage === "failed" && state.failedAt === "posting");
  if (!ready || !actionItems?.ok) return false;
  return actionItems.value.kind === "items" && actionItems.value.text.trim().length > 0;
}

/**
 * Post the session's action items to the webhook. Only ever called on an
 * explicit request from the user.
 */
export async function postActionItems(session: PipelineSession, opts: PostOptions): Promise<PipelineSession> {
  if (!canPost(session) || !session.actionItems?.ok) {
    return withState(session, session.state, notice("info", "No actionable items to post."));
  }

  const webhookUrl = opts.webhookUrl?.trim();
  if (!webhookUrl) {
    console.log("[pipeline] No webhook URL set, skipping post");
    return withState(
      session,
      session.state,
      notice("info", "Webhook URL not set. Skipping posting; set TEAMS_WEBHOOK_URL to enable it.")
    );
  }

  const body = session.actionItems.value.text;
  const title = fmtActionItemsTitle(session.audio?.name ?? "Uploaded/Recorded Audio");

  try {
    const poster = new NotificationPoster(webhookUrl, { timeoutMs: opts.timeoutMs });
    const result = await poster.send(title, body);
    if (result.delivered) {
      return withState(session, { stage: "posted" }, notice("success", "Action items posted successfully."));
    }
    return failed(session, "posting", { kind: "delivery_error", message: describeDelivery(result) });
  } catch (err) {
    const kind = err instanceof InvalidConfigError ? "invalid_config" : "delivery_error";
    return failed(session, "posting", { kind, message: errorMessage(err) });
  }
}
