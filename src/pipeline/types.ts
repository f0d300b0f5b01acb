export type ErrorKind =
  | "model_unavailable"
  | "file_not_found"
  | "invalid_audio"
  | "transcription_error"
  | "empty_transcript"
  | "empty_input"
  | "processing_error"
  | "invalid_config"
  | "delivery_error";

export interface PipelineError {
  kind: ErrorKind;
  message: string;
  /** HTTP status when a remote server answered */
  status?: number;
  /** Remediation shown next to the message, e.g. a missing dependency */
  hint?: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: PipelineError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  kind: ErrorKind,
  message: string,
  extra: { status?: number; hint?: string } = {}
): Result<T> {
  return { ok: false, error: { kind, message, ...extra } };
}

export function describeError(error: PipelineError): string {
  const status = error.status !== undefined ? ` (status ${error.status})` : "";
  const hint = error.hint ? `\n${error.hint}` : "";
  return `${error.message}${status}${hint}`;
}

export interface AudioHandle {
  path: string;
  /** Name shown to people; the caller's file name for uploads */
  name: string;
  sampleRate: number;
  channels: number;
  bytes: number;
}

export type Transcript = string;

export type ActionItemList =
  | { kind: "items"; text: string }
  | { kind: "none"; text: string };

export type Stage = "audio" | "transcription" | "processing" | "posting";

export type PipelineState =
  | { stage: "idle" }
  | { stage: "has_audio" }
  | { stage: "transcribed" }
  | { stage: "processed" }
  | { stage: "posted" }
  | { stage: "failed"; failedAt: Stage; error: PipelineError };

export type NoticeLevel = "info" | "success" | "warning" | "error";

export interface Notice {
  level: NoticeLevel;
  text: string;
}

export interface PipelineSession {
  id: string;
  state: PipelineState;
  audio: AudioHandle | null;
  transcript: Transcript | null;
  summary: Result<string> | null;
  actionItems: Result<ActionItemList> | null;
  notices: Notice[];
  updatedAt: string;
}
