import fs from "fs";
import { access } from "fs/promises";
import path from "path";
import type OpenAI from "openai";
import { createClient, describeClientError, type ClientOptions } from "../ai/models.js";
import { isMissing } from "../audio/audioSource.js";
import { fail, ok, type AudioHandle, type Result, type Transcript } from "../pipeline/types.js";

export const DECODER_HINT =
  "This might be due to ffmpeg not being installed on the transcription host. Install it from https://ffmpeg.org/download.html and make sure it is on the PATH.";

/** Speech-to-text capability behind the Transcriber. */
export interface SpeechEngine {
  readonly model: string;
  /** Resolve once the model can be used; reject with the reason otherwise. */
  verify(): Promise<void>;
  transcribe(filePath: string): Promise<string>;
}

export class OpenAISpeechEngine implements SpeechEngine {
  private client: OpenAI;

  constructor(readonly model: string, opts: ClientOptions = {}) {
    this.client = createClient(opts);
  }

  async verify(): Promise<void> {
    await this.client.models.retrieve(this.model);
  }

  async transcribe(filePath: string): Promise<string> {
    const resp = await this.client.audio.transcriptions.create({
      file: fs.createReadStream(filePath),
      model: this.model,
    });
    // Some servers answer with a text/plain body, which the client hands back as a string
    const body: unknown = resp;
    if (typeof body === "string") return body;
    return resp.text;
  }
}

export type LoadedTranscriber =
  | { transcriber: Transcriber; diagnostic: null }
  | { transcriber: null; diagnostic: string };

export interface LoadOptions extends ClientOptions {
  /** Engine to use instead of the OpenAI-compatible one */
  engine?: SpeechEngine;
}

function looksLikeDecoderFailure(message: string): boolean {
  return /ffmpeg|decod/i.test(message);
}

export class Transcriber {
  private constructor(private engine: SpeechEngine) {}

  get modelName(): string {
    return this.engine.model;
  }

  /**
   * Resolve a named model (e.g. "whisper-1", or "tiny"/"base"/"small" on a
   * local Whisper server). Never throws: a model that cannot be used comes
   * back as a null transcriber plus a diagnostic.
   */
  static async load(modelName: string, opts: LoadOptions = {}): Promise<LoadedTranscriber> {
    const name = modelName.trim();
    if (!name) {
      return { transcriber: null, diagnostic: "No transcription model name configured." };
    }

    const engine = opts.engine ?? new OpenAISpeechEngine(name, opts);
    console.log(`[transcriber] Loading model '${name}'...`);
    try {
      await engine.verify();
    } catch (err) {
      const { status, message } = describeClientError(err);
      const diagnostic =
        `Error loading transcription model '${name}': ${message}` +
        (status !== undefined ? ` (status ${status})` : "") +
        ". Check the model name and that the transcription host is reachable.";
      console.error(`[transcriber] ${diagnostic}`);
      return { transcriber: null, diagnostic };
    }

    console.log(`[transcriber] Model '${name}' ready`);
    return { transcriber: new Transcriber(engine), diagnostic: null };
  }

  async transcribe(audio: AudioHandle): Promise<Result<Transcript>> {
    try {
      await access(audio.path);
    } catch (err) {
      if (isMissing(err)) {
        return fail("file_not_found", `Audio file ${audio.path} not found.`);
      }
      const { message } = describeClientError(err);
      return fail("transcription_error", `Audio file ${audio.path} cannot be read: ${message}`);
    }

    console.log(`[transcriber] Transcribing ${path.basename(audio.path)} with '${this.modelName}'...`);
    let text: unknown;
    try {
      text = await this.engine.transcribe(audio.path);
    } catch (err) {
      const { status, message } = describeClientError(err);
      console.error(`[transcriber] Transcription failed: ${message}`);
      return fail("transcription_error", `Error during transcription: ${message}`, {
        status,
        hint: looksLikeDecoderFailure(message) ? DECODER_HINT : undefined,
      });
    }

    if (typeof text !== "string") {
      console.error("[transcriber] Transcription response had no text");
      return fail("transcription_error", "Transcription response did not contain any text");
    }
    const transcript = text.trim();
    if (!transcript) {
      return fail("empty_transcript", "Transcription produced no text.");
    }
    console.log(`[transcriber] Transcription complete (${transcript.length} chars)`);
    return ok(transcript);
  }
}
