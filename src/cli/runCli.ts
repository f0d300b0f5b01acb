import { parseArgs as parseArgv } from "util";
import { openAudio } from "../audio/audioSource.js";
import {
  attachAudio,
  audioFailed,
  canPost,
  createSession,
  postActionItems,
  runPipeline,
} from "../pipeline/audioPipeline.js";
import type { ModelOverrides, ServiceFactory } from "../pipeline/services.js";
import { describeError, type Notice, type PipelineSession, type Result } from "../pipeline/types.js";

export interface CliDeps {
  services: ServiceFactory;
  webhookUrl: string;
  webhookTimeoutMs: number;
  /** Ask a yes/no question; resolves true for yes */
  confirm: (question: string) => Promise<boolean>;
  print: (line: string) => void;
}

export interface CliArgs {
  audioPath: string | null;
  yes: boolean;
  /** Replaces the configured webhook URL for this run */
  webhookUrl: string | null;
  overrides: ModelOverrides;
}

export const USAGE =
  "Usage: voice-memo <audio.wav> [--yes] [--model <transcription model>] [--text-model <name>] [--text-host <url>] [--webhook <url>]";

/** Throws on an unknown flag or a flag missing its value. */
export function parseArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgv({
    args: argv,
    allowPositionals: true,
    options: {
      yes: { type: "boolean", short: "y" },
      model: { type: "string" },
      "text-model": { type: "string" },
      "text-host": { type: "string" },
      webhook: { type: "string" },
    },
  });
  return {
    audioPath: positionals[0] ?? null,
    yes: values.yes ?? false,
    webhookUrl: values.webhook ?? null,
    overrides: {
      transcriptionModel: values.model,
      textModel: values["text-model"],
      textModelHost: values["text-host"],
    },
  };
}

function section(print: (line: string) => void, title: string, text: string): void {
  print(`\n--- ${title} ---`);
  print(text);
}

function resultText(result: Result<string> | null): string {
  if (!result) return "";
  return result.ok ? result.value : describeError(result.error);
}

function printNotices(print: (line: string) => void, notices: Notice[]): void {
  for (const n of notices) {
    print(`[${n.level}] ${n.text}`);
  }
}

/**
 * Process one audio file and, when asked to, post its action items.
 * Resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const { print } = deps;
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    print(err instanceof Error ? err.message : String(err));
    print(USAGE);
    return 2;
  }
  if (!args.audioPath) {
    print(USAGE);
    return 2;
  }

  let session: PipelineSession = createSession();
  const audio = await openAudio(args.audioPath);
  if (!audio.ok) {
    session = audioFailed(session, audio.error);
    printNotices(print, session.notices);
    return 1;
  }

  session = await runPipeline(attachAudio(session, audio.value), await deps.services(args.overrides));

  if (session.transcript) section(print, "Transcript", session.transcript);
  if (session.summary) section(print, "Summary", resultText(session.summary));
  if (session.actionItems) {
    const items = session.actionItems.ok ? session.actionItems.value.text : describeError(session.actionItems.error);
    section(print, "Action Items", items);
  }
  print("");

  const webhookUrl = args.webhookUrl ?? deps.webhookUrl;
  if (canPost(session)) {
    if (!webhookUrl.trim()) {
      session = await postActionItems(session, { webhookUrl });
    } else if (args.yes || (await deps.confirm("Do you want to post these action items? (yes/no): "))) {
      session = await postActionItems(session, {
        webhookUrl,
        timeoutMs: deps.webhookTimeoutMs,
      });
    } else {
      print("Skipping post.");
    }
  }

  printNotices(print, session.notices);
  return session.state.stage === "failed" ? 1 : 0;
}
