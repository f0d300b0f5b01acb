import path from "path";
import express from "express";
import { config } from "./config.js";
import { openAudio, saveUpload } from "./audio/audioSource.js";
import {
  attachAudio,
  audioFailed,
  canPost,
  createSession,
  postActionItems,
  runPipeline,
} from "./pipeline/audioPipeline.js";
import { deleteRun, getRun, listRuns, saveRun } from "./pipeline/runStore.js";
import { buildServices, type ModelOverrides, type ServiceFactory } from "./pipeline/services.js";
import type { PipelineSession } from "./pipeline/types.js";

export interface AppDeps {
  services: ServiceFactory;
  webhookUrl: string;
  webhookTimeoutMs: number;
  uploadDir: string;
}

const defaultDeps: AppDeps = {
  services: (overrides) => buildServices(config, overrides),
  webhookUrl: config.teams.webhookUrl,
  webhookTimeoutMs: config.teams.timeoutMs,
  uploadDir: config.uploadDir,
};

function view(session: PipelineSession) {
  return { ...session, canPost: canPost(session) };
}

function field(source: unknown, key: string): string | undefined {
  if (typeof source !== "object" || source === null) return undefined;
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" && value.trim() ? value : undefined;
}

// Same names in the JSON body or, for uploads, the query string
function overridesFrom(source: unknown): ModelOverrides {
  return {
    transcriptionModel: field(source, "transcriptionModel"),
    textModel: field(source, "textModel"),
    textModelHost: field(source, "textModelHost"),
  };
}

export function createApp(deps: AppDeps = defaultDeps): express.Express {
  const app = express();

  app.use(express.json());
  app.use(express.raw({ type: ["audio/*", "application/octet-stream"], limit: "200mb" }));

  app.get("/", (_req, res) => {
    res.json({ status: "ok", service: "voice-memo-pipeline" });
  });

  // GET /runs — runs processed by this process, newest first
  app.get("/runs", (_req, res) => {
    const runs = listRuns();
    res.json({
      status: "ok",
      count: runs.length,
      data: runs.map((r) => ({ id: r.id, stage: r.state.stage, audio: r.audio?.path ?? null, updatedAt: r.updatedAt })),
    });
  });

  // POST /runs — process a WAV file, either uploaded as the body or named by { audioPath }.
  // transcriptionModel, textModel and textModelHost pick the models for this run.
  app.post("/runs", async (req, res) => {
    try {
      let audioPath: string | undefined;
      let displayName: string | undefined;
      let overrides: ModelOverrides;
      if (Buffer.isBuffer(req.body)) {
        if (req.body.length === 0) {
          res.status(400).json({ status: "error", message: "Uploaded audio is empty" });
          return;
        }
        const name = field(req.query, "name");
        audioPath = await saveUpload(req.body, deps.uploadDir, name);
        displayName = name ? path.basename(name) : "Uploaded/Recorded Audio";
        overrides = overridesFrom(req.query);
      } else {
        audioPath = field(req.body, "audioPath");
        overrides = overridesFrom(req.body);
      }

      if (!audioPath) {
        res.status(400).json({ status: "error", message: "Upload a WAV body or send { audioPath }" });
        return;
      }

      const session = createSession();
      const audio = await openAudio(audioPath, displayName);
      if (!audio.ok) {
        const failedRun = audioFailed(session, audio.error);
        saveRun(failedRun);
        res.status(400).json({ status: "error", message: audio.error.message, data: view(failedRun) });
        return;
      }

      const result = await runPipeline(attachAudio(session, audio.value), await deps.services(overrides));
      saveRun(result);
      res.status(201).json({ status: "ok", data: view(result) });
    } catch (err) {
      console.error("[server] Run failed:", err);
      res.status(500).json({ status: "error", message: "Processing failed" });
    }
  });

  // GET /runs/:id — full run detail
  app.get("/runs/:id", (req, res) => {
    const run = getRun(req.params.id);
    if (!run) {
      res.status(404).json({ status: "error", message: "Run not found" });
      return;
    }
    res.json({ status: "ok", data: view(run) });
  });

  // POST /runs/:id/post — explicit trigger to post the run's action items; { webhookUrl } overrides the configured one
  app.post("/runs/:id/post", async (req, res) => {
    const run = getRun(req.params.id);
    if (!run) {
      res.status(404).json({ status: "error", message: "Run not found" });
      return;
    }
    if (!canPost(run)) {
      res.status(409).json({ status: "error", message: "No actionable items to post" });
      return;
    }

    try {
      const result = await postActionItems(run, {
        webhookUrl: field(req.body, "webhookUrl") ?? deps.webhookUrl,
        timeoutMs: deps.webhookTimeoutMs,
      });
      saveRun(result);
      res.json({ status: "ok", data: view(result) });
    } catch (err) {
      console.error("[server] Post failed:", err);
      res.status(500).json({ status: "error", message: "Posting failed" });
    }
  });

  // DELETE /runs/:id — forget a run
  app.delete("/runs/:id", (req, res) => {
    if (!deleteRun(req.params.id)) {
      res.status(404).json({ status: "error", message: "Run not found" });
      return;
    }
    res.json({ status: "ok", message: "Run deleted", id: req.params.id });
  });

  return app;
}

export function startServer(deps?: AppDeps): void {
  const app = createApp(deps);
  app.listen(config.port, () => {
    console.log(`[server] listening on port ${config.port}`);
  });
}
