import fs from "fs/promises";
import path from "path";
import type { Server } from "http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp, type AppDeps } from "./server.js";
import { clearRuns } from "./pipeline/runStore.js";
import { TextProcessor } from "./knowledge/textProcessor.js";
import { Transcriber } from "./transcription/transcriber.js";
import { fakeEngine, makeWav, meetingModel, tempDir, writeWav } from "./testing/fakes.js";
import { startStub, type HttpStub } from "./testing/httpStub.js";
import type { ModelOverrides } from "./pipeline/services.js";

function runIdOf(body: unknown): string {
  if (typeof body === "object" && body !== null && "data" in body) {
    const { data } = body;
    if (typeof data === "object" && data !== null && "id" in data && typeof data.id === "string") {
      return data.id;
    }
  }
  throw new Error(`No run id in ${JSON.stringify(body)}`);
}

describe("server", () => {
  let dir: string;
  let server: Server;
  let baseUrl: string;
  let webhook: HttpStub;
  let serviceCalls: (ModelOverrides | undefined)[];

  async function start(transcript: string, items: string, webhookUrl?: string): Promise<void> {
    const deps: AppDeps = {
      services: async (overrides) => {
        serviceCalls.push(overrides);
        const engine = fakeEngine(async () => transcript);
        return {
          transcriber: await Transcriber.load(engine.model, { engine }),
          processor: await TextProcessor.create(meetingModel(items)),
        };
      },
      webhookUrl: webhookUrl ?? webhook.url,
      webhookTimeoutMs: 1_000,
      uploadDir: path.join(dir, "uploads"),
    };
    await new Promise<void>((resolve) => {
      server = createApp(deps).listen(0, "127.0.0.1", resolve);
    });
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server did not bind");
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  async function createRun(audioPath: string): Promise<{ status: number; body: unknown }> {
    const resp = await fetch(`${baseUrl}/runs`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ audioPath }),
    });
    return { status: resp.status, body: await resp.json() };
  }

  beforeEach(async () => {
    dir = await tempDir();
    serviceCalls = [];
    webhook = await startStub(() => ({ status: 200, body: "1", contentType: "text/plain" }));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    clearRuns();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await webhook.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("answers the health check", async () => {
    await start("x", "- x");

    const resp = await fetch(baseUrl);

    expect(await resp.json()).toEqual({ status: "ok", service: "voice-memo-pipeline" });
  });

  it("processes a file by path and posts on request", async () => {
    await start("Mike will fix the login bug by Friday.", "- Mike: fix the login bug by Friday");
    const audio = await writeWav(dir, "standup.wav");

    const created = await createRun(audio);

    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({
      status: "ok",
      data: {
        state: { stage: "processed" },
        transcript: "Mike will fix the login bug by Friday.",
        canPost: true,
      },
    });
    expect(webhook.requests).toHaveLength(0);

    const posted = await fetch(`${baseUrl}/runs/${runIdOf(created.body)}/post`, { method: "POST" });

    expect(posted.status).toBe(200);
    expect(await posted.json()).toMatchObject({ data: { state: { stage: "posted" }, canPost: false } });
    expect(webhook.requests).toHaveLength(1);
  });

  it("accepts an uploaded WAV body", async () => {
    await start("Sarah sends the budget.", "- Sarah: send the budget");

    const resp = await fetch(`${baseUrl}/runs?name=budget.wav`, {
      method: "POST",
      headers: { "Content-Type": "audio/wav" },
      body: makeWav(),
    });
    expect(resp.status).toBe(201);
    expect(await resp.json()).toMatchObject({ data: { state: { stage: "processed" } } });
    const uploads = await fs.readdir(path.join(dir, "uploads"));
    expect(uploads).toHaveLength(1);
    expect(uploads[0]).toMatch(/-budget\.wav$/);
  });

  it("binds the models named in the request", async () => {
    await start("Mike will fix the login bug.", "- Mike: fix the login bug");
    const audio = await writeWav(dir, "standup.wav");

    const resp = await fetch(`${baseUrl}/runs`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        audioPath: audio,
        transcriptionModel: "small",
        textModel: "llama3",
        textModelHost: "http://localhost:11434/v1",
      }),
    });

    expect(resp.status).toBe(201);
    expect(serviceCalls).toEqual([
      { transcriptionModel: "small", textModel: "llama3", textModelHost: "http://localhost:11434/v1" },
    ]);
  });

  it("titles an uploaded run with the caller's file name", async () => {
    await start("Sarah sends the budget.", "- Sarah: send the budget");

    const created = await fetch(`${baseUrl}/runs?name=budget.wav&transcriptionModel=base`, {
      method: "POST",
      headers: { "Content-Type": "audio/wav" },
      body: makeWav(),
    });
    const body: unknown = await created.json();
    await fetch(`${baseUrl}/runs/${runIdOf(body)}/post`, { method: "POST" });

    expect(serviceCalls).toEqual([{ transcriptionModel: "base" }]);
    expect(body).toMatchObject({ data: { audio: { name: "budget.wav" } } });
    expect(webhook.requests).toHaveLength(1);
    expect(JSON.parse(webhook.requests[0].body)).toMatchObject({
      attachments: [
        { content: { body: [{ text: "Action Items from: budget.wav" }, { text: "- Sarah: send the budget" }] } },
      ],
    });
  });

  it("posts to the webhook URL given with the request", async () => {
    const other = await startStub(() => ({ status: 200, body: "1", contentType: "text/plain" }));
    try {
      await start("Mike will fix the login bug.", "- Mike: fix the login bug");
      const created = await createRun(await writeWav(dir, "standup.wav"));

      const resp = await fetch(`${baseUrl}/runs/${runIdOf(created.body)}/post`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ webhookUrl: other.url }),
      });

      expect(resp.status).toBe(200);
      expect(other.requests).toHaveLength(1);
      expect(webhook.requests).toHaveLength(0);
    } finally {
      await other.close();
    }
  });

  it("refuses to post a run without action items", async () => {
    await start("The sky is blue.", "No specific action items found");
    const created = await createRun(await writeWav(dir, "sky.wav"));

    const resp = await fetch(`${baseUrl}/runs/${runIdOf(created.body)}/post`, { method: "POST" });

    expect(created.body).toMatchObject({ data: { canPost: false } });
    expect(resp.status).toBe(409);
    expect(webhook.requests).toHaveLength(0);
  });

  it("skips posting when no webhook is configured", async () => {
    await start("Mike will fix the login bug.", "- Mike: fix the login bug", "");
    const created = await createRun(await writeWav(dir, "standup.wav"));

    const resp = await fetch(`${baseUrl}/runs/${runIdOf(created.body)}/post`, { method: "POST" });

    expect(resp.status).toBe(200);
    expect(await resp.json()).toMatchObject({
      data: {
        state: { stage: "processed" },
        notices: expect.arrayContaining([
          { level: "info", text: "Webhook URL not set. Skipping posting; set TEAMS_WEBHOOK_URL to enable it." },
        ]),
      },
    });
  });

  it("rejects a missing audio file", async () => {
    await start("x", "- x");
    const missing = path.join(dir, "nope.wav");

    const created = await createRun(missing);

    expect(created.status).toBe(400);
    expect(created.body).toMatchObject({
      status: "error",
      message: `Audio file ${missing} not found.`,
      data: {
        state: {
          stage: "failed",
          failedAt: "audio",
          error: { kind: "file_not_found", message: `Audio file ${missing} not found.` },
        },
      },
    });
  });

  it("rejects a request without audio", async () => {
    await start("x", "- x");

    const resp = await fetch(`${baseUrl}/runs`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({}),
    });

    expect(resp.status).toBe(400);
  });

  it("returns 404 for unknown runs", async () => {
    await start("x", "- x");

    expect((await fetch(`${baseUrl}/runs/unknown`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/runs/unknown/post`, { method: "POST" })).status).toBe(404);
    expect((await fetch(`${baseUrl}/runs/unknown`, { method: "DELETE" })).status).toBe(404);
  });

  it("lists and deletes runs", async () => {
    await start("Mike will fix the login bug.", "- Mike: fix the login bug");
    const created = await createRun(await writeWav(dir, "standup.wav"));

    const id = runIdOf(created.body);
    const list = await (await fetch(`${baseUrl}/runs`)).json();
    const deleted = await fetch(`${baseUrl}/runs/${id}`, { method: "DELETE" });

    expect(list).toMatchObject({ status: "ok", count: 1, data: [{ id, stage: "processed" }] });
    expect(deleted.status).toBe(200);
    expect((await fetch(`${baseUrl}/runs/${id}`)).status).toBe(404);
  });
});
