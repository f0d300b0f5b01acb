#!/usr/bin/env node
import { createInterface } from "readline/promises";
import { config } from "./config.js";
import { runCli } from "./cli/runCli.js";
import { buildServices } from "./pipeline/services.js";

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return ["y", "yes"].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
}

runCli(process.argv.slice(2), {
  services: (overrides) => buildServices(config, overrides),
  webhookUrl: config.teams.webhookUrl,
  webhookTimeoutMs: config.teams.timeoutMs,
  confirm,
  print: (line) => console.log(line),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("[cli] Error:", err);
    process.exitCode = 1;
  });
