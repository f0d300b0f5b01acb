import { fmtAdaptiveCard } from "./format.js";

export const DEFAULT_TIMEOUT_MS = 10_000;

export class InvalidConfigError extends Error {
  readonly kind = "invalid_config";

  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigError";
  }
}

export type DeliveryResult =
  | { delivered: true; status: number }
  | { delivered: false; reason: "empty_body" }
  | { delivered: false; reason: "http_error"; status: number; body: string }
  | { delivered: false; reason: "unexpected_response"; status: number; body: string }
  | { delivered: false; reason: "transport_error"; message: string };

export function describeDelivery(result: DeliveryResult): string {
  if (result.delivered) return `Delivered (status ${result.status})`;
  switch (result.reason) {
    case "empty_body":
      return "Message text is empty. Nothing to post.";
    case "http_error":
      return `HTTP error ${result.status} from webhook. Response: ${result.body || "(empty)"}`;
    case "unexpected_response":
      return `Unexpected webhook response ${result.status}. Response: ${result.body || "(empty)"}`;
    case "transport_error":
      return `Error posting to webhook, no response received: ${result.message}`;
  }
}

export interface PosterOptions {
  timeoutMs?: number;
}

/** Posts adaptive cards to a chat channel's incoming webhook. */
export class NotificationPoster {
  readonly webhookUrl: string;
  private timeoutMs: number;

  constructor(webhookUrl: string, opts: PosterOptions = {}) {
    if (!webhookUrl || !webhookUrl.trim()) {
      throw new InvalidConfigError("Webhook URL cannot be empty.");
    }
    if (!webhookUrl.startsWith("https://")) {
      console.warn(
        "[poster] Warning: the webhook URL does not use https://. Make sure it is a real incoming webhook URL."
      );
    }
    this.webhookUrl = webhookUrl;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async send(title: string, body: string): Promise<DeliveryResult> {
    if (!body || !body.trim()) {
      console.log("[poster] Message text is empty. Nothing to send.");
      return { delivered: false, reason: "empty_body" };
    }

    console.log("[poster] Posting card to webhook...");
    let resp: Response;
    let text: string;
    try {
      resp = await fetch(this.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(fmtAdaptiveCard(title, body)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await resp.text();
    } catch (err) {
      const result: DeliveryResult = {
        delivered: false,
        reason: "transport_error",
        message: err instanceof Error ? err.message : String(err),
      };
      console.error(`[poster] ${describeDelivery(result)}`);
      return result;
    }

    let result: DeliveryResult;
    if (resp.status >= 400) {
      result = { delivered: false, reason: "http_error", status: resp.status, body: text };
    } else if (resp.status === 200 || text === "1") {
      // Some webhook providers answer a successful post with a bare "1"
      result = { delivered: true, status: resp.status };
    } else {
      result = { delivered: false, reason: "unexpected_response", status: resp.status, body: text };
    }

    if (result.delivered) {
      console.log("[poster] Message posted successfully");
    } else {
      console.error(`[poster] ${describeDelivery(result)}`);
    }
    return result;
  }

  async post(title: string, body: string): Promise<boolean> {
    const result = await this.send(title, body);
    return result.delivered;
  }
}
