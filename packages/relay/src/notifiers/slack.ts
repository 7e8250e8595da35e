import { z } from "zod";
import {
  DeliveryFailed,
  HttpStatusError,
  RequestTimeoutError,
  describeError,
  requestWithRetry,
  type BotDescriptor,
  type Logger
} from "@camrelay/shared";
import type { Notifier } from "./notifier.js";

export const SLACK_API_BASE_URL = "https://slack.com/api";

const slackResponseSchema = z
  .object({
    ok: z.boolean(),
    error: z.string().optional(),
    upload_url: z.string().optional(),
    file_id: z.string().optional()
  })
  .passthrough();

type SlackResponse = z.infer<typeof slackResponseSchema>;

export interface SlackNotifierOptions {
  timeoutMs: number;
  apiBaseUrl?: string;
}

function describeSlackFailure(error: unknown): string {
  if (error instanceof DeliveryFailed) {
    return error.reason;
  }
  if (error instanceof HttpStatusError) {
    return `slack HTTP ${error.status}`;
  }
  if (error instanceof RequestTimeoutError) {
    return "slack request timed out";
  }
  return describeError(error);
}

export class SlackNotifier implements Notifier {
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    readonly bot: BotDescriptor,
    private readonly logger: Logger,
    options: SlackNotifierOptions
  ) {
    this.apiBaseUrl = (options.apiBaseUrl ?? SLACK_API_BASE_URL).replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs;
  }

  async sendAlert(text: string): Promise<void> {
    await this.deliver("alert", async () => {
      await this.callJson("chat.postMessage", { channel: this.bot.channelId, text });
    });
  }

  async sendImage(blob: Buffer, caption: string): Promise<void> {
    await this.deliver("image", () => this.uploadFile(blob, "motion.jpg", caption));
  }

  async sendVideo(blob: Buffer, caption: string): Promise<void> {
    await this.deliver("video", () => this.uploadFile(blob, "motion.mp4", caption));
  }

  private async deliver(kind: string, call: () => Promise<void>): Promise<void> {
    try {
      await call();
      this.logger.debug("slack delivery ok", { bot: this.bot.name, kind });
    } catch (error) {
      if (error instanceof DeliveryFailed) {
        throw error;
      }
      throw new DeliveryFailed(describeSlackFailure(error), { cause: error });
    }
  }

  /** files.getUploadURLExternal, raw upload, then files.completeUploadExternal into the channel. */
  private async uploadFile(blob: Buffer, filename: string, caption: string): Promise<void> {
    const ticket = await this.callForm("files.getUploadURLExternal", {
      filename,
      length: String(blob.length)
    });
    if (!ticket.upload_url || !ticket.file_id) {
      throw new DeliveryFailed("slack upload ticket missing url");
    }

    await requestWithRetry(ticket.upload_url, {
      method: "POST",
      headers: { "content-type": "application/octet-stream" },
      body: new Uint8Array(blob)
    }, {
      timeoutMs: this.timeoutMs,
      retries: 0
    });

    await this.callJson("files.completeUploadExternal", {
      files: [{ id: ticket.file_id, title: filename }],
      channel_id: this.bot.channelId,
      initial_comment: caption
    });
  }

  private async callJson(method: string, payload: Record<string, unknown>): Promise<SlackResponse> {
    return await this.call(method, "application/json; charset=utf-8", JSON.stringify(payload));
  }

  private async callForm(method: string, fields: Record<string, string>): Promise<SlackResponse> {
    return await this.call(method, "application/x-www-form-urlencoded", new URLSearchParams(fields).toString());
  }

  private async call(method: string, contentType: string, body: string): Promise<SlackResponse> {
    const response = await requestWithRetry(`${this.apiBaseUrl}/${method}`, {
      method: "POST",
      headers: {
        "content-type": contentType,
        authorization: `Bearer ${this.bot.token}`
      },
      body
    }, {
      timeoutMs: this.timeoutMs,
      retries: 0
    });

    const parsed = slackResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DeliveryFailed(`slack ${method} returned an unexpected body`);
    }
    if (!parsed.data.ok) {
      throw new DeliveryFailed(`slack ${method}: ${parsed.data.error ?? "unknown_error"}`);
    }
    return parsed.data;
  }
}
