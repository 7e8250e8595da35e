import { createHmac, timingSafeEqual } from "node:crypto";
import type { BotDescriptor, Logger } from "@camrelay/shared";
import type { CommandListener } from "./listener.js";
import { parseChatCommand, type CommandRouter } from "./router.js";

const MAX_SKEW_MS = 5 * 60 * 1000;

export type HeaderMap = Record<string, string | string[] | undefined>;

export type SlackCommandResponse = {
  status: number;
  body: { response_type?: "ephemeral"; text: string };
};

function header(headers: HeaderMap, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function constantTimeEquals(left: string, right: string): boolean {
  const leftBuffer = Buffer.from(left);
  const rightBuffer = Buffer.from(right);
  if (leftBuffer.length !== rightBuffer.length) {
    return false;
  }
  return timingSafeEqual(leftBuffer, rightBuffer);
}

export function signSlackRequest(signingSecret: string, timestamp: string, rawBody: string): string {
  const digest = createHmac("sha256", signingSecret).update(`v0:${timestamp}:${rawBody}`).digest("hex");
  return `v0=${digest}`;
}

/**
 * Checks Slack's v0 request signature. `timestamp` is the
 * x-slack-request-timestamp header in epoch seconds.
 */
export function verifySlackSignature(args: {
  signingSecret: string;
  timestamp?: string;
  signature?: string;
  rawBody: string;
  nowMs: number;
}): { ok: boolean; reason?: string } {
  if (!args.timestamp || !args.signature) {
    return { ok: false, reason: "missing_signature" };
  }

  const tsSec = Number(args.timestamp);
  if (!Number.isFinite(tsSec) || Math.abs(args.nowMs - tsSec * 1000) > MAX_SKEW_MS) {
    return { ok: false, reason: "invalid_timestamp" };
  }

  const expected = signSlackRequest(args.signingSecret, args.timestamp, args.rawBody);
  if (!constantTimeEquals(expected, args.signature)) {
    return { ok: false, reason: "signature_mismatch" };
  }
  return { ok: true };
}

function ephemeral(text: string): SlackCommandResponse {
  return { status: 200, body: { response_type: "ephemeral", text } };
}

/**
 * Slash commands posted to the status server. Slack delivers them over HTTP, so
 * start/stop only toggle whether requests are honoured.
 */
export class SlackCommandListener implements CommandListener {
  private readonly bot: BotDescriptor;
  private readonly router: CommandRouter;
  private readonly logger: Logger;
  private readonly now: () => number;
  private accepting = false;

  constructor(args: {
    bot: BotDescriptor;
    router: CommandRouter;
    logger: Logger;
    now?: () => number;
  }) {
    this.bot = args.bot;
    this.router = args.router;
    this.logger = args.logger.child({ bot: args.bot.name, listener: "slack" });
    this.now = args.now ?? (() => Date.now());
  }

  get botName(): string {
    return this.bot.name;
  }

  async start(): Promise<void> {
    if (!this.bot.signingSecret) {
      this.logger.warn("slack signing secret missing, slash commands will be rejected");
    }
    this.accepting = true;
    this.logger.info("slack slash commands enabled", { cameras: this.router.cameraNames });
  }

  async stop(): Promise<void> {
    this.accepting = false;
  }

  handle(rawBody: string, headers: HeaderMap): SlackCommandResponse {
    if (!this.bot.signingSecret) {
      return { status: 401, body: { text: "slash commands are not configured for this bot" } };
    }

    const verified = verifySlackSignature({
      signingSecret: this.bot.signingSecret,
      timestamp: header(headers, "x-slack-request-timestamp"),
      signature: header(headers, "x-slack-signature"),
      rawBody,
      nowMs: this.now()
    });
    if (!verified.ok) {
      this.logger.warn("slack signature failed", { reason: verified.reason });
      return { status: 401, body: { text: "invalid signature" } };
    }

    if (!this.accepting) {
      return ephemeral("The relay is shutting down, try again later.");
    }

    const params = new URLSearchParams(rawBody);
    const channelId = params.get("channel_id") ?? "";
    if (channelId !== this.bot.channelId) {
      this.logger.warn("command from unconfigured channel ignored", { channelId });
      return ephemeral("Commands are not accepted in this channel.");
    }

    const rawCommand = params.get("command") ?? "";
    const command = parseChatCommand(rawCommand);
    if (!command) {
      return ephemeral(`Unknown command "${rawCommand}". Use /grabimage or /grabvideo.`);
    }

    return ephemeral(this.router.dispatch(command, params.get("text") ?? "").text);
  }
}
