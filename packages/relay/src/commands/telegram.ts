import type { Bot } from "grammy";
import { describeError, type BotDescriptor, type Logger } from "@camrelay/shared";
import type { CommandListener } from "./listener.js";
import { CHAT_COMMANDS, type ChatCommand, type CommandRouter } from "./router.js";

export interface TelegramCommandContext {
  chatId?: string;
  argument: string;
  reply: (text: string) => Promise<unknown>;
}

export type TelegramCommandHandler = (ctx: TelegramCommandContext) => Promise<void>;

/** Long-polling surface of a Telegram bot, narrowed so tests can drive it without grammy. */
export interface TelegramPoller {
  onCommand: (command: ChatCommand, handler: TelegramCommandHandler) => void;
  onError: (handler: (error: unknown) => void) => void;
  /** Resolves when polling has stopped. */
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

/** `pollTimeoutSec` is the getUpdates long-poll wait; it must stay below the client's request timeout. */
export function grammyPoller(bot: Bot, pollTimeoutSec: number): TelegramPoller {
  return {
    onCommand: (command, handler) => {
      bot.command(command, async (ctx) => {
        await handler({
          chatId: ctx.chat === undefined ? undefined : String(ctx.chat.id),
          argument: typeof ctx.match === "string" ? ctx.match : "",
          reply: (text) => ctx.reply(text)
        });
      });
    },
    onError: (handler) => {
      bot.catch((error) => handler(error.error));
    },
    start: () => bot.start({ drop_pending_updates: true, timeout: pollTimeoutSec }),
    stop: () => bot.stop()
  };
}

export class TelegramCommandListener implements CommandListener {
  private readonly logger: Logger;
  private registered = false;
  private polling?: Promise<void>;

  constructor(
    private readonly bot: BotDescriptor,
    private readonly poller: TelegramPoller,
    private readonly router: CommandRouter,
    logger: Logger
  ) {
    this.logger = logger.child({ bot: bot.name, listener: "telegram" });
  }

  get botName(): string {
    return this.bot.name;
  }

  async start(): Promise<void> {
    if (!this.registered) {
      for (const command of CHAT_COMMANDS) {
        this.poller.onCommand(command, (ctx) => this.handle(command, ctx));
      }
      this.poller.onError((error) => {
        this.logger.error("telegram update handling failed", { error: describeError(error) });
      });
      this.registered = true;
    }

    if (this.polling) {
      return;
    }
    this.logger.info("telegram command polling started", { cameras: this.router.cameraNames });
    this.polling = this.poller.start().then(
      () => {
        this.logger.info("telegram command polling stopped");
      },
      (error: unknown) => {
        this.logger.error("telegram command polling failed", { error: describeError(error) });
      }
    );
  }

  async stop(): Promise<void> {
    if (!this.polling) {
      return;
    }
    try {
      await this.poller.stop();
    } catch (error) {
      this.logger.warn("telegram stop failed", { error: describeError(error) });
    }
    await this.polling;
    this.polling = undefined;
  }

  async handle(command: ChatCommand, ctx: TelegramCommandContext): Promise<void> {
    if (ctx.chatId !== this.bot.channelId) {
      this.logger.warn("command from unconfigured chat ignored", { command, chatId: ctx.chatId });
      return;
    }

    const reply = this.router.dispatch(command, ctx.argument);
    try {
      await ctx.reply(reply.text);
    } catch (error) {
      this.logger.warn("command reply failed", { command, error: describeError(error) });
    }
  }
}
