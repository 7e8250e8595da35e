import { GrammyError, HttpError, InputFile, type Api } from "grammy";
import { DeliveryFailed, describeError, type BotDescriptor, type Logger } from "@camrelay/shared";
import type { Notifier } from "./notifier.js";

export const TELEGRAM_CAPTION_LIMIT = 1024;

/** The slice of the Bot API the notifier calls, so tests can stand in for grammy. */
export interface TelegramSender {
  sendMessage(chatId: string, text: string): Promise<unknown>;
  sendPhoto(chatId: string, photo: Buffer, caption: string): Promise<unknown>;
  sendVideo(chatId: string, video: Buffer, caption: string): Promise<unknown>;
}

export function grammySender(api: Api): TelegramSender {
  return {
    sendMessage: (chatId, text) => api.sendMessage(chatId, text),
    sendPhoto: (chatId, photo, caption) => api.sendPhoto(chatId, new InputFile(photo, "motion.jpg"), { caption }),
    sendVideo: (chatId, video, caption) =>
      api.sendVideo(chatId, new InputFile(video, "motion.mp4"), { caption, supports_streaming: true })
  };
}

export function truncateCaption(caption: string, limit = TELEGRAM_CAPTION_LIMIT): string {
  if (caption.length <= limit) {
    return caption;
  }
  return `${caption.slice(0, limit - 3)}...`;
}

function describeTelegramError(error: unknown): string {
  if (error instanceof GrammyError) {
    return `telegram ${error.error_code}: ${error.description}`;
  }
  if (error instanceof HttpError) {
    return `telegram unreachable: ${describeError(error.error)}`;
  }
  return describeError(error);
}

export class TelegramNotifier implements Notifier {
  constructor(
    readonly bot: BotDescriptor,
    private readonly sender: TelegramSender,
    private readonly logger: Logger
  ) {}

  async sendAlert(text: string): Promise<void> {
    await this.deliver("alert", () => this.sender.sendMessage(this.bot.channelId, text));
  }

  async sendImage(blob: Buffer, caption: string): Promise<void> {
    await this.deliver("image", () => this.sender.sendPhoto(this.bot.channelId, blob, truncateCaption(caption)));
  }

  async sendVideo(blob: Buffer, caption: string): Promise<void> {
    await this.deliver("video", () => this.sender.sendVideo(this.bot.channelId, blob, truncateCaption(caption)));
  }

  private async deliver(kind: string, call: () => Promise<unknown>): Promise<void> {
    try {
      await call();
      this.logger.debug("telegram delivery ok", { bot: this.bot.name, kind });
    } catch (error) {
      throw new DeliveryFailed(describeTelegramError(error), { cause: error });
    }
  }
}
