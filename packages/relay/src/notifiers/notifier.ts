import type { BotDescriptor, BotKind } from "@camrelay/shared";

/**
 * What a messaging backend must support to carry camera alerts. One instance per
 * configured bot, bound to that bot's token and destination channel. Every method
 * rejects with DeliveryFailed; none of them retries.
 */
export interface Notifier {
  readonly bot: BotDescriptor;
  sendAlert(text: string): Promise<void>;
  sendImage(blob: Buffer, caption: string): Promise<void>;
  sendVideo(blob: Buffer, caption: string): Promise<void>;
}

export type NotifierFactory = (bot: BotDescriptor) => Notifier;

export type NotifierFactories = Record<BotKind, NotifierFactory>;

/** Picks the backend by the bot's declared kind, once, at configuration load. */
export function createNotifiers(
  bots: ReadonlyMap<string, BotDescriptor>,
  factories: NotifierFactories
): Map<string, Notifier> {
  const notifiers = new Map<string, Notifier>();
  for (const [name, bot] of bots) {
    notifiers.set(name, factories[bot.kind](bot));
  }
  return notifiers;
}
