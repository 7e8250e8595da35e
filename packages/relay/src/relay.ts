import { Bot } from "grammy";
import type { FastifyInstance } from "fastify";
import type {
  BotDescriptor,
  Logger,
  RelayConfig,
  RelayMetrics,
  RelayRuntimeConfig
} from "@camrelay/shared";
import { FfmpegCaptureAdapter, type CaptureAdapter } from "./capture.js";
import type { CommandListener } from "./commands/listener.js";
import { CommandRouter } from "./commands/router.js";
import { SlackCommandListener } from "./commands/slack.js";
import { TelegramCommandListener, grammyPoller, type TelegramPoller } from "./commands/telegram.js";
import { PullPointEventSource, type EventSource } from "./event-source.js";
import { createNotifiers, type NotifierFactories } from "./notifiers/notifier.js";
import { SlackNotifier } from "./notifiers/slack.js";
import { TelegramNotifier, grammySender, type TelegramSender } from "./notifiers/telegram.js";
import { OnvifPullPointClient } from "./onvif/client.js";
import { buildServer } from "./server.js";
import { CameraSession } from "./session.js";
import { Supervisor } from "./supervisor.js";

export interface Relay {
  supervisor: Supervisor;
  server: FastifyInstance;
  sessions: CameraSession[];
}

export interface TelegramClientSettings {
  /** Request timeout of the Bot API client. */
  timeoutSeconds: number;
  /** Long-poll wait of getUpdates, kept below `timeoutSeconds`. */
  pollTimeoutSec: number;
}

const MAX_POLL_TIMEOUT_SEC = 30;
const POLL_TIMEOUT_HEADROOM_SEC = 5;

export function telegramClientSettings(notifyTimeoutMs: number): TelegramClientSettings {
  const timeoutSeconds = Math.max(1, Math.ceil(notifyTimeoutMs / 1000));
  // 0 falls back to short polling
  const pollTimeoutSec = Math.max(0, Math.min(MAX_POLL_TIMEOUT_SEC, timeoutSeconds - POLL_TIMEOUT_HEADROOM_SEC));
  return { timeoutSeconds, pollTimeoutSec };
}

/** Seams for tests; production wiring fills every one. */
export interface RelayOverrides {
  source?: EventSource;
  capture?: CaptureAdapter;
  notifierFactories?: Partial<NotifierFactories>;
  telegram?: (
    bot: BotDescriptor,
    settings: TelegramClientSettings
  ) => { sender: TelegramSender; poller: TelegramPoller };
  now?: () => number;
}

export function buildRelay(args: {
  config: RelayConfig;
  runtime: RelayRuntimeConfig;
  logger: Logger;
  metrics: RelayMetrics;
  overrides?: RelayOverrides;
}): Relay {
  const { config, runtime, logger, metrics } = args;
  const overrides = args.overrides ?? {};
  const serviceName = runtime.serviceName;

  // one grammy Bot per token, shared by its notifier and its command listener
  const telegramClients = new Map<string, { sender: TelegramSender; poller: TelegramPoller }>();
  const telegramFor = (bot: BotDescriptor): { sender: TelegramSender; poller: TelegramPoller } => {
    const existing = telegramClients.get(bot.name);
    if (existing) {
      return existing;
    }
    const settings = telegramClientSettings(runtime.notifyTimeoutMs);
    let created: { sender: TelegramSender; poller: TelegramPoller };
    if (overrides.telegram) {
      created = overrides.telegram(bot, settings);
    } else {
      const client = new Bot(bot.token, { client: { timeoutSeconds: settings.timeoutSeconds } });
      created = { sender: grammySender(client.api), poller: grammyPoller(client, settings.pollTimeoutSec) };
    }
    telegramClients.set(bot.name, created);
    return created;
  };

  const notifiers = createNotifiers(config.bots, {
    telegram: (bot) => new TelegramNotifier(bot, telegramFor(bot).sender, logger),
    slack: (bot) => new SlackNotifier(bot, logger, { timeoutMs: runtime.notifyTimeoutMs }),
    ...overrides.notifierFactories
  });

  const capture = overrides.capture ?? new FfmpegCaptureAdapter({
    ffmpegPath: runtime.ffmpegPath,
    graceMs: runtime.captureGraceMs,
    logger: logger.child({ component: "capture" })
  });

  const sessions = config.cameras.map((camera) => {
    const notifier = notifiers.get(camera.bot);
    if (!notifier) {
      throw new Error(`camera ${camera.name} references unknown bot ${camera.bot}`);
    }
    return new CameraSession({ camera, capture, notifier, logger, serviceName, metrics, now: overrides.now });
  });

  const listeners: CommandListener[] = [];
  const slackListeners = new Map<string, SlackCommandListener>();
  for (const bot of config.bots.values()) {
    const router = new CommandRouter(bot.name, sessions, logger);
    if (router.cameraNames.length === 0) {
      logger.info("bot has no cameras, not listening for commands", { bot: bot.name });
      continue;
    }
    if (bot.kind === "telegram") {
      listeners.push(new TelegramCommandListener(bot, telegramFor(bot).poller, router, logger));
    } else {
      const listener = new SlackCommandListener({ bot, router, logger, now: overrides.now });
      slackListeners.set(bot.name, listener);
      listeners.push(listener);
    }
  }

  const source = overrides.source ?? new PullPointEventSource({
    config: {
      subscriptionSec: runtime.subscriptionSec,
      pullWaitSec: runtime.pullWaitSec,
      renewMarginSec: runtime.renewMarginSec,
      pullFailureLimit: runtime.pullFailureLimit
    },
    createClient: (camera) => new OnvifPullPointClient(camera, { timeoutMs: runtime.onvifTimeoutMs }),
    logger: logger.child({ component: "event-source" }),
    serviceName,
    metrics
  });

  const supervisor = new Supervisor({
    sessions,
    source,
    listeners,
    notifiers,
    logger,
    serviceName,
    metrics,
    backoff: { initialMs: runtime.sourceBackoffInitialMs, maxMs: runtime.sourceBackoffMaxMs },
    shutdownTimeoutMs: runtime.shutdownTimeoutMs,
    announceLifecycle: runtime.announceLifecycle
  });

  const server = buildServer({ serviceName, sessions, slackListeners, metrics, logger });

  return { supervisor, server, sessions };
}
