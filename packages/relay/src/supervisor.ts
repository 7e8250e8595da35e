import {
  calculateBackoffMs,
  describeError,
  sleep as abortableSleep,
  type BackoffPolicy,
  type Logger,
  type RelayMetrics
} from "@camrelay/shared";
import type { CommandListener } from "./commands/listener.js";
import type { EventSource } from "./event-source.js";
import type { Notifier } from "./notifiers/notifier.js";
import type { CameraSession } from "./session.js";

type SupervisorState = "created" | "running" | "stopping" | "stopped";

export interface SupervisorOptions {
  sessions: readonly CameraSession[];
  source: EventSource;
  listeners: readonly CommandListener[];
  notifiers: ReadonlyMap<string, Notifier>;
  logger: Logger;
  serviceName: string;
  backoff: BackoffPolicy;
  shutdownTimeoutMs: number;
  announceLifecycle: boolean;
  metrics?: RelayMetrics;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/**
 * Owns one event-source runner per camera plus the command listeners. A runner
 * that loses its subscription backs off and re-subscribes without touching the
 * other cameras.
 */
export class Supervisor {
  private readonly options: SupervisorOptions;
  private readonly logger: Logger;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly abort = new AbortController();
  private runners: Promise<void>[] = [];
  private state: SupervisorState = "created";

  constructor(options: SupervisorOptions) {
    this.options = options;
    this.logger = options.logger;
    this.sleep = options.sleep ?? abortableSleep;
  }

  get running(): boolean {
    return this.state === "running";
  }

  async start(): Promise<void> {
    if (this.state !== "created") {
      throw new Error(`supervisor cannot start from state ${this.state}`);
    }
    this.state = "running";

    for (const listener of this.options.listeners) {
      try {
        await listener.start();
      } catch (error) {
        this.logger.error("command listener failed to start", { bot: listener.botName, error: describeError(error) });
      }
    }

    this.runners = this.options.sessions.map((session) =>
      this.runCamera(session).catch((error: unknown) => {
        this.logger.error("camera runner crashed", { camera: session.name, error: describeError(error) });
      })
    );

    this.logger.info("relay started", { cameras: this.options.sessions.map((session) => session.name) });
    await this.announce((cameras) => `camrelay online, watching ${cameras}`);
  }

  async stop(): Promise<void> {
    if (this.state !== "running") {
      return;
    }
    this.state = "stopping";
    this.logger.info("relay stopping");

    for (const session of this.options.sessions) {
      session.stop();
    }
    this.abort.abort();

    await Promise.all(
      this.options.listeners.map(async (listener) => {
        try {
          await listener.stop();
        } catch (error) {
          this.logger.warn("command listener failed to stop", { bot: listener.botName, error: describeError(error) });
        }
      })
    );
    await Promise.all(this.runners);

    const drains = Promise.all(this.options.sessions.map((session) => session.drain()));
    if (!(await this.settlesWithin(drains, this.options.shutdownTimeoutMs))) {
      this.logger.warn("in-flight captures outlived shutdown timeout, aborting", {
        timeoutMs: this.options.shutdownTimeoutMs
      });
      for (const session of this.options.sessions) {
        session.abortInFlight();
      }
      await drains;
    }

    await this.announce(() => "camrelay going offline");
    this.state = "stopped";
    this.logger.info("relay stopped");
  }

  private async runCamera(session: CameraSession): Promise<void> {
    const signal = this.abort.signal;
    const log = this.logger.child({ camera: session.name });
    let attempt = 0;

    while (!signal.aborted) {
      try {
        const events = this.options.source.subscribe(session.camera, {
          signal,
          onHealth: (health) => {
            session.setHealth(health);
            if (health === "healthy") {
              attempt = 0;
            }
          }
        });
        for await (const event of events) {
          session.handleMotion(event);
        }
        if (signal.aborted) {
          break;
        }
        log.warn("event source ended unexpectedly");
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        log.warn("event source unavailable", { error: describeError(error), attempt });
      }

      session.setHealth("reconnecting");
      this.options.metrics?.sourceRestartsTotal.labels(this.options.serviceName, session.name).inc();
      const delayMs = calculateBackoffMs(attempt, this.options.backoff);
      attempt += 1;
      log.info("re-subscribing after backoff", { delayMs, attempt });
      await this.sleep(delayMs, signal);
    }
  }

  private async settlesWithin(work: Promise<unknown>, timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
    });
    try {
      return await Promise.race([work.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Best-effort notice to every bot; `text` receives the cameras bound to that bot. */
  private async announce(text: (cameras: string) => string): Promise<void> {
    if (!this.options.announceLifecycle) {
      return;
    }
    await Promise.all(
      [...this.options.notifiers.values()].map(async (notifier) => {
        const cameras = this.options.sessions
          .filter((session) => session.camera.bot === notifier.bot.name)
          .map((session) => session.name);
        try {
          await notifier.sendAlert(text(cameras.join(", ") || "no cameras"));
        } catch (error) {
          this.logger.warn("lifecycle announcement failed", { bot: notifier.bot.name, error: describeError(error) });
        }
      })
    );
  }
}
