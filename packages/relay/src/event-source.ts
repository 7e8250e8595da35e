import {
  SourceUnavailable,
  describeError,
  type CameraDescriptor,
  type Logger,
  type MotionEvent,
  type RelayMetrics,
  type SubscriptionHealth
} from "@camrelay/shared";
import {
  relativeDuration,
  type PullPointClient,
  type PullPointClientFactory,
  type PullResult
} from "./onvif/client.js";
import type { SubscriptionTimes } from "./onvif/messages.js";
import { MotionCoalescer } from "./motion-coalescer.js";

/** A pull never starts with less than this left before the renewal deadline. */
const MIN_PULL_MS = 1000;

export interface SubscribeOptions {
  signal: AbortSignal;
  onHealth?: (health: SubscriptionHealth) => void;
}

/**
 * Motion events for one camera. The sequence ends quietly when `signal` aborts and
 * throws {@link SourceUnavailable} when the subscription cannot be kept alive; it is
 * not restartable, a new call creates a new subscription.
 */
export interface EventSource {
  subscribe(camera: CameraDescriptor, options: SubscribeOptions): AsyncIterable<MotionEvent>;
}

export interface PullPointEventSourceConfig {
  subscriptionSec: number;
  pullWaitSec: number;
  renewMarginSec: number;
  pullFailureLimit: number;
  messageLimit?: number;
}

export interface RenewalDeadline {
  expiresAt: number;
  renewAt: number;
}

/**
 * Maps a camera-clock (CurrentTime, TerminationTime) pair onto the local clock.
 * Undefined when the camera reports no usable lifetime.
 */
export function computeRenewalDeadline(
  times: SubscriptionTimes,
  nowMs: number,
  renewMarginMs: number
): RenewalDeadline | undefined {
  const lifetimeMs = times.terminationTime - times.currentTime;
  if (!Number.isFinite(lifetimeMs) || lifetimeMs <= 0) {
    return undefined;
  }
  const expiresAt = nowMs + lifetimeMs;
  return { expiresAt, renewAt: expiresAt - Math.min(renewMarginMs, lifetimeMs / 2) };
}

export class PullPointEventSource implements EventSource {
  private readonly config: Required<PullPointEventSourceConfig>;
  private readonly createClient: PullPointClientFactory;
  private readonly logger: Logger;
  private readonly metrics?: RelayMetrics;
  private readonly serviceName: string;
  private readonly now: () => number;

  constructor(args: {
    config: PullPointEventSourceConfig;
    createClient: PullPointClientFactory;
    logger: Logger;
    serviceName: string;
    metrics?: RelayMetrics;
    now?: () => number;
  }) {
    this.config = {
      messageLimit: 100,
      ...args.config,
      pullFailureLimit: Math.max(1, Math.floor(args.config.pullFailureLimit))
    };
    this.createClient = args.createClient;
    this.logger = args.logger;
    this.metrics = args.metrics;
    this.serviceName = args.serviceName;
    this.now = args.now ?? (() => Date.now());
  }

  async *subscribe(camera: CameraDescriptor, options: SubscribeOptions): AsyncGenerator<MotionEvent> {
    const { signal, onHealth } = options;
    const log = this.logger.child({ camera: camera.name });
    const client = this.createClient(camera);
    const coalescer = new MotionCoalescer();
    const subscriptionMs = this.config.subscriptionSec * 1000;
    const renewMarginMs = this.config.renewMarginSec * 1000;

    let subscribed = false;
    let absoluteTime = false;
    let cameraOffsetMs = 0;
    let deadline = this.fallbackDeadline(subscriptionMs, renewMarginMs);

    const observe = (times: SubscriptionTimes): RenewalDeadline | undefined => {
      const nowMs = this.now();
      if (Number.isFinite(times.currentTime)) {
        cameraOffsetMs = times.currentTime - nowMs;
      }
      return computeRenewalDeadline(times, nowMs, renewMarginMs);
    };

    const terminationTime = (): string =>
      absoluteTime
        ? new Date(this.now() + cameraOffsetMs + subscriptionMs).toISOString()
        : relativeDuration(this.config.subscriptionSec);

    const renew = async (): Promise<RenewalDeadline> => {
      try {
        const times = await client.renew(terminationTime(), signal);
        this.metrics?.subscriptionRenewalsTotal.labels(this.serviceName, camera.name, "success").inc();
        const next = observe(times) ?? this.fallbackDeadline(subscriptionMs, renewMarginMs);
        log.debug("subscription renewed", { expiresAt: new Date(next.expiresAt).toISOString() });
        return next;
      } catch (error) {
        this.metrics?.subscriptionRenewalsTotal.labels(this.serviceName, camera.name, "failure").inc();
        throw error;
      }
    };

    try {
      try {
        const device = await client.prepare(signal);
        log.info("camera connected", { ...device });

        const created = await client.createSubscription(camera.motionTopic, terminationTime(), signal);
        subscribed = true;
        const initial = observe(created);
        if (initial) {
          deadline = initial;
        } else {
          // relative lifetimes are broken on this camera; switch to absolute timestamps
          absoluteTime = true;
          log.warn("camera reported no usable subscription lifetime, renewing with absolute time", {
            currentTime: created.currentTime,
            terminationTime: created.terminationTime
          });
          deadline = await renew();
        }
        log.info("pull-point subscription created", {
          topic: camera.motionTopic,
          expiresAt: new Date(deadline.expiresAt).toISOString()
        });
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        throw new SourceUnavailable(camera.name, `subscribe failed: ${describeError(error)}`, { cause: error });
      }

      try {
        await client.setSynchronizationPoint(signal);
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        log.warn("set synchronization point failed", { error: describeError(error) });
      }

      // healthy is reported after the first successful pull, not at subscribe time
      let healthy = false;
      let failures = 0;

      while (!signal.aborted) {
        if (deadline.renewAt - this.now() <= MIN_PULL_MS) {
          try {
            deadline = await renew();
          } catch (error) {
            if (signal.aborted) {
              return;
            }
            throw new SourceUnavailable(camera.name, `renew failed: ${describeError(error)}`, { cause: error });
          }
          continue;
        }

        const windowMs = Math.min(this.config.pullWaitSec * 1000, deadline.renewAt - this.now());
        const timeoutSec = Math.max(1, Math.floor(windowMs / 1000));

        let result: PullResult;
        try {
          result = await client.pullMessages(timeoutSec, this.config.messageLimit, signal);
        } catch (error) {
          if (signal.aborted) {
            return;
          }
          failures += 1;
          log.warn("pull messages failed", {
            error: describeError(error),
            consecutiveFailures: failures,
            limit: this.config.pullFailureLimit
          });
          if (failures >= this.config.pullFailureLimit) {
            throw new SourceUnavailable(camera.name, `pull failed ${failures} times: ${describeError(error)}`, {
              cause: error
            });
          }
          onHealth?.("degraded");
          continue;
        }

        if (!healthy || failures > 0) {
          healthy = true;
          failures = 0;
          onHealth?.("healthy");
        }

        const refreshed = observe(result);
        if (refreshed) {
          deadline = refreshed;
        }

        for (const notification of result.notifications) {
          if (notification.propertyOperation === "Initialized") {
            coalescer.seed(notification.source, notification.active);
            log.debug("motion state seeded", { source: notification.source, active: notification.active });
            continue;
          }

          const outcome = coalescer.update(notification.source, notification.active);
          if (!outcome.emit) {
            log.debug("duplicate motion notification coalesced", {
              source: notification.source,
              active: notification.active
            });
            continue;
          }

          const parsed = notification.utcTime ? Date.parse(notification.utcTime) : Number.NaN;
          this.metrics?.motionEventsTotal.labels(this.serviceName, camera.name, outcome.emit).inc();
          yield {
            camera: camera.name,
            timestamp: new Date(Number.isFinite(parsed) ? parsed : this.now()),
            transition: outcome.emit
          };
        }
      }
    } finally {
      if (subscribed) {
        await this.unsubscribeQuietly(client, log);
      }
    }
  }

  private fallbackDeadline(subscriptionMs: number, renewMarginMs: number): RenewalDeadline {
    const expiresAt = this.now() + subscriptionMs;
    return { expiresAt, renewAt: expiresAt - Math.min(renewMarginMs, subscriptionMs / 2) };
  }

  private async unsubscribeQuietly(client: PullPointClient, log: Logger): Promise<void> {
    try {
      await client.unsubscribe();
      log.info("pull-point subscription closed");
    } catch (error) {
      log.warn("unsubscribe failed", { error: describeError(error) });
    }
  }
}
