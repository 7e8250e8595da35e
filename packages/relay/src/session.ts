import {
  CaptureFailed,
  describeError,
  type CameraDescriptor,
  type CaptureKind,
  type CaptureRequest,
  type Logger,
  type MediaArtifact,
  type MotionEvent,
  type RelayMetrics,
  type SessionPhase,
  type SessionState,
  type SubscriptionHealth,
  type TriggerOrigin
} from "@camrelay/shared";
import type { CaptureAdapter } from "./capture.js";
import type { Notifier } from "./notifiers/notifier.js";

export type TriggerDecision = {
  accepted: boolean;
  reason: "accepted" | "capturing" | "cooling_down" | "stopped" | "not_a_start";
};

type CycleOutcome = { kind: "media"; artifact: MediaArtifact } | { kind: "alert"; text: string };

function formatTime(date: Date): string {
  return date.toISOString().replace("T", " ").replace(/\.\d{3}Z$/, " UTC");
}

export function motionCaption(camera: string, origin: TriggerOrigin, at: Date): string {
  return origin === "command"
    ? `${camera}: captured on request at ${formatTime(at)}`
    : `${camera}: motion detected at ${formatTime(at)}`;
}

/**
 * Per-camera trigger state machine: idle -> capturing -> cooling_down -> idle.
 *
 * Transitions run synchronously on the event loop, so checking the phase and
 * entering `capturing` cannot interleave with another trigger; that is what keeps
 * a camera at one capture at a time without locks. Triggers that find the session
 * capturing are dropped. Motion that finds it cooling down is dropped; chat
 * commands skip the cooldown.
 */
export class CameraSession {
  readonly camera: CameraDescriptor;
  private readonly capture: CaptureAdapter;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly metrics?: RelayMetrics;
  private readonly serviceName: string;
  private readonly now: () => number;

  private phase: SessionPhase = "idle";
  private lastTriggerAtMs?: number;
  private cooldownUntilMs?: number;
  private health: SubscriptionHealth = "reconnecting";
  private stopped = false;
  private readonly cycles = new Set<Promise<void>>();
  private captureAbort?: AbortController;

  constructor(args: {
    camera: CameraDescriptor;
    capture: CaptureAdapter;
    notifier: Notifier;
    logger: Logger;
    serviceName: string;
    metrics?: RelayMetrics;
    now?: () => number;
  }) {
    this.camera = args.camera;
    this.capture = args.capture;
    this.notifier = args.notifier;
    this.logger = args.logger.child({ camera: args.camera.name });
    this.metrics = args.metrics;
    this.serviceName = args.serviceName;
    this.now = args.now ?? (() => Date.now());
  }

  get name(): string {
    return this.camera.name;
  }

  handleMotion(event: MotionEvent): TriggerDecision {
    if (event.transition !== "started") {
      this.logger.debug("motion stopped", { at: event.timestamp.toISOString() });
      return { accepted: false, reason: "not_a_start" };
    }
    return this.trigger(this.camera.motionCapture, "motion", event.timestamp);
  }

  /** On-demand capture for chat commands; bypasses cooldown, never a running capture. */
  requestCapture(kind: CaptureKind): TriggerDecision {
    return this.trigger(kind, "command", new Date(this.now()));
  }

  setHealth(health: SubscriptionHealth): void {
    if (health !== this.health) {
      this.logger.info("subscription health changed", { from: this.health, to: health });
      this.health = health;
    }
  }

  getState(): SessionState {
    return {
      camera: this.camera.name,
      phase: this.currentPhase(),
      lastTriggerAt: this.lastTriggerAtMs === undefined ? undefined : new Date(this.lastTriggerAtMs).toISOString(),
      cooldownUntil: this.cooldownUntilMs === undefined ? undefined : new Date(this.cooldownUntilMs).toISOString(),
      health: this.health
    };
  }

  /** Stops accepting triggers. The running cycle, if any, continues. */
  stop(): void {
    this.stopped = true;
  }

  /** Resolves when every running capture and pending delivery has finished. */
  async drain(): Promise<void> {
    await Promise.all([...this.cycles]);
  }

  /** Kills the running capture; used when shutdown outlives its grace period. */
  abortInFlight(): void {
    this.captureAbort?.abort();
  }

  private currentPhase(): SessionPhase {
    if (this.phase === "cooling_down" && this.cooldownUntilMs !== undefined && this.now() >= this.cooldownUntilMs) {
      this.phase = "idle";
      this.logger.debug("cooldown elapsed");
    }
    return this.phase;
  }

  private trigger(kind: CaptureKind, origin: TriggerOrigin, at: Date): TriggerDecision {
    const decision = this.decide(origin);
    this.metrics?.triggersTotal
      .labels(this.serviceName, this.camera.name, origin, decision.accepted ? "accepted" : decision.reason)
      .inc();

    if (!decision.accepted) {
      this.logger.info("trigger dropped", { origin, kind, reason: decision.reason });
      return decision;
    }

    this.phase = "capturing";
    this.lastTriggerAtMs = this.now();
    this.cooldownUntilMs = this.lastTriggerAtMs + this.camera.cooldownSec * 1000;
    this.logger.info("trigger accepted", { origin, kind, at: at.toISOString() });
    // a command during cooldown can start a cycle while the previous delivery is still pending
    const cycle: Promise<void> = this.runCycle(kind, origin, at)
      .catch((error: unknown) => {
        this.phase = "idle";
        this.logger.error("capture cycle crashed", { error: describeError(error) });
      })
      .finally(() => {
        this.cycles.delete(cycle);
      });
    this.cycles.add(cycle);
    return decision;
  }

  private decide(origin: TriggerOrigin): TriggerDecision {
    if (this.stopped) {
      return { accepted: false, reason: "stopped" };
    }
    const phase = this.currentPhase();
    if (phase === "capturing") {
      return { accepted: false, reason: "capturing" };
    }
    if (phase === "cooling_down" && origin === "motion") {
      return { accepted: false, reason: "cooling_down" };
    }
    return { accepted: true, reason: "accepted" };
  }

  private async runCycle(kind: CaptureKind, origin: TriggerOrigin, at: Date): Promise<void> {
    const outcome = await this.acquire(kind, origin, at);

    // cooldown runs from the trigger; a capture that outlasted it leaves the session idle
    this.phase = "cooling_down";
    this.currentPhase();

    await this.deliver(outcome, origin, at);
  }

  private async acquire(kind: CaptureKind, origin: TriggerOrigin, at: Date): Promise<CycleOutcome> {
    if (this.camera.nomedia) {
      return {
        kind: "alert",
        text: origin === "command"
          ? `${this.camera.name}: capture requested, camera is in alert-only mode`
          : `${this.camera.name}: motion detected at ${formatTime(at)}`
      };
    }

    const request: CaptureRequest = {
      camera: this.camera.name,
      kind,
      durationSec: kind === "video" ? this.camera.videoSeconds : 0,
      origin
    };
    const controller = new AbortController();
    this.captureAbort = controller;
    const startedAt = this.now();

    try {
      const artifact = await this.capture.capture(this.camera, request, controller.signal);
      this.metrics?.capturesTotal.labels(this.serviceName, this.camera.name, kind, "success").inc();
      this.logger.info("capture complete", { kind, bytes: artifact.data.length, durationMs: this.now() - startedAt });
      return { kind: "media", artifact };
    } catch (error) {
      const reason = error instanceof CaptureFailed ? error.reason : describeError(error);
      this.metrics?.capturesTotal.labels(this.serviceName, this.camera.name, kind, "failure").inc();
      this.logger.warn("capture failed", { kind, reason });
      return { kind: "alert", text: `${this.camera.name}: ${kind} capture failed (${reason})` };
    } finally {
      this.metrics?.captureDurationMs.labels(this.serviceName, this.camera.name, kind).observe(this.now() - startedAt);
      this.captureAbort = undefined;
    }
  }

  private async deliver(outcome: CycleOutcome, origin: TriggerOrigin, at: Date): Promise<void> {
    const mediaKind = outcome.kind === "media" ? outcome.artifact.kind : "alert";
    try {
      if (outcome.kind === "alert") {
        await this.notifier.sendAlert(outcome.text);
      } else if (outcome.artifact.kind === "image") {
        await this.notifier.sendImage(outcome.artifact.data, motionCaption(this.camera.name, origin, at));
      } else {
        await this.notifier.sendVideo(outcome.artifact.data, motionCaption(this.camera.name, origin, at));
      }
      this.metrics?.notificationsTotal.labels(this.serviceName, this.notifier.bot.name, mediaKind, "sent").inc();
    } catch (error) {
      this.metrics?.notificationsTotal.labels(this.serviceName, this.notifier.bot.name, mediaKind, "failed").inc();
      this.logger.error("delivery failed", { bot: this.notifier.bot.name, kind: mediaKind, error: describeError(error) });
    }
  }
}
