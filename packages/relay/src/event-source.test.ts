import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  SourceUnavailable,
  createRelayMetrics,
  createSilentLogger,
  type MotionEvent,
  type SubscriptionHealth
} from "@camrelay/shared";
import type { DeviceInformation, PullPointClient, PullResult } from "./onvif/client.js";
import type { MotionNotification, SubscriptionTimes } from "./onvif/messages.js";
import { PullPointEventSource, computeRenewalDeadline, type PullPointEventSourceConfig } from "./event-source.js";
import { cameraFixture } from "./test-fixtures.js";

type PullStep = PullResult | Error;

const noTimes = { currentTime: Number.NaN, terminationTime: Number.NaN };

function pull(notifications: Partial<MotionNotification>[] = []): PullResult {
  return {
    ...noTimes,
    notifications: notifications.map((entry) => ({ source: "default", active: true, ...entry }))
  };
}

class FakeClock {
  ms = 0;
  readonly now = (): number => this.ms;
}

/**
 * Scripted pull-point client. Each pull advances the clock by the requested
 * timeout; once the script runs out the fake aborts the run.
 */
class FakePullPointClient implements PullPointClient {
  readonly calls: string[] = [];
  readonly pullTimeouts: number[] = [];
  readonly renewTerminations: string[] = [];
  created: SubscriptionTimes = { currentTime: 0, terminationTime: 600_000 };
  createError?: Error;
  renewals: (SubscriptionTimes | Error)[] = [];

  constructor(
    private readonly clock: FakeClock,
    private readonly controller: AbortController,
    private readonly pulls: PullStep[]
  ) {}

  async prepare(): Promise<DeviceInformation> {
    this.calls.push("prepare");
    return { manufacturer: "Acme" };
  }

  async createSubscription(_topic: string, initialTermination: string): Promise<SubscriptionTimes> {
    this.calls.push(`create:${initialTermination}`);
    if (this.createError) {
      throw this.createError;
    }
    return this.created;
  }

  async setSynchronizationPoint(): Promise<void> {
    this.calls.push("sync");
  }

  async pullMessages(timeoutSec: number, _limit: number, signal?: AbortSignal): Promise<PullResult> {
    this.calls.push("pull");
    this.pullTimeouts.push(timeoutSec);
    const step = this.pulls.shift();
    if (step === undefined) {
      this.controller.abort();
      throw signal?.reason instanceof Error ? signal.reason : new Error("aborted");
    }
    this.clock.ms += timeoutSec * 1000;
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }

  async renew(termination: string): Promise<SubscriptionTimes> {
    this.calls.push("renew");
    this.renewTerminations.push(termination);
    const next = this.renewals.shift() ?? { currentTime: 0, terminationTime: 100_000 };
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async unsubscribe(): Promise<void> {
    this.calls.push("unsubscribe");
  }
}

const baseConfig: PullPointEventSourceConfig = {
  subscriptionSec: 600,
  pullWaitSec: 30,
  renewMarginSec: 60,
  pullFailureLimit: 3
};

function setup(pulls: PullStep[], config: Partial<PullPointEventSourceConfig> = {}) {
  const clock = new FakeClock();
  const controller = new AbortController();
  const client = new FakePullPointClient(clock, controller, pulls);
  const metrics = createRelayMetrics({ defaultMetrics: false });
  const source = new PullPointEventSource({
    config: { ...baseConfig, ...config },
    createClient: () => client,
    logger: createSilentLogger(),
    serviceName: "camrelay",
    metrics,
    now: clock.now
  });
  const health: SubscriptionHealth[] = [];
  const run = async (): Promise<MotionEvent[]> => {
    const events: MotionEvent[] = [];
    for await (const event of source.subscribe(cameraFixture(), {
      signal: controller.signal,
      onHealth: (state) => health.push(state)
    })) {
      events.push(event);
    }
    return events;
  };
  return { clock, controller, client, metrics, health, run };
}

describe("computeRenewalDeadline", () => {
  it("maps the camera lifetime onto the local clock", () => {
    assert.deepEqual(computeRenewalDeadline({ currentTime: 0, terminationTime: 100_000 }, 5000, 60_000), {
      expiresAt: 105_000,
      renewAt: 55_000
    });
    assert.deepEqual(computeRenewalDeadline({ currentTime: 0, terminationTime: 600_000 }, 0, 60_000), {
      expiresAt: 600_000,
      renewAt: 540_000
    });
  });

  it("rejects missing or non-positive lifetimes", () => {
    assert.equal(computeRenewalDeadline({ currentTime: 10, terminationTime: 10 }, 0, 60_000), undefined);
    assert.equal(computeRenewalDeadline(noTimes, 0, 60_000), undefined);
  });
});

describe("PullPointEventSource", () => {
  it("coalesces repeats into one started and one stopped event", async () => {
    const { client, metrics, health, run } = setup([
      pull([{ propertyOperation: "Initialized", active: false }]),
      pull([
        { active: true, utcTime: "2024-05-01T10:00:05Z" },
        { active: true, utcTime: "2024-05-01T10:00:06Z" }
      ]),
      pull([{ active: false, utcTime: "2024-05-01T10:00:20Z" }])
    ]);

    const events = await run();

    assert.deepEqual(
      events.map((event) => [event.camera, event.transition, event.timestamp.toISOString()]),
      [
        ["porch", "started", "2024-05-01T10:00:05.000Z"],
        ["porch", "stopped", "2024-05-01T10:00:20.000Z"]
      ]
    );
    assert.deepEqual(health, ["healthy"]);
    assert.deepEqual(client.calls.slice(0, 3), ["prepare", "create:PT600S", "sync"]);
    assert.equal(client.calls.at(-1), "unsubscribe");

    const counted = await metrics.motionEventsTotal.get();
    assert.deepEqual(
      counted.values.map((entry) => [entry.labels.transition, entry.value]),
      [["started", 1], ["stopped", 1]]
    );
  });

  it("does not emit for a motion state seeded at the synchronization point", async () => {
    const { run } = setup([
      pull([{ propertyOperation: "Initialized", active: true }]),
      pull([{ active: true }])
    ]);

    assert.deepEqual(await run(), []);
  });

  it("shortens pulls to renew before the subscription expires", async () => {
    const { client, run } = setup([pull(), pull(), pull()]);
    client.created = { currentTime: 0, terminationTime: 100_000 };

    await run();

    // lifetime 100s, renew at min(60s, 50s) before expiry
    assert.deepEqual(client.pullTimeouts.slice(0, 3), [30, 20, 30]);
    assert.deepEqual(client.calls.slice(3, 7), ["pull", "pull", "renew", "pull"]);
    assert.deepEqual(client.renewTerminations, ["PT600S"]);
  });

  it("falls back to absolute termination times when the camera reports no lifetime", async () => {
    const { client, run } = setup([pull()]);
    client.created = { currentTime: 0, terminationTime: 0 };

    await run();

    assert.deepEqual(client.calls.slice(0, 4), ["prepare", "create:PT600S", "renew", "sync"]);
    assert.deepEqual(client.renewTerminations, ["1970-01-01T00:10:00.000Z"]);
  });

  it("tolerates pull failures below the limit", async () => {
    const { health, run } = setup([new Error("socket hang up"), pull()]);

    await run();

    assert.deepEqual(health, ["degraded", "healthy"]);
  });

  it("gives up after consecutive pull failures reach the limit", async () => {
    const { client, health, run } = setup([new Error("e1"), new Error("e2"), new Error("e3")]);

    await assert.rejects(
      run(),
      (error: unknown) =>
        error instanceof SourceUnavailable && error.message === "porch: event source unavailable: pull failed 3 times: e3"
    );
    // never healthy: the subscription was created but no pull ever succeeded
    assert.deepEqual(health, ["degraded", "degraded"]);
    assert.equal(client.calls.at(-1), "unsubscribe");
  });

  it("reports subscribe failures without unsubscribing", async () => {
    const { client, run } = setup([]);
    client.createError = new Error("connection refused");

    await assert.rejects(
      run(),
      (error: unknown) =>
        error instanceof SourceUnavailable &&
        error.message === "porch: event source unavailable: subscribe failed: connection refused"
    );
    assert.equal(client.calls.includes("unsubscribe"), false);
  });

  it("reports renew failures", async () => {
    const { client, run } = setup([pull(), pull()]);
    client.created = { currentTime: 0, terminationTime: 100_000 };
    client.renewals = [new Error("subscription gone")];

    await assert.rejects(run(), /renew failed: subscription gone/);
    assert.equal(client.calls.at(-1), "unsubscribe");
  });

  it("stamps events without a camera time with the local clock", async () => {
    const { clock, run } = setup([pull([{ active: true }])]);
    clock.ms = Date.UTC(2024, 4, 1, 12, 0, 0);

    const events = await run();

    // the pull advanced the clock by its 30s timeout before the event was read
    assert.equal(events[0]?.timestamp.toISOString(), "2024-05-01T12:00:30.000Z");
  });

  it("ends quietly and unsubscribes when aborted mid-pull", async () => {
    const { client, run } = setup([]);

    assert.deepEqual(await run(), []);
    assert.deepEqual(client.calls, ["prepare", "create:PT600S", "sync", "pull", "unsubscribe"]);
  });
});
