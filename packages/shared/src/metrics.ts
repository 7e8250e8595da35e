import {
  Counter,
  Histogram,
  Registry,
  collectDefaultMetrics
} from "prom-client";

export interface RelayMetrics {
  registry: Registry;
  motionEventsTotal: Counter<string>;
  triggersTotal: Counter<string>;
  capturesTotal: Counter<string>;
  captureDurationMs: Histogram<string>;
  notificationsTotal: Counter<string>;
  sourceRestartsTotal: Counter<string>;
  subscriptionRenewalsTotal: Counter<string>;
}

export function createRelayMetrics(options: { defaultMetrics?: boolean } = {}): RelayMetrics {
  const registry = new Registry();
  if (options.defaultMetrics ?? true) {
    collectDefaultMetrics({ register: registry });
  }

  const motionEventsTotal = new Counter({
    name: "camrelay_motion_events_total",
    help: "Coalesced motion events received from cameras",
    labelNames: ["service", "camera", "transition"],
    registers: [registry]
  });

  const triggersTotal = new Counter({
    name: "camrelay_triggers_total",
    help: "Capture triggers by origin and outcome",
    labelNames: ["service", "camera", "origin", "outcome"],
    registers: [registry]
  });

  const capturesTotal = new Counter({
    name: "camrelay_captures_total",
    help: "Capture attempts by kind and result",
    labelNames: ["service", "camera", "kind", "result"],
    registers: [registry]
  });

  const captureDurationMs = new Histogram({
    name: "camrelay_capture_duration_ms",
    help: "Capture duration in milliseconds",
    labelNames: ["service", "camera", "kind"],
    buckets: [500, 1000, 2000, 5000, 10000, 20000, 40000],
    registers: [registry]
  });

  const notificationsTotal = new Counter({
    name: "camrelay_notifications_total",
    help: "Notifications by bot, kind and result",
    labelNames: ["service", "bot", "kind", "result"],
    registers: [registry]
  });

  const sourceRestartsTotal = new Counter({
    name: "camrelay_source_restarts_total",
    help: "Event source restarts after SourceUnavailable",
    labelNames: ["service", "camera"],
    registers: [registry]
  });

  const subscriptionRenewalsTotal = new Counter({
    name: "camrelay_subscription_renewals_total",
    help: "Pull-point subscription renewals",
    labelNames: ["service", "camera", "result"],
    registers: [registry]
  });

  return {
    registry,
    motionEventsTotal,
    triggersTotal,
    capturesTotal,
    captureDurationMs,
    notificationsTotal,
    sourceRestartsTotal,
    subscriptionRenewalsTotal
  };
}
