import { attr, child, children, text } from "./soap.js";

export interface MotionNotification {
  topic?: string;
  utcTime?: string;
  propertyOperation?: string;
  source: string;
  active: boolean;
}

export interface SubscriptionTimes {
  /** camera clock, epoch ms; NaN when the camera left it out */
  currentTime: number;
  terminationTime: number;
}

const MOTION_ITEM_NAMES = new Set(["ismotion", "state", "motion"]);

function parseFlag(value: string | undefined): boolean | undefined {
  const normalized = (value ?? "").trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  return undefined;
}

function parseTime(value: string | undefined): number {
  return value ? Date.parse(value) : Number.NaN;
}

export function readSubscriptionTimes(response: unknown): SubscriptionTimes {
  return {
    currentTime: parseTime(text(child(response, "CurrentTime"))),
    terminationTime: parseTime(text(child(response, "TerminationTime")))
  };
}

function describeSource(message: unknown): string {
  const items = children(child(message, "Source"), "SimpleItem")
    .map((item) => `${attr(item, "Name") ?? "?"}=${attr(item, "Value") ?? ""}`);
  return items.length > 0 ? items.join(",") : "default";
}

/**
 * Extracts motion state changes from a PullMessagesResponse. Messages without a recognisable
 * boolean data item (IsMotion, State or Motion) are skipped.
 */
export function parseMotionNotifications(response: unknown): MotionNotification[] {
  const notifications: MotionNotification[] = [];
  for (const entry of children(response, "NotificationMessage")) {
    const message = child(entry, "Message", "Message");
    if (message === undefined) {
      continue;
    }

    const motionItem = children(child(message, "Data"), "SimpleItem").find((item) =>
      MOTION_ITEM_NAMES.has((attr(item, "Name") ?? "").toLowerCase())
    );
    const active = parseFlag(attr(motionItem, "Value"));
    if (active === undefined) {
      continue;
    }

    notifications.push({
      topic: text(child(entry, "Topic")),
      utcTime: attr(message, "UtcTime"),
      propertyOperation: attr(message, "PropertyOperation"),
      source: describeSource(message),
      active
    });
  }
  return notifications;
}
