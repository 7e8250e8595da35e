import type { BotDescriptor, CameraDescriptor } from "@camrelay/shared";
import type { Notifier } from "./notifiers/notifier.js";

export function cameraFixture(overrides: Partial<CameraDescriptor> = {}): CameraDescriptor {
  return {
    name: "porch",
    host: "10.0.0.20",
    onvifPort: 80,
    username: "viewer",
    password: "test-secret",
    bot: "house",
    nomedia: false,
    cooldownSec: 30,
    motionCapture: "image",
    videoSeconds: 6,
    rtspPort: 554,
    rtspPath: "/stream1",
    motionTopic: "tns1:RuleEngine/CellMotionDetector/Motion",
    ...overrides
  };
}

export function botFixture(overrides: Partial<BotDescriptor> = {}): BotDescriptor {
  return {
    name: "house",
    kind: "telegram",
    token: "test-token",
    channelId: "100",
    ...overrides
  };
}

export type SentMessage =
  | { kind: "alert"; text: string }
  | { kind: "image" | "video"; bytes: number; caption: string };

/** Records every delivery; `failWith` makes each call reject instead. */
export class RecordingNotifier implements Notifier {
  readonly sent: SentMessage[] = [];
  failWith?: Error;

  constructor(readonly bot: BotDescriptor = botFixture()) {}

  async sendAlert(text: string): Promise<void> {
    this.check();
    this.sent.push({ kind: "alert", text });
  }

  async sendImage(blob: Buffer, caption: string): Promise<void> {
    this.check();
    this.sent.push({ kind: "image", bytes: blob.length, caption });
  }

  async sendVideo(blob: Buffer, caption: string): Promise<void> {
    this.check();
    this.sent.push({ kind: "video", bytes: blob.length, caption });
  }

  private check(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

/** A promise whose settlement the test controls. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: unknown) => void } {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
