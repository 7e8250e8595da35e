export type BotKind = "telegram" | "slack";

export interface BotDescriptor {
  name: string;
  kind: BotKind;
  token: string;
  channelId: string;
  signingSecret?: string;
}

export type CaptureKind = "image" | "video";

export interface CameraDescriptor {
  name: string;
  host: string;
  onvifPort: number;
  username: string;
  password: string;
  bot: string;
  nomedia: boolean;
  cooldownSec: number;
  motionCapture: CaptureKind;
  videoSeconds: number;
  rtspUrl?: string;
  rtspPort: number;
  rtspPath: string;
  motionTopic: string;
}

export interface RelayConfig {
  cameras: readonly CameraDescriptor[];
  bots: ReadonlyMap<string, BotDescriptor>;
}

export type MotionTransition = "started" | "stopped";

export interface MotionEvent {
  camera: string;
  timestamp: Date;
  transition: MotionTransition;
}

export type TriggerOrigin = "motion" | "command";

export interface CaptureRequest {
  camera: string;
  kind: CaptureKind;
  durationSec: number;
  origin: TriggerOrigin;
}

export interface MediaArtifact {
  camera: string;
  kind: CaptureKind;
  data: Buffer;
  capturedAt: Date;
}

export type SessionPhase = "idle" | "capturing" | "cooling_down";

export type SubscriptionHealth = "healthy" | "degraded" | "reconnecting";

export interface SessionState {
  camera: string;
  phase: SessionPhase;
  lastTriggerAt?: string;
  cooldownUntil?: string;
  health: SubscriptionHealth;
}
