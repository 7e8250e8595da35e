import dotenv from "dotenv";
import { ConfigurationError } from "./errors.js";
import { parseLogLevel, type LogLevel } from "./logger.js";

dotenv.config({ path: process.env.ENV_FILE ?? ".env.local" });
dotenv.config();

export function getEnv(name: string, fallback?: string): string {
  const value = process.env[name] ?? fallback;
  if (value === undefined || value === "") {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function getBooleanEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return fallback;
  }
  return ["1", "true", "yes", "on"].includes(raw.toLowerCase());
}

export function getNumberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError([`${name}: not a number: ${raw}`]);
  }
  return value;
}

export interface RelayRuntimeConfig {
  serviceName: string;
  port: number;
  nodeEnv: string;
  logLevel: LogLevel;
  configPath: string;
  ffmpegPath: string;
  captureGraceMs: number;
  onvifTimeoutMs: number;
  subscriptionSec: number;
  pullWaitSec: number;
  renewMarginSec: number;
  pullFailureLimit: number;
  sourceBackoffInitialMs: number;
  sourceBackoffMaxMs: number;
  notifyTimeoutMs: number;
  shutdownTimeoutMs: number;
  announceLifecycle: boolean;
}

export function loadRelayRuntimeConfig(serviceName: string, defaultPort: number): RelayRuntimeConfig {
  return {
    serviceName,
    port: getNumberEnv("PORT", defaultPort),
    nodeEnv: process.env.NODE_ENV ?? "development",
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
    configPath: getEnv("CONFIG_PATH", "config/relay.json"),
    ffmpegPath: getEnv("FFMPEG_PATH", "ffmpeg"),
    captureGraceMs: getNumberEnv("CAPTURE_GRACE_MS", 10_000),
    onvifTimeoutMs: getNumberEnv("ONVIF_TIMEOUT_MS", 5000),
    subscriptionSec: getNumberEnv("SUBSCRIPTION_SEC", 600),
    pullWaitSec: getNumberEnv("PULL_WAIT_SEC", 30),
    renewMarginSec: getNumberEnv("RENEW_MARGIN_SEC", 60),
    pullFailureLimit: getNumberEnv("PULL_FAILURE_LIMIT", 3),
    sourceBackoffInitialMs: getNumberEnv("SOURCE_BACKOFF_INITIAL_MS", 1000),
    sourceBackoffMaxMs: getNumberEnv("SOURCE_BACKOFF_MAX_MS", 60_000),
    notifyTimeoutMs: getNumberEnv("NOTIFY_TIMEOUT_MS", 30_000),
    shutdownTimeoutMs: getNumberEnv("SHUTDOWN_TIMEOUT_MS", 30_000),
    announceLifecycle: getBooleanEnv("ANNOUNCE_LIFECYCLE", true)
  };
}
