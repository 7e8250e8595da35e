import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  CaptureFailed,
  type CameraDescriptor,
  type CaptureRequest,
  type Logger,
  type MediaArtifact
} from "@camrelay/shared";

export interface CaptureAdapter {
  /** Resolves with the media or rejects with {@link CaptureFailed}. Never retries. */
  capture(camera: CameraDescriptor, request: CaptureRequest, signal?: AbortSignal): Promise<MediaArtifact>;
}

export interface CaptureProcess extends EventEmitter {
  readonly stderr: EventEmitter | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnCapture = (command: string, args: string[]) => CaptureProcess;

const STDERR_TAIL_BYTES = 4096;

export function buildRtspUrl(camera: CameraDescriptor): string {
  if (camera.rtspUrl) {
    return camera.rtspUrl;
  }
  const credentials = camera.username
    ? `${encodeURIComponent(camera.username)}:${encodeURIComponent(camera.password)}@`
    : "";
  const host = camera.host.includes(":") && !camera.host.startsWith("[") ? `[${camera.host}]` : camera.host;
  const streamPath = camera.rtspPath.startsWith("/") ? camera.rtspPath : `/${camera.rtspPath}`;
  return `rtsp://${credentials}${host}:${camera.rtspPort}${streamPath}`;
}

export function redactRtspUrl(url: string): string {
  return url.replace(/\/\/[^/@]*@/, "//***@");
}

export function buildFfmpegArgs(
  rtspUrl: string,
  kind: CaptureRequest["kind"],
  durationSec: number,
  outputPath: string
): string[] {
  const input = ["-hide_banner", "-loglevel", "error", "-rtsp_transport", "tcp", "-i", rtspUrl];
  if (kind === "image") {
    return [...input, "-frames:v", "1", "-q:v", "2", "-y", outputPath];
  }
  return [
    ...input,
    "-t",
    String(durationSec),
    "-map",
    "0:v:0",
    "-c:v",
    "copy",
    "-an",
    "-movflags",
    "+faststart",
    "-y",
    outputPath
  ];
}

export function classifyFfmpegFailure(code: number | null, stderr: string): string {
  const lower = stderr.toLowerCase();
  if (/\b401\b|unauthorized|\b403\b|forbidden/.test(lower)) {
    return "auth rejected";
  }
  if (
    /connection refused|no route to host|network is unreachable|host is unreachable|connection timed out|could not resolve|name or service not known|\b404\b|not found/.test(
      lower
    )
  ) {
    return "stream unreachable";
  }
  return `ffmpeg exited with code ${code ?? "null"}`;
}

export class FfmpegCaptureAdapter implements CaptureAdapter {
  private readonly ffmpegPath: string;
  private readonly graceMs: number;
  private readonly logger: Logger;
  private readonly spawnFn: SpawnCapture;
  private readonly tmpRoot: string;
  private readonly now: () => number;

  constructor(args: {
    ffmpegPath: string;
    graceMs: number;
    logger: Logger;
    spawnFn?: SpawnCapture;
    tmpRoot?: string;
    now?: () => number;
  }) {
    this.ffmpegPath = args.ffmpegPath;
    // the hard timeout must stay strictly above the requested duration
    this.graceMs = Math.max(1, Math.floor(args.graceMs));
    this.logger = args.logger;
    this.spawnFn = args.spawnFn ?? ((command, argv) => spawn(command, argv, { stdio: ["ignore", "ignore", "pipe"] }));
    this.tmpRoot = args.tmpRoot ?? os.tmpdir();
    this.now = args.now ?? (() => Date.now());
  }

  timeoutFor(request: CaptureRequest): number {
    const durationMs = request.kind === "video" ? request.durationSec * 1000 : 0;
    return durationMs + this.graceMs;
  }

  async capture(camera: CameraDescriptor, request: CaptureRequest, signal?: AbortSignal): Promise<MediaArtifact> {
    const dir = await mkdtemp(path.join(this.tmpRoot, "camrelay-"));
    const output = path.join(dir, request.kind === "image" ? "frame.jpg" : "clip.mp4");
    const rtspUrl = buildRtspUrl(camera);
    const args = buildFfmpegArgs(rtspUrl, request.kind, request.durationSec, output);

    this.logger.debug("capture starting", {
      camera: camera.name,
      kind: request.kind,
      durationSec: request.durationSec,
      url: redactRtspUrl(rtspUrl)
    });

    try {
      await this.run(args, this.timeoutFor(request), signal);

      let data: Buffer;
      try {
        data = await readFile(output);
      } catch {
        throw new CaptureFailed("zero bytes written");
      }
      if (data.length === 0) {
        throw new CaptureFailed("zero bytes written");
      }

      return {
        camera: camera.name,
        kind: request.kind,
        data,
        capturedAt: new Date(this.now())
      };
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  private run(args: string[], timeoutMs: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CaptureFailed("aborted"));
        return;
      }

      let settled = false;
      let stderr = "";
      const child = this.spawnFn(this.ffmpegPath, args);

      const finish = (error?: CaptureFailed): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const killWith = (reason: string): void => {
        child.kill("SIGKILL");
        finish(new CaptureFailed(reason));
      };

      const onAbort = (): void => killWith("aborted");
      const timer = setTimeout(() => killWith("timeout"), timeoutMs);
      signal?.addEventListener("abort", onAbort, { once: true });

      child.stderr?.on("data", (chunk: Buffer | string) => {
        stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL_BYTES);
      });
      child.once("error", (error: Error) => {
        finish(new CaptureFailed(`ffmpeg could not start: ${error.message}`, { cause: error }));
      });
      child.once("close", (code: number | null) => {
        if (code === 0) {
          finish();
          return;
        }
        finish(new CaptureFailed(classifyFfmpegFailure(code, stderr)));
      });
    });
  }
}
