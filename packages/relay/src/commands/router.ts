import type { CaptureKind, Logger } from "@camrelay/shared";
import type { CameraSession } from "../session.js";

export type ChatCommand = "grabimage" | "grabvideo";

export const CHAT_COMMANDS: readonly ChatCommand[] = ["grabimage", "grabvideo"];

export interface CommandReply {
  ok: boolean;
  text: string;
}

const commandKinds: Record<ChatCommand, CaptureKind> = {
  grabimage: "image",
  grabvideo: "video"
};

/**
 * Accepts "grabimage", "/grabimage", "/grabimage@SomeBot" and the video variants.
 */
export function parseChatCommand(raw: string): ChatCommand | undefined {
  const name = raw.trim().replace(/^\//, "").split("@")[0]?.toLowerCase();
  return CHAT_COMMANDS.find((command) => command === name);
}

/**
 * Routes chat commands to the camera sessions associated with one bot. Cameras
 * bound to other bots are not addressable from here.
 */
export class CommandRouter {
  private readonly sessions: CameraSession[];

  constructor(
    readonly botName: string,
    sessions: Iterable<CameraSession>,
    private readonly logger: Logger
  ) {
    this.sessions = [...sessions].filter((session) => session.camera.bot === botName);
  }

  get cameraNames(): string[] {
    return this.sessions.map((session) => session.name);
  }

  dispatch(command: ChatCommand, argument: string): CommandReply {
    const target = this.resolve(command, argument.trim());
    if ("error" in target) {
      this.logger.info("command rejected", { bot: this.botName, command, argument, reason: target.error });
      return { ok: false, text: target.error };
    }

    const session = target.session;
    const kind = commandKinds[command];
    const decision = session.requestCapture(kind);
    if (!decision.accepted) {
      return {
        ok: false,
        text: decision.reason === "stopped"
          ? "The relay is shutting down, try again later."
          : `${session.name} is busy with another capture, try again shortly.`
      };
    }

    if (session.camera.nomedia) {
      return { ok: true, text: `${session.name} is in alert-only mode, sending a text alert.` };
    }
    return {
      ok: true,
      text: kind === "image"
        ? `Capturing an image from ${session.name}...`
        : `Recording ${session.camera.videoSeconds}s of video from ${session.name}...`
    };
  }

  private resolve(command: ChatCommand, name: string): { session: CameraSession } | { error: string } {
    const available = this.cameraNames.join(", ") || "none";
    if (name.length === 0) {
      const only = this.sessions.length === 1 ? this.sessions[0] : undefined;
      if (only) {
        return { session: only };
      }
      return { error: `Name a camera: /${command} <camera>. Available: ${available}` };
    }

    const wanted = name.toLowerCase();
    const session = this.sessions.find((candidate) => candidate.name.toLowerCase() === wanted);
    if (!session) {
      return { error: `Unknown camera "${name}". Available: ${available}` };
    }
    return { session };
  }
}
