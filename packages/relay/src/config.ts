import fs from "node:fs";
import { z } from "zod";
import {
  ConfigurationError,
  type BotDescriptor,
  type CameraDescriptor,
  type RelayConfig
} from "@camrelay/shared";

export const DEFAULT_MOTION_TOPIC = "tns1:RuleEngine/CellMotionDetector/Motion";

const botSchema = z.object({
  kind: z.enum(["telegram", "slack"]),
  token: z.string().min(1),
  channelId: z.union([z.string().min(1), z.number().int()]).transform((value) => String(value)),
  signingSecret: z.string().min(1).optional()
});

const cameraSchema = z.object({
  name: z.string().min(1),
  host: z.string().min(1),
  onvifPort: z.number().int().min(1).max(65_535).default(80),
  username: z.string(),
  password: z.string(),
  bot: z.string().min(1),
  nomedia: z.boolean().default(false),
  cooldownSec: z.number().min(0).default(30),
  motionCapture: z.enum(["image", "video"]).default("image"),
  videoSeconds: z.number().positive().max(300).default(6),
  rtspUrl: z.string().url().optional(),
  rtspPort: z.number().int().min(1).max(65_535).default(554),
  rtspPath: z.string().default("/stream1"),
  motionTopic: z.string().min(1).default(DEFAULT_MOTION_TOPIC)
});

const documentSchema = z
  .object({
    bots: z.record(z.string().min(1), botSchema),
    cameras: z.array(cameraSchema).min(1)
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.cameras.forEach((camera, index) => {
      const key = camera.name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["cameras", index, "name"],
          message: `duplicate camera name "${camera.name}"`
        });
      }
      seen.add(key);

      if (!Object.prototype.hasOwnProperty.call(doc.bots, camera.bot)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["cameras", index, "bot"],
          message: `unknown bot "${camera.bot}"`
        });
      }
    });
  });

export type RelayDocument = z.input<typeof documentSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

export function parseRelayConfig(raw: unknown): RelayConfig {
  const parsed = documentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }

  const bots = new Map<string, BotDescriptor>();
  for (const [name, bot] of Object.entries(parsed.data.bots)) {
    bots.set(name, Object.freeze({ name, ...bot }));
  }

  const cameras: CameraDescriptor[] = parsed.data.cameras.map((camera) => Object.freeze({ ...camera }));

  return Object.freeze({ cameras: Object.freeze(cameras), bots });
}

export function loadRelayConfig(path: string): RelayConfig {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigurationError([`cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError([`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
  }

  return parseRelayConfig(raw);
}
