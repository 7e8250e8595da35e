import Fastify, { type FastifyInstance } from "fastify";
import type { Logger, RelayMetrics } from "@camrelay/shared";
import type { SlackCommandListener } from "./commands/slack.js";
import type { CameraSession } from "./session.js";

export interface StatusServerOptions {
  serviceName: string;
  sessions: readonly CameraSession[];
  slackListeners: ReadonlyMap<string, SlackCommandListener>;
  metrics: RelayMetrics;
  logger: Logger;
}

export function buildServer(options: StatusServerOptions): FastifyInstance {
  const { serviceName, sessions, slackListeners, metrics, logger } = options;
  const app = Fastify({ logger: false });

  // slash command signatures cover the body exactly as sent
  app.addContentTypeParser("application/x-www-form-urlencoded", { parseAs: "string" }, (_request, body, done) => {
    done(null, body);
  });

  app.get("/healthz", async () => {
    const cameras = sessions.map((session) => session.getState());
    const healthy = cameras.every((camera) => camera.health === "healthy");
    return { status: healthy ? "ok" : "degraded", service: serviceName, cameras };
  });

  app.get("/metrics", async (_, reply) => {
    reply.header("content-type", metrics.registry.contentType);
    return metrics.registry.metrics();
  });

  app.post<{ Params: { bot: string } }>("/slack/commands/:bot", async (request, reply) => {
    const listener = slackListeners.get(request.params.bot);
    if (!listener) {
      logger.warn("slash command for unknown bot", { bot: request.params.bot });
      return reply.status(404).send({ error: "unknown bot" });
    }

    const rawBody = typeof request.body === "string" ? request.body : "";
    const response = listener.handle(rawBody, request.headers);
    return reply.status(response.status).send(response.body);
  });

  return app;
}
