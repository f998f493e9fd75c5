import "./sentry.server.js";
import { existsSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Fastify from "fastify";
import cookie from "@fastify/cookie";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import fastifyStatic from "@fastify/static";
import { config } from "./config.js";
import { initializeAuditLogger, shutdownAuditLogger } from "./audit/index.js";
import { registerAuthRoutes } from "./auth.js";
import { registerErrorHandler } from "./error-handler.js";
import { registerS3Routes } from "./routes.js";
import { closeRedis } from "./session.js";
import {
  captureServerError,
  registerObservabilityHooks,
  sentryLog,
  shutdownObservability,
} from "./observability.js";
import { registerRuntimeConfigRoute } from "./runtime-config.js";

const app = Fastify({
  logger: {
    redact: ["req.headers.cookie", "req.headers.authorization", 'res.headers["set-cookie"]'],
  },
});

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const clientDistPath = path.resolve(__dirname, "../client");
const clientIndexPath = path.join(clientDistPath, "index.html");

await app.register(cookie);
await app.register(cors, {
  origin: true,
  credentials: true,
});
await app.register(multipart, {
  limits: {
    fileSize: config.MAX_UPLOAD_SIZE_MB * 1024 * 1024,
    files: 1,
  },
});
registerObservabilityHooks(app);
registerErrorHandler(app);
initializeAuditLogger();

registerAuthRoutes(app);
registerS3Routes(app);
registerRuntimeConfigRoute(app);

app.addHook("onClose", async () => {
  await shutdownAuditLogger();
  await closeRedis();
  await shutdownObservability();
});

if (config.NODE_ENV === "production" || existsSync(clientIndexPath)) {
  await app.register(fastifyStatic, {
    root: clientDistPath,
    prefix: "/",
  });

  app.get("/", async (_, reply) => {
    return reply.sendFile("index.html");
  });
}

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  app.log.info({ signal }, "Shutting down");

  try {
    await app.close();
    process.exit(0);
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
};

process.once("SIGINT", (signal) => void shutdown(signal));
process.once("SIGTERM", (signal) => void shutdown(signal));

const start = async () => {
  try {
    await app.listen({
      port: config.PORT,
      host: "0.0.0.0",
    });
    sentryLog("info", "Fastify server started", {
      port: config.PORT,
      environment: config.NODE_ENV,
    });
  } catch (error) {
    app.log.error(error);
    captureServerError(error);
    process.exit(1);
  }
};

await start();
