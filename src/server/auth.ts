import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { PROVIDER_LABELS } from "../shared/providers.js";
import { hashAccessKeyId, hashSessionToken, recordAuditEvent } from "./audit/index.js";
import { cookieConfig, config } from "./config.js";
import { AppError, toErrorMessage } from "./errors.js";
import { recordConnectResult } from "./observability.js";
import { authenticateAndListBuckets } from "./s3.js";
import { createSession, deleteSession, getSessionConnection } from "./session.js";
import type { SessionConnection } from "./types.js";

declare module "fastify" {
  interface FastifyRequest {
    sessionToken?: string;
    sessionConnection?: SessionConnection;
  }
}

const loginSchema = z.object({
  provider: z.enum(PROVIDER_LABELS),
  endpoint: z.string().trim().url(),
  region: z.string().trim().min(1),
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
});

type SessionLookup =
  | { ok: true; token: string; connection: SessionConnection }
  | { ok: false; reason: "missing_cookie" | "session_expired" };

const lookupSession = async (
  request: FastifyRequest,
  reply: FastifyReply,
  stage: string,
): Promise<SessionLookup> => {
  const token = request.cookies[config.COOKIE_NAME];

  if (!token) {
    recordConnectResult(false, { stage, reason: "missing_cookie" });
    void recordAuditEvent({
      operation: `auth.${stage}`,
      result: "failure",
      error: "missing_cookie",
    });
    return { ok: false, reason: "missing_cookie" };
  }

  const connection = await getSessionConnection(token);

  if (!connection) {
    recordConnectResult(false, { stage, reason: "session_expired" });
    reply.clearCookie(config.COOKIE_NAME, { path: "/" });
    void recordAuditEvent({
      operation: `auth.${stage}`,
      sessionToken: hashSessionToken(token),
      result: "failure",
      error: "session_expired",
    });
    return { ok: false, reason: "session_expired" };
  }

  return { ok: true, token, connection };
};

/** preHandler for every storage route: attaches the session's connection to the request. */
export const requireSession = async (
  request: FastifyRequest,
  reply: FastifyReply,
): Promise<void> => {
  const session = await lookupSession(request, reply, "session");

  if (!session.ok) {
    throw new AppError(
      session.reason === "missing_cookie"
        ? "Not connected"
        : "Session expired. Please connect again.",
      401,
      true,
      { kind: "AuthError" },
    );
  }

  request.sessionToken = session.token;
  request.sessionConnection = session.connection;
};

export const getRequestConnection = (request: FastifyRequest): SessionConnection => {
  if (!request.sessionConnection) {
    throw new AppError("Not connected", 401, true, { kind: "AuthError" });
  }

  return request.sessionConnection;
};

export const registerAuthRoutes = (app: FastifyInstance): void => {
  app.post("/api/auth/login", async (request, reply) => {
    const startedAt = Date.now();
    const parsed = loginSchema.safeParse(request.body);

    if (!parsed.success) {
      recordConnectResult(false, { stage: "login", reason: "invalid_payload" });
      void recordAuditEvent({
        operation: "auth.login",
        result: "failure",
        error: "invalid_payload",
        durationMs: Date.now() - startedAt,
      });
      throw new AppError("Invalid connection settings", 400, true, { kind: "ValidationError" });
    }

    const connection: SessionConnection = parsed.data;
    const previousToken = request.cookies[config.COOKIE_NAME];

    if (previousToken) {
      await deleteSession(previousToken);
    }

    let buckets: string[];

    try {
      buckets = await authenticateAndListBuckets(connection);
    } catch (error) {
      recordConnectResult(false, {
        stage: "login",
        reason: "invalid_credentials",
        provider: connection.provider,
      });
      void recordAuditEvent({
        operation: "auth.login",
        result: "failure",
        provider: connection.provider,
        accessKeyHash: hashAccessKeyId(connection.accessKeyId),
        error: toErrorMessage(error),
        durationMs: Date.now() - startedAt,
      });
      reply.clearCookie(config.COOKIE_NAME, { path: "/" });
      throw new AppError(
        `Invalid credentials or provider access denied: ${toErrorMessage(error)}`,
        401,
        true,
        { kind: "AuthError" },
      );
    }

    const token = await createSession(connection);
    recordConnectResult(true, { stage: "login", provider: connection.provider });
    void recordAuditEvent({
      operation: "auth.login",
      result: "success",
      provider: connection.provider,
      sessionToken: hashSessionToken(token),
      accessKeyHash: hashAccessKeyId(connection.accessKeyId),
      durationMs: Date.now() - startedAt,
    });

    reply.setCookie(config.COOKIE_NAME, token, cookieConfig);
    return reply.send({ ok: true, buckets });
  });

  app.post("/api/auth/logout", async (request, reply) => {
    const token = request.cookies[config.COOKIE_NAME];

    if (token) {
      const connection = await getSessionConnection(token);
      await deleteSession(token);
      void recordAuditEvent({
        operation: "auth.logout",
        result: connection ? "success" : "failure",
        provider: connection?.provider,
        sessionToken: hashSessionToken(token),
        accessKeyHash: hashAccessKeyId(connection?.accessKeyId),
        error: connection ? undefined : "session_expired",
      });
    } else {
      void recordAuditEvent({
        operation: "auth.logout",
        result: "failure",
        error: "missing_cookie",
      });
    }

    reply.clearCookie(config.COOKIE_NAME, { path: "/" });
    return reply.send({ ok: true });
  });

  app.get("/api/auth/me", async (request, reply) => {
    const session = await lookupSession(request, reply, "me");

    if (!session.ok) {
      return reply.code(401).send({
        error: session.reason === "missing_cookie" ? "Not connected" : "Session expired",
        kind: "AuthError",
      });
    }

    const { provider, endpoint, region, accessKeyId } = session.connection;
    recordConnectResult(true, { stage: "me", provider });
    void recordAuditEvent({
      operation: "auth.me",
      result: "success",
      provider,
      sessionToken: hashSessionToken(session.token),
      accessKeyHash: hashAccessKeyId(accessKeyId),
    });

    return reply.send({ ok: true, provider, endpoint, region });
  });
};
