import type { FastifyError, FastifyInstance } from "fastify";
import type { ApiErrorShape } from "../shared/errors.js";
import { AppError, toErrorMessage } from "./errors.js";
import { captureServerError, sentryCountMetric } from "./observability.js";

const readStatusCode = (error: FastifyError): number => {
  return typeof error.statusCode === "number" && error.statusCode >= 400 ? error.statusCode : 500;
};

/**
 * Renders thrown errors as `{ error, kind?, code?, details? }`. Unexpected
 * errors are reported to Sentry and their message is hidden from the client.
 */
export const registerErrorHandler = (app: FastifyInstance): void => {
  app.setErrorHandler<FastifyError | AppError>((error, request, reply) => {
    const statusCode = error instanceof AppError ? error.statusCode : readStatusCode(error);

    if (statusCode >= 500) {
      request.log.error(error);
      captureServerError(error, request, reply);
    } else {
      request.log.warn({ err: error }, "Request failed");
    }

    sentryCountMetric("http.request.errors", 1, {
      method: request.method,
      route: request.routeOptions.url || request.url,
      status_code: statusCode,
    });

    let body: ApiErrorShape;

    if (error instanceof AppError) {
      body = {
        error: error.message,
        kind: error.kind,
        code: error.code,
        details: error.exposeDetails ? error.message : undefined,
      };
    } else if (statusCode === 500) {
      body = { error: "Internal server error" };
    } else {
      body = {
        error: toErrorMessage(error),
        kind: statusCode === 401 || statusCode === 403 ? "AuthError" : "ValidationError",
      };
    }

    return reply.code(statusCode).send(body);
  });
};
