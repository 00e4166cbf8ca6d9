import Fastify from "fastify";
import { createFunctionContext, type FunctionContext } from "../core/services/function-context.js";
import { handleError, httpErrorForAuth, requestIdFromHeaders } from "./http.js";

export interface FunctionEvent {
  method: string;
  url: string;
  headers: Record<string, unknown>;
  body: unknown;
}

export interface FunctionResult {
  statusCode?: number | undefined;
  headers?: Record<string, string> | undefined;
  body?: unknown;
}

export type FunctionHandler = (event: FunctionEvent) => FunctionResult | Promise<FunctionResult>;

export interface BuildServerOptions {
  context?: FunctionContext | undefined;
  handler?: FunctionHandler | undefined;
}

export const echoHandler: FunctionHandler = (event) => ({
  statusCode: 200,
  body: {
    method: event.method,
    url: event.url,
    body: event.body ?? null
  }
});

function pathOf(url: string): string {
  const queryStart = url.indexOf("?");
  return queryStart === -1 ? url : url.slice(0, queryStart);
}

export function buildServer(options?: BuildServerOptions) {
  const context = options?.context ?? createFunctionContext();
  const handler = options?.handler ?? echoHandler;

  const app = Fastify({
    logger: false
  });

  // Bodies the JSON and text parsers do not handle are passed to the handler as raw bytes.
  app.addContentTypeParser("*", { parseAs: "buffer" }, (_request, body, done) => {
    done(null, body);
  });

  app.addHook("onRequest", async (request, reply) => {
    const headers: Record<string, unknown> = request.headers;
    const requestId = requestIdFromHeaders(headers);
    headers["x-request-id"] = requestId;
    reply.header("x-request-id", requestId);
    reply.header("x-content-type-options", "nosniff");
    reply.header("cache-control", "no-store");
  });

  // Every route but the health probe goes through the authenticator.
  app.addHook("onRequest", async (request, reply) => {
    if (pathOf(request.url) === "/health") {
      return;
    }
    const headers: Record<string, unknown> = request.headers;
    const verdict = context.authenticator.authenticate(headers);
    if (!verdict.ok) {
      return handleError(httpErrorForAuth(verdict.error), reply, requestIdFromHeaders(headers));
    }
  });

  app.get("/health", async () => ({
    status: "ok",
    service: "function-auth",
    timestamp: new Date().toISOString()
  }));

  app.all("/*", async (request, reply) => {
    const headers: Record<string, unknown> = request.headers;
    try {
      const result = await handler({
        method: request.method,
        url: request.url,
        headers,
        body: request.body
      });
      for (const [name, value] of Object.entries(result.headers ?? {})) {
        reply.header(name, value);
      }
      return reply.status(result.statusCode ?? 200).send(result.body ?? "");
    } catch (error) {
      return handleError(error, reply, requestIdFromHeaders(headers));
    }
  });

  app.setErrorHandler((error, request, reply) =>
    handleError(error, reply, requestIdFromHeaders(request.headers))
  );

  return app;
}

export type { FunctionContext };
