import type { FastifyInstance, FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";

export const TRACE_HEADER = "x-trace-id";

/** First non-blank trace id carried by the headers. */
export function readTraceId(headers: FastifyRequest["headers"]): string | undefined {
  const raw = headers[TRACE_HEADER];
  const value = (Array.isArray(raw) ? raw[0] : raw)?.trim();
  return value ? value : undefined;
}

export function getTraceIdFromRequest(request: Pick<FastifyRequest, "headers">): string {
  return readTraceId(request.headers) ?? uuidv4();
}

/** Pins a trace id on every request so handlers and the response agree on it. */
export function registerTraceHook(app: FastifyInstance): void {
  app.addHook("onRequest", (request, reply, done) => {
    const traceId = getTraceIdFromRequest(request);
    request.headers[TRACE_HEADER] = traceId;
    reply.header(TRACE_HEADER, traceId);
    done();
  });
}

/** Headers that carry the trace to a collaborator. */
export function traceHeaders(traceId?: string): Record<string, string> {
  return traceId ? { [TRACE_HEADER]: traceId } : {};
}

export function withTraceId(logger: Logger, traceId: string): Logger {
  return logger.child({ traceId });
}

/** Without a caller-supplied trace, the orchestration id doubles as the trace id. */
export function orchestrationLogger(logger: Logger, orchestrationId: string, traceId?: string): Logger {
  return logger.child({ traceId: traceId ?? orchestrationId, orchestrationId });
}
