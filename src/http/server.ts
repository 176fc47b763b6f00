import { createHash, timingSafeEqual } from "node:crypto";
import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { PrometheusMetricsCollector } from "../adapters/prometheus-metrics-collector.js";
import type { Logger } from "../interfaces/logger.js";
import { handleApiSessions, type SessionService } from "./api-sessions.js";
import { type HealthContext, handleHealth } from "./health.js";
import { handleMetrics } from "./metrics-endpoint.js";

export interface HttpServerOptions {
  service: SessionService;
  apiKey?: string;
  healthContext?: HealthContext;
  prometheusCollector?: PrometheusMetricsCollector;
  logger?: Logger;
}

/** Timing-safe string comparison using SHA-256 to normalize lengths. */
function timingSafeCompare(a: string, b: string): boolean {
  const hashA = createHash("sha256").update(a).digest();
  const hashB = createHash("sha256").update(b).digest();
  return timingSafeEqual(hashA, hashB);
}

/** Request handler behind createXcdeltaServer, exported for in-process tests. */
export function createRequestHandler(
  options: HttpServerOptions,
): (req: IncomingMessage, res: ServerResponse) => void {
  const { service, apiKey } = options;

  return (req, res) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    // With an API key, every endpoint requires Authorization: Bearer <key>
    if (apiKey) {
      const auth = req.headers.authorization ?? "";
      if (!timingSafeCompare(auth, `Bearer ${apiKey}`)) {
        res.writeHead(401, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ error: "Unauthorized" }));
        return;
      }
    }

    if (url.pathname === "/health") {
      handleHealth(req, res, options.healthContext);
      return;
    }

    if (url.pathname === "/metrics" && options.prometheusCollector) {
      handleMetrics(req, res, options.prometheusCollector).catch((error: unknown) => {
        options.logger?.error("Failed to render metrics", { error });
        res.writeHead(500, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ error: "Internal error" }));
      });
      return;
    }

    if (url.pathname === "/api/sessions" || url.pathname.startsWith("/api/sessions/")) {
      handleApiSessions(req, res, url, service);
      return;
    }

    res.writeHead(404);
    res.end("Not Found");
  };
}

export function createXcdeltaServer(options: HttpServerOptions): Server {
  return createHttpServer(createRequestHandler(options));
}
