import type { IncomingMessage, ServerResponse } from "node:http";
import type { PrometheusMetricsCollector } from "../adapters/prometheus-metrics-collector.js";

export async function handleMetrics(
  _req: IncomingMessage,
  res: ServerResponse,
  collector: Pick<PrometheusMetricsCollector, "getMetricsOutput" | "contentType">,
): Promise<void> {
  const output = await collector.getMetricsOutput();
  res.writeHead(200, { "Content-Type": collector.contentType });
  res.end(output);
}
