import { NodeSDK } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-proto";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";

let sdk: NodeSDK | null = null;

/**
 * Build the OTLP traces URL from a bare host or base URL
 */
export function resolveTracesUrl(value: string): string {
  let fullUrl = value.trim();
  if (!fullUrl.startsWith("http")) {
    fullUrl = `https://${fullUrl}`;
  }
  if (!fullUrl.endsWith("/v1/traces")) {
    fullUrl = fullUrl.replace(/\/$/, "") + "/v1/traces";
  }
  return fullUrl;
}

/**
 * Start exporting spans when OTLP_TRACES_URL is set. Returns whether tracing is active.
 */
export function startTracing(env: NodeJS.ProcessEnv = process.env): boolean {
  if (sdk) {
    return true;
  }

  const tracesUrl = env.OTLP_TRACES_URL;
  if (!tracesUrl) {
    return false;
  }

  const token = env.OTLP_TOKEN;
  const exporter = new OTLPTraceExporter({
    url: resolveTracesUrl(tracesUrl),
    headers: token ? { Authorization: `Bearer ${token}` } : {},
  });

  sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: "stepwise-translator",
      [ATTR_SERVICE_VERSION]: "1.0.0",
      "deployment.environment": env.NODE_ENV || "development",
    }),
    traceExporter: exporter,
  });

  sdk.start();
  console.log(`[TRACING] Exporting traces to ${resolveTracesUrl(tracesUrl)}`);
  return true;
}

/**
 * Flush pending spans and stop the SDK
 */
export async function stopTracing(): Promise<void> {
  if (!sdk) {
    return;
  }
  const running = sdk;
  sdk = null;
  try {
    await running.shutdown();
  } catch (error) {
    console.error("Error shutting down tracing", error);
  }
}
