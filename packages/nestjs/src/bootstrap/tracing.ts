import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { AsyncLocalStorageContextManager } from "@opentelemetry/context-async-hooks";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-grpc";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-grpc";
import { PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { BatchSpanProcessor } from "@opentelemetry/sdk-trace-base";

const metricExporter = new OTLPMetricExporter();
const traceExporter = new OTLPTraceExporter();

const otelSDK = new NodeSDK({
  serviceName: "kindred",
  metricReader: new PeriodicExportingMetricReader({
    exporter: metricExporter,
    exportIntervalMillis: 10000,
  }),
  spanProcessors: [new BatchSpanProcessor(traceExporter)],
  contextManager: new AsyncLocalStorageContextManager(),
  instrumentations: [
    getNodeAutoInstrumentations({
      // noisy and of no use for an in-memory service
      "@opentelemetry/instrumentation-fs": { enabled: false },
    }),
  ],
});

export default otelSDK;
