import { Logger } from "@aws-lambda-powertools/logger";
import { Metrics, MetricUnit } from "@aws-lambda-powertools/metrics";
import { Tracer } from "@aws-lambda-powertools/tracer";

import type { IngestConfig } from "./config.js";

export type LogAttributes = Record<string, unknown>;

export interface LogSink {
  info(message: string, attributes?: LogAttributes): void;
  error(message: string, attributes?: LogAttributes): void;
}

export interface TraceSink {
  span<T>(name: string, fn: () => Promise<T>): Promise<T>;
  // Marks the innermost open span as failed.
  recordError(error: Error): void;
}

export interface MetricSink {
  count(name: string): void;
  flush(): void;
}

export class PowertoolsLogSink implements LogSink {
  constructor(readonly logger: Logger) {}

  info(message: string, attributes: LogAttributes = {}): void {
    this.logger.info(message, attributes);
  }

  error(message: string, attributes: LogAttributes = {}): void {
    this.logger.error(message, attributes);
  }
}

type TraceSegment = NonNullable<ReturnType<Tracer["getSegment"]>>;

export class PowertoolsTraceSink implements TraceSink {
  private active?: TraceSegment;

  constructor(readonly tracer: Tracer) {}

  // Opens an X-Ray subsegment under the current segment for the duration of fn.
  async span<T>(name: string, fn: () => Promise<T>): Promise<T> {
    if (!this.tracer.isTracingEnabled()) {
      return fn();
    }

    const parent = this.tracer.getSegment();
    const subsegment = parent?.addNewSubsegment(name);
    const enclosing = this.active;
    if (subsegment) {
      this.tracer.setSegment(subsegment);
      this.active = subsegment;
    }

    try {
      return await fn();
    } catch (err) {
      if (subsegment && err instanceof Error) {
        subsegment.addError(err);
      }
      throw err;
    } finally {
      subsegment?.close();
      this.active = enclosing;
      if (parent) {
        this.tracer.setSegment(parent);
      }
    }
  }

  recordError(error: Error): void {
    this.active?.addError(error);
  }
}

export class PowertoolsMetricSink implements MetricSink {
  constructor(readonly metrics: Metrics) {}

  count(name: string): void {
    this.metrics.addMetric(name, MetricUnit.Count, 1);
  }

  flush(): void {
    this.metrics.publishStoredMetrics();
  }
}

export interface Sinks {
  logger: PowertoolsLogSink;
  tracer: PowertoolsTraceSink;
  metrics: PowertoolsMetricSink;
}

export function powertoolsSinks(config: IngestConfig): Sinks {
  return {
    logger: new PowertoolsLogSink(
      new Logger({ serviceName: config.serviceName })
    ),
    tracer: new PowertoolsTraceSink(
      new Tracer({ serviceName: config.serviceName })
    ),
    metrics: new PowertoolsMetricSink(
      new Metrics({
        namespace: config.metricsNamespace,
        serviceName: config.serviceName,
      })
    ),
  };
}
