type CacheLookup = {
  cache: "metadata" | "inventory";
  setNo: string;
};

export type MetricPayloads = {
  "external.bricklink.request": {
    ok: boolean;
    status?: number;
    method: string;
    operation: string;
    attempt: number;
    durationMs: number;
    correlationId: string;
    errorType?: string;
  };
  "external.bricklink.health": {
    ok: boolean;
    durationMs: number;
    errorCode?: string;
  };
  "catalog.cache.hit": CacheLookup;
  "catalog.cache.miss": CacheLookup;
  "inventory.set.added": {
    setNo: string;
    parts: number;
    assembled: boolean;
  };
};

export type MetricName = keyof MetricPayloads;

export type MetricEvent<N extends MetricName = MetricName> = {
  name: N;
  data: MetricPayloads[N];
  timestamp: string;
};

type MetricListener = (event: MetricEvent) => void;

const listeners = new Set<MetricListener>();

export const addMetricListener = (listener: MetricListener) => {
  listeners.add(listener);
  return () => listeners.delete(listener);
};

export const clearMetricListeners = () => listeners.clear();

export const recordMetric = <N extends MetricName>(
  name: N,
  data: MetricPayloads[N],
): MetricEvent<N> => {
  const event: MetricEvent<N> = {
    name,
    data,
    timestamp: new Date().toISOString(),
  };

  // A failing listener must not fail the request that emitted the metric.
  listeners.forEach((listener) => {
    try {
      listener(event);
    } catch (error) {
      console.warn("[metrics] listener failed", {
        name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  if (process.env.NODE_ENV !== "test" && process.env.VITEST !== "true") {
    console.debug(`[metrics] ${name}`, data);
  }

  return event;
};
