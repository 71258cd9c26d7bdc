import { afterEach, vi } from "vitest";

import { clearMetricListeners } from "@/server/lib/external/metrics";

afterEach(() => {
  clearMetricListeners();
  vi.useRealTimers();
});
