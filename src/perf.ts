import { performance } from "perf_hooks";

type PerfStats = {
  count: number;
  totalMs: number;
  maxMs: number;
};

export type PerfReport = Record<string, { count: number; avgMs: number; maxMs: number }>;

export type PerfCollector = {
  enabled: boolean;
  mark: (name: string, durationMs: number) => void;
  time: <T>(name: string, fn: () => T) => T;
  reset: () => void;
  report: () => PerfReport;
};

export const noopCollector: PerfCollector = {
  enabled: false,
  mark: () => undefined,
  time: (_name, fn) => fn(),
  reset: () => undefined,
  report: () => ({}),
};

export function createPerfCollector(): PerfCollector {
  const stats = new Map<string, PerfStats>();

  const mark = (name: string, durationMs: number) => {
    if (!Number.isFinite(durationMs)) return;
    const current = stats.get(name) ?? { count: 0, totalMs: 0, maxMs: 0 };
    current.count += 1;
    current.totalMs += durationMs;
    current.maxMs = Math.max(current.maxMs, durationMs);
    stats.set(name, current);
  };

  const time = <T>(name: string, fn: () => T): T => {
    const start = performance.now();
    try {
      return fn();
    } finally {
      mark(name, performance.now() - start);
    }
  };

  const report = (): PerfReport => {
    const out: PerfReport = {};
    for (const [name, s] of stats) {
      out[name] = { count: s.count, avgMs: s.count > 0 ? s.totalMs / s.count : 0, maxMs: s.maxMs };
    }
    return out;
  };

  return { enabled: true, mark, time, reset: () => stats.clear(), report };
}
