/**
 * Pipeline counters.
 *
 * Plain module state, no timers. Bus, supervisor and REST layers bump these;
 * the /health endpoint reads a snapshot.
 */

export interface PipelineMetrics {
  published: number;
  delivered: number;
  dropped: number;
  restarts: number;
  requests: number;
  request_errors: number;
}

const ZERO: PipelineMetrics = {
  published: 0,
  delivered: 0,
  dropped: 0,
  restarts: 0,
  requests: 0,
  request_errors: 0,
};

const counters: PipelineMetrics = { ...ZERO };

export function recordPublish(delivered: number, dropped: number): void {
  counters.published++;
  counters.delivered += delivered;
  counters.dropped += dropped;
}

export function recordRestart(): void {
  counters.restarts++;
}

export function recordRequest(statusCode: number): void {
  counters.requests++;
  if (statusCode >= 500) counters.request_errors++;
}

export function getMetrics(): PipelineMetrics {
  return { ...counters };
}

/** Test helper */
export function resetMetrics(): void {
  Object.assign(counters, ZERO);
}
