export interface CoordinatorStats {
  maxConcurrent: number;
  dispatched: number;
  completed: number;
  failed: number;
  timedOut: number;
  active: number;
  queued: number;
  averageProcessingTimeMs: number;
}
