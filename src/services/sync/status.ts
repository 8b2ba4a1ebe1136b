/**
 * In-memory view of the current (or last) sync run, served by
 * `GET /api/v1/sync/status`.
 */

import type { SyncPhase, SyncProgress, SyncResult } from "../../types/index.js";

export interface SyncStatusSnapshot {
  isRunning: boolean;
  runId: string | null;
  phase: SyncPhase;
  currentStep: string | null;
  entityTypes: string[];
  progress: { current: number; total: number };
  startedAt: Date | null;
  completedAt: Date | null;
  durationMs: number | null;
  lastResult: SyncResult | null;
}

export class SyncStatusTracker {
  private state: SyncStatusSnapshot = {
    isRunning: false,
    runId: null,
    phase: "IDLE",
    currentStep: null,
    entityTypes: [],
    progress: { current: 0, total: 0 },
    startedAt: null,
    completedAt: null,
    durationMs: null,
    lastResult: null,
  };

  constructor(private readonly now: () => Date = () => new Date()) {}

  start(runId: string, entityTypes: string[]): void {
    this.state = {
      ...this.state,
      isRunning: true,
      runId,
      phase: "FETCHING",
      currentStep: null,
      entityTypes: [...entityTypes],
      progress: { current: 0, total: entityTypes.length },
      startedAt: this.now(),
      completedAt: null,
      durationMs: null,
    };
  }

  update(progress: SyncProgress): void {
    if (!this.state.isRunning) return;
    this.state = {
      ...this.state,
      phase: progress.phase,
      currentStep: progress.currentItem ?? null,
      progress: { current: progress.current, total: progress.total },
    };
  }

  complete(result: SyncResult): void {
    this.state = {
      ...this.state,
      isRunning: false,
      runId: result.runId,
      phase: result.status,
      currentStep: null,
      startedAt: result.startedAt,
      completedAt: result.completedAt,
      durationMs: result.durationMs,
      lastResult: result,
    };
  }

  /** The run ended without producing a result */
  abort(reason: string): void {
    const completedAt = this.now();
    this.state = {
      ...this.state,
      isRunning: false,
      phase: "FAILED",
      currentStep: reason,
      completedAt,
      durationMs:
        this.state.startedAt === null
          ? null
          : completedAt.getTime() - this.state.startedAt.getTime(),
    };
  }

  getStatus(): SyncStatusSnapshot {
    return { ...this.state, progress: { ...this.state.progress } };
  }
}
