export type LogLevel = "debug" | "info" | "warn" | "error";

/** A full picture of a run at one moment; consumers never need to accumulate. */
export interface ProgressSnapshot {
  depth: number;
  discovered: number;
  edges: number;
  frontier: number;
  status: string;
}

export interface TopologyObserver {
  onLog(message: string, level?: LogLevel): void;
  onProgress(snapshot: ProgressSnapshot): void;
}

export const nullObserver: TopologyObserver = Object.freeze({
  onLog(): void {},
  onProgress(): void {},
});
