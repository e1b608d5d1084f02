import type { OperationRecord, StatusSnapshot } from "@gammahedge/shared";

export const STATUS_SINK = "STATUS_SINK";

/** Operations kept in memory for `GET /operations`. */
export const RECENT_OPERATIONS_LIMIT = 200;

/** Best-effort persistence of daemon status; implementations never throw. */
export interface StatusSink {
  writeStatus(snapshot: StatusSnapshot): void;
  recordOperation(operation: OperationRecord): void;
  latestStatus(): StatusSnapshot | null;
  recentOperations(limit?: number): OperationRecord[];
}
