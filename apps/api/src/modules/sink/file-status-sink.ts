import fs from "node:fs";
import path from "node:path";

import type { OperationRecord, StatusSnapshot } from "@gammahedge/shared";
import { StatusSnapshotSchema } from "@gammahedge/shared";
import type { Logger } from "pino";

import { getEtClock } from "../hedging/market-clock";
import { RECENT_OPERATIONS_LIMIT, type StatusSink } from "./status-sink";

const HISTORY_FILE = /^status-history-\d{4}-\d{2}-\d{2}\.jsonl$/;
const HISTORY_DAYS_KEPT = 7;

function atomicWriteFile(filePath: string, data: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data, { encoding: "utf-8" });
  fs.renameSync(tmpPath, filePath);
}

/**
 * Writes `status.json` atomically and appends to `operations.jsonl` and a
 * per-day `status-history-YYYY-MM-DD.jsonl` under the data directory. History
 * rolls over on the New York trading day; the last seven days are kept.
 */
export class FileStatusSink implements StatusSink {
  private readonly statusPath: string;
  private historyDay: string | null = null;
  private readonly operationsPath: string;
  private readonly recent: OperationRecord[] = [];
  private latest: StatusSnapshot | null = null;

  constructor(
    private readonly dataDir: string,
    private readonly logger: Logger
  ) {
    this.statusPath = path.join(dataDir, "status.json");
    this.operationsPath = path.join(dataDir, "operations.jsonl");
  }

  writeStatus(snapshot: StatusSnapshot): void {
    this.latest = snapshot;
    try {
      fs.mkdirSync(this.dataDir, { recursive: true });
      const json = JSON.stringify(snapshot);
      atomicWriteFile(this.statusPath, JSON.stringify(snapshot, null, 2));
      fs.appendFileSync(this.historyPathFor(snapshot), `${json}\n`, { encoding: "utf-8" });
    } catch (err) {
      this.logger.warn({ msg: "Status write failed", path: this.statusPath, err });
    }
  }

  recordOperation(operation: OperationRecord): void {
    this.recent.push(operation);
    if (this.recent.length > RECENT_OPERATIONS_LIMIT) {
      this.recent.splice(0, this.recent.length - RECENT_OPERATIONS_LIMIT);
    }
    try {
      fs.mkdirSync(this.dataDir, { recursive: true });
      fs.appendFileSync(this.operationsPath, `${JSON.stringify(operation)}\n`, { encoding: "utf-8" });
    } catch (err) {
      this.logger.warn({ msg: "Operation record write failed", path: this.operationsPath, err });
    }
  }

  latestStatus(): StatusSnapshot | null {
    if (this.latest) return this.latest;
    if (!fs.existsSync(this.statusPath)) return null;
    try {
      const parsed = StatusSnapshotSchema.safeParse(JSON.parse(fs.readFileSync(this.statusPath, "utf-8")));
      if (!parsed.success) {
        this.logger.warn({ msg: "Ignoring malformed status file", path: this.statusPath, issues: parsed.error.issues.length });
        return null;
      }
      this.latest = parsed.data;
      return parsed.data;
    } catch (err) {
      this.logger.warn({ msg: "Status read failed", path: this.statusPath, err });
      return null;
    }
  }

  recentOperations(limit = 50): OperationRecord[] {
    return this.recent.slice(-limit);
  }

  private historyPathFor(snapshot: StatusSnapshot): string {
    const day = getEtClock(Date.parse(snapshot.ts)).date;
    if (day !== this.historyDay) {
      this.historyDay = day;
      this.pruneHistory(`status-history-${day}.jsonl`);
    }
    return path.join(this.dataDir, `status-history-${day}.jsonl`);
  }

  private pruneHistory(current: string): void {
    const files = fs
      .readdirSync(this.dataDir)
      .filter((name) => HISTORY_FILE.test(name) && name !== current)
      .sort();
    for (const name of files.slice(0, Math.max(0, files.length - (HISTORY_DAYS_KEPT - 1)))) {
      fs.rmSync(path.join(this.dataDir, name), { force: true });
      this.logger.info({ msg: "Status history pruned", file: name });
    }
  }
}
