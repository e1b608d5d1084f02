import fs from "node:fs";
import path from "node:path";

import { BadRequestException, Injectable } from "@nestjs/common";
import type { DaemonConfig, DaemonConfigPatch } from "@gammahedge/shared";
import { DaemonConfigPatchSchema, DaemonConfigSchema, defaultDaemonConfig } from "@gammahedge/shared";

function atomicWriteFile(filePath: string, data: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data, { encoding: "utf-8" });
  fs.renameSync(tmpPath, filePath);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function formatIssues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * Owns `DATA_DIR/config.json`. `load()` returns a frozen snapshot and re-parses
 * only when the file's mtime changes; a missing file means defaults.
 */
@Injectable()
export class ConfigService {
  private cachedConfig: DaemonConfig | null = null;
  private cachedMtimeMs: number | null = null;

  get dataDir(): string {
    return process.env.DATA_DIR ?? path.resolve(process.cwd(), "../../data");
  }

  private get configPath(): string {
    return path.join(this.dataDir, "config.json");
  }

  isInitialized(): boolean {
    return fs.existsSync(this.configPath);
  }

  migrateOnStartup(): { migrated: boolean; reason: "not_initialized" | "up_to_date" | "normalized" } {
    if (!fs.existsSync(this.configPath)) {
      this.cachedConfig = null;
      this.cachedMtimeMs = null;
      return { migrated: false, reason: "not_initialized" };
    }

    const raw = fs.readFileSync(this.configPath, "utf-8");
    const normalized = DaemonConfigSchema.parse(JSON.parse(raw));
    const nextJson = JSON.stringify(normalized, null, 2);
    if (raw.trim() === nextJson.trim()) {
      this.cachedConfig = deepFreeze(normalized);
      this.cachedMtimeMs = fs.statSync(this.configPath).mtimeMs;
      return { migrated: false, reason: "up_to_date" };
    }

    atomicWriteFile(this.configPath, nextJson);
    this.cachedConfig = deepFreeze(normalized);
    this.cachedMtimeMs = fs.statSync(this.configPath).mtimeMs;
    return { migrated: true, reason: "normalized" };
  }

  /** Throws on a malformed file; callers that run a loop keep their last good snapshot. */
  load(): DaemonConfig {
    if (!fs.existsSync(this.configPath)) {
      if (this.cachedConfig && this.cachedMtimeMs === null) return this.cachedConfig;
      this.cachedConfig = deepFreeze(defaultDaemonConfig());
      this.cachedMtimeMs = null;
      return this.cachedConfig;
    }

    const stat = fs.statSync(this.configPath);
    if (this.cachedConfig && this.cachedMtimeMs === stat.mtimeMs) {
      return this.cachedConfig;
    }

    const raw = fs.readFileSync(this.configPath, "utf-8");
    const parsed = deepFreeze(DaemonConfigSchema.parse(JSON.parse(raw)));
    this.cachedConfig = parsed;
    this.cachedMtimeMs = stat.mtimeMs;
    return parsed;
  }

  save(config: DaemonConfig): DaemonConfig {
    fs.mkdirSync(this.dataDir, { recursive: true });
    atomicWriteFile(this.configPath, JSON.stringify(config, null, 2));
    this.cachedConfig = deepFreeze(config);
    this.cachedMtimeMs = fs.statSync(this.configPath).mtimeMs;
    return this.cachedConfig;
  }

  /** Validates a per-section patch, merges it over the current config and saves it. */
  update(body: unknown): DaemonConfig {
    const patch = DaemonConfigPatchSchema.safeParse(body);
    if (!patch.success) {
      throw new BadRequestException(`Invalid config patch: ${formatIssues(patch.error)}`);
    }

    const current = this.load();
    const merged = DaemonConfigSchema.safeParse(this.merge(current, patch.data));
    if (!merged.success) {
      throw new BadRequestException(`Invalid config: ${formatIssues(merged.error)}`);
    }

    return this.save({ ...merged.data, updatedAt: new Date().toISOString() });
  }

  /** Config as served over HTTP, with the API key masked. */
  publicConfig(): DaemonConfig {
    const config = this.load();
    if (!config.api.apiKey) return config;
    return { ...config, api: { apiKey: "********" } };
  }

  private merge(current: DaemonConfig, patch: DaemonConfigPatch): DaemonConfig {
    const classification = patch.classification ?? {};
    return {
      ...current,
      broker: { ...current.broker, ...patch.broker },
      daemon: { ...current.daemon, ...patch.daemon },
      eligibility: { ...current.eligibility, ...patch.eligibility },
      classification: {
        delta: { ...current.classification.delta, ...classification.delta },
        market: { ...current.classification.market, ...classification.market },
        liquidity: { ...current.classification.liquidity, ...classification.liquidity },
        system: { ...current.classification.system, ...classification.system }
      },
      sizing: { ...current.sizing, ...patch.sizing },
      risk: { ...current.risk, ...patch.risk }
    };
  }
}
