/**
 * Local settings persistence: JSON file storage
 *
 * Stores the tracked-asset list, the assets dropped after a failed fetch and
 * the calculator defaults in data/settings.json.
 * Atomic writes (tmp + rename) to prevent corruption.
 * Falls back to defaults if the file is missing or corrupt.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { agentLogger, describeError } from "../utils/logger.js";
import type { TrackedAsset } from "../types/broker.js";

const log = agentLogger("settings");

// ── Schema ──────────────────────────────────────────────────

const TrackedAssetSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
});

export const RiskModeSchema = z.enum(["std", "lsv"]);

export const CalculatorDefaultsSchema = z.object({
  risk: z.number().gt(0).lt(1).default(0.3),
  riskFree: z.number().default(0),
  riskMode: RiskModeSchema.default("std"),
  stopLossStd: z.number().positive().default(2),
  stopLossMaxPercent: z.number().gt(0).lt(1).default(0.2),
});

export const UserSettingsSchema = z.object({
  assets: z.array(TrackedAssetSchema).default([]),
  disabledAssets: z.array(TrackedAssetSchema).default([]),
  calculator: CalculatorDefaultsSchema.default({}),
});

export type UserSettings = z.infer<typeof UserSettingsSchema>;
export type CalculatorDefaults = z.infer<typeof CalculatorDefaultsSchema>;

export function getDefaultSettings(): UserSettings {
  return UserSettingsSchema.parse({});
}

// ── Store ───────────────────────────────────────────────────

export class SettingsStore {
  readonly file: string;
  private settings: UserSettings;

  constructor(dataDir: string) {
    this.file = path.join(dataDir, "settings.json");
    this.settings = this.load();
  }

  /** Load settings from disk. Returns defaults if file missing or invalid. */
  load(): UserSettings {
    try {
      if (!fs.existsSync(this.file)) {
        return getDefaultSettings();
      }
      return UserSettingsSchema.parse(JSON.parse(fs.readFileSync(this.file, "utf-8")));
    } catch (err) {
      log.warn("Settings file unreadable, using defaults", { error: describeError(err) });
      return getDefaultSettings();
    }
  }

  get current(): UserSettings {
    return this.settings;
  }

  assets(): TrackedAsset[] {
    return this.settings.assets.map((asset) => ({ ...asset }));
  }

  /** Track an asset; a previously disabled one is re-enabled. False when already tracked. */
  addAsset(asset: TrackedAsset): boolean {
    if (this.settings.assets.some((a) => a.id === asset.id)) {
      return false;
    }
    this.save({
      ...this.settings,
      assets: [...this.settings.assets, asset],
      disabledAssets: this.settings.disabledAssets.filter((a) => a.id !== asset.id),
    });
    log.info("Asset added", { id: asset.id });
    return true;
  }

  /** Stop tracking an asset and remember it as disabled. False when not tracked. */
  deleteAsset(id: string): boolean {
    const removed = this.settings.assets.find((a) => a.id === id);
    if (!removed) {
      return false;
    }
    this.save({
      ...this.settings,
      assets: this.settings.assets.filter((a) => a.id !== id),
      disabledAssets: [...this.settings.disabledAssets.filter((a) => a.id !== id), removed],
    });
    log.info("Asset disabled", { id });
    return true;
  }

  /** Atomic write: tmp file, then rename */
  save(settings: unknown): UserSettings {
    const validated = UserSettingsSchema.parse(settings);
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    const tmpFile = this.file + ".tmp";
    fs.writeFileSync(tmpFile, JSON.stringify(validated, null, 2), "utf-8");
    fs.renameSync(tmpFile, this.file);
    this.settings = validated;
    return validated;
  }
}
