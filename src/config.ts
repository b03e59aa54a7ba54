/**
 * Central configuration module.
 * Loads optional ~/.chat-ledger/config.json (or $CHAT_LEDGER_CONFIG), merges with defaults.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";

/** How multi-amount messages are cut into one segment per amount */
export type SegmentationPolicy = "clause" | "proximity";

export interface AppConfig {
  currency: {
    code: string;
    locale: string;
  };
  /** IANA zone used for "today" in chat and as the default zone of new rules */
  timezone: string;
  parser: {
    /** Drafts at or above this confidence are committed without asking */
    autoCommitThreshold: number;
    /** Confidence of a rule-layer category match without a movement verb */
    ruleConfidence: number;
    maxInputChars: number;
    segmentation: SegmentationPolicy;
  };
  classifier: {
    command: string;
    timeoutMs: number;
    maxOutputTokens: number;
  };
  pendingActions: {
    ttlMinutes: number;
  };
  recurring: {
    defaultReminderOffsets: number[];
    defaultReminderHour: number;
  };
  scheduler: {
    intervalMs: number;
  };
}

export const DEFAULT_CONFIG: AppConfig = {
  currency: {
    code: "COP",
    locale: "es-CO",
  },
  timezone: "America/Bogota",
  parser: {
    autoCommitThreshold: 0.85,
    ruleConfidence: 0.8,
    maxInputChars: 1200,
    segmentation: "clause",
  },
  classifier: {
    command: "claude",
    timeoutMs: 20_000,
    maxOutputTokens: 400,
  },
  pendingActions: {
    ttlMinutes: 30,
  },
  recurring: {
    defaultReminderOffsets: [3, 1, 0],
    defaultReminderHour: 9,
  },
  scheduler: {
    intervalMs: 5 * 60_000,
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = target[key];
    if (isRecord(srcVal) && isRecord(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }
  return result;
}

let cached: AppConfig | null = null;

export function getConfigPath(): string {
  return process.env.CHAT_LEDGER_CONFIG || join(homedir(), ".chat-ledger", "config.json");
}

export function getConfig(): AppConfig {
  if (cached) return cached;

  let overrides: Record<string, unknown> = {};

  try {
    const raw = readFileSync(getConfigPath(), "utf-8");
    const parsed: unknown = JSON.parse(raw);
    if (isRecord(parsed)) overrides = parsed;
  } catch {
    // No config file or invalid JSON, use defaults
  }

  cached = deepMerge(DEFAULT_CONFIG as unknown as Record<string, unknown>, overrides) as unknown as AppConfig;
  return cached;
}

/** Reset cached config (for testing). */
export function _resetConfig(): void {
  cached = null;
}
