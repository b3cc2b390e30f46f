/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { readFile } from "node:fs/promises";
import { ConfigError } from "@scalargrad/core";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function requireArg(kv: Record<string, string>, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new ConfigError({ message: `Missing required argument: --${key}${label ? ` (${label})` : ""}` });
  }
  return val;
}

function numberArg(kv: Record<string, string>, key: string, defaultVal: number, parse: (s: string) => number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = parse(val);
  if (Number.isNaN(n)) {
    throw new ConfigError({ message: `--${key} must be a number, got "${val}"` });
  }
  return n;
}

export function intArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  return numberArg(kv, key, defaultVal, (s) => parseInt(s, 10));
}

export function floatArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  return numberArg(kv, key, defaultVal, parseFloat);
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

/** Comma-separated numbers, e.g. `--hidden=16,16`. An empty value gives []. */
export function listArg(kv: Record<string, string>, key: string, defaultVal: readonly number[]): number[] {
  const val = kv[key];
  if (val === undefined) return defaultVal.slice();
  if (val.trim() === "") return [];
  return val.split(",").map((s) => {
    const n = Number(s.trim());
    if (s.trim() === "" || Number.isNaN(n)) {
      throw new ConfigError({ message: `--${key} must be a comma-separated list of numbers, got "${val}"` });
    }
    return n;
  });
}

/** Load a JSON config file and merge with CLI overrides. */
export async function loadConfig(kv: Record<string, string>): Promise<Record<string, string>> {
  const configPath = kv["config"];
  if (!configPath) return kv;
  const raw = await readFile(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (cause) {
    throw new ConfigError({ message: `Failed to parse config at ${configPath}: invalid JSON`, cause });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError({ message: `Config at ${configPath} must be a JSON object` });
  }
  const config: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    config[key] = Array.isArray(value) ? value.join(",") : String(value);
  }
  // CLI overrides take precedence
  return { ...config, ...kv };
}
