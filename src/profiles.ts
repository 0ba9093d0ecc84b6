import fs from 'node:fs';
import yaml from 'yaml';
import { getConfig, type Config } from './config.js';
import { ProfileFileSchema, type ProfileFile, type Timing } from './types.js';

let cache: { file?: ProfileFile; path?: string } = {};

export function loadProfiles(path: string): ProfileFile {
  const raw = fs.readFileSync(path, 'utf8');
  const file = ProfileFileSchema.parse(yaml.parse(raw) ?? {});
  cache = { file, path };
  return file;
}

/**
 * Return last loaded profile file; on first use loads PROFILES_PATH.
 * A missing file means no profiles, not an error.
 */
export function getProfiles(cfg: Config = getConfig()): ProfileFile | undefined {
  if (!cache.file && fs.existsSync(cfg.profilesPath)) loadProfiles(cfg.profilesPath);
  return cache.file;
}

/** Reload profiles from original path; throws if nothing was loaded yet. */
export function reloadProfiles(): ProfileFile {
  if (!cache.path) throw new Error('profiles_path_unknown');
  return loadProfiles(cache.path);
}

export function clearProfiles() { cache = {}; }

const secToMs = (s: number | undefined) => s === undefined ? undefined : s * 1000;

/**
 * Timing for a named profile. Precedence: profile > file defaults > environment config.
 * Unknown names throw so a typo never silently falls back to defaults.
 * The interval is clamped to the timeout and duration it has to fit into.
 */
export function resolveTiming(name?: string, file: ProfileFile | undefined = getProfiles(), cfg: Config = getConfig()): Timing {
  const profile = name === undefined ? undefined : file?.profiles[name];
  if (name !== undefined && !profile) throw new Error(`unknown_profile: ${name}`);
  const defaults = file?.defaults;
  const timeoutMs = secToMs(profile?.timeoutSec) ?? secToMs(defaults?.timeoutSec) ?? cfg.verifyTimeoutMs;
  const durationMs = secToMs(profile?.durationSec) ?? secToMs(defaults?.durationSec) ?? cfg.invariantDurationMs;
  const intervalMs = secToMs(profile?.intervalSec) ?? secToMs(defaults?.intervalSec) ?? cfg.verifyIntervalMs;
  return { timeoutMs, durationMs, intervalMs: Math.min(intervalMs, timeoutMs, durationMs) };
}
