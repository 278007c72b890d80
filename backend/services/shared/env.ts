// backend/services/shared/env.ts

/**
 * Env loading + fail-fast getters shared by every service.
 *
 * Load order (later wins):
 *   1) repo root          → project-wide defaults
 *   2) service root       → service-specific overrides
 * Within each layer `.env` is read first, then the mode file (`.env.dev` when
 * NODE_ENV=dev, `.env.docker` when NODE_ENV=docker) overrides it.
 *
 * Notes:
 * - In production and test we prefer injected env; `.env` files are optional.
 * - Dev/docker modes require their files somewhere in the cascade or we fail fast.
 * - dotenv-expand resolves `${VAR}` references across files.
 */

import fs from "node:fs";
import path from "node:path";
import * as dotenv from "dotenv";
import { expand } from "dotenv-expand";

export const NODE_ENVS = ["dev", "docker", "production", "test"] as const;
export type NodeEnv = (typeof NODE_ENVS)[number];

export type EnvSource = Record<string, string | undefined>;

/** Find the first directory upward from `start` that contains any of the markers. */
function findRootWithMarkers(start: string, markers: string[]): string | null {
  let dir = path.resolve(start);
  for (;;) {
    for (const m of markers) {
      if (fs.existsSync(path.join(dir, m))) return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** Load a single env file over process.env; expand vars; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath, override: true });
  if (parsed.error) {
    throw new Error(
      `Failed to load env file: ${absPath}: ${String(parsed.error)}`
    );
  }
  expand(parsed);
  return true;
}

/** Candidate files for a mode, in load order within a layer. */
function modeFiles(mode: NodeEnv): string[] {
  if (mode === "dev") return [".env", ".env.dev"];
  if (mode === "docker") return [".env", ".env.docker"];
  return [".env"];
}

/**
 * Cascading loader for a service. Returns the files that were loaded, in order.
 *
 * Variables already present in process.env before the first file is read are
 * never overwritten (injected env beats files); between files, later ones win.
 */
export function loadEnvCascadeForService(serviceRootAbs: string): string[] {
  const mode = requireEnum("NODE_ENV", NODE_ENVS);

  const serviceRoot = path.resolve(serviceRootAbs);
  const repoRoot =
    findRootWithMarkers(serviceRoot, [".git", "package.json"]) ?? serviceRoot;

  const layers =
    repoRoot === serviceRoot ? [serviceRoot] : [repoRoot, serviceRoot];

  const injected = new Set(Object.keys(process.env));
  const loaded: string[] = [];
  for (const dir of layers) {
    for (const name of modeFiles(mode)) {
      const abs = path.join(dir, name);
      const before = snapshot(injected);
      if (!loadIfExists(abs)) continue;
      restore(before);
      loaded.push(abs);
    }
  }

  const allowMissing = mode === "production" || mode === "test";
  if (!loaded.length && !allowMissing) {
    const looked = layers.flatMap((d) =>
      modeFiles(mode).map((n) => `  - ${path.join(d, n)}`)
    );
    throw new Error(
      `No env files found for mode="${mode}". Looked in:\n${looked.join("\n")}`
    );
  }
  return loaded;
}

function snapshot(keys: Set<string>): EnvSource {
  const out: EnvSource = {};
  for (const k of keys) out[k] = process.env[k];
  return out;
}

function restore(values: EnvSource): void {
  for (const [k, v] of Object.entries(values)) {
    if (v !== undefined) process.env[k] = v;
  }
}

// ─────────────────────────────── Getters ──────────────────────────────────────

export function requireEnv(name: string, env: EnvSource = process.env): string {
  const v = env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

export function optionalEnv(
  name: string,
  env: EnvSource = process.env
): string | undefined {
  const v = env[name];
  return v && v.trim() ? v.trim() : undefined;
}

export function requireEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env
): T {
  const v = requireEnv(name, env);
  const hit = allowed.find((a) => a === v);
  if (hit === undefined) {
    throw new Error(
      `Invalid env var ${name}="${v}". Allowed: ${allowed.join(", ")}`
    );
  }
  return hit;
}

export function requireNumber(
  name: string,
  env: EnvSource = process.env
): number {
  const v = requireEnv(name, env);
  if (!/^\d+$/.test(v))
    throw new Error(`Env var ${name} must be a number, got "${v}"`);
  return Number(v);
}

/** Comma-separated list; blank entries dropped. Missing → []. */
export function optionalList(
  name: string,
  env: EnvSource = process.env
): string[] {
  return (optionalEnv(name, env) ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
