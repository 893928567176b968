// backend/services/shared/src/env.ts
/**
 * Why:
 * - Deterministic environment loading for every service with strict precedence:
 *   injected env → service root → repo root. First value seen for a key wins.
 * - Per NODE_ENV, try these at each layer:
 *   dev:    .env.dev → .env
 *   docker: .env.docker → .env
 *   test:   .env.test → .env
 *   prod:   .env (optional; prefer injected env)
 *
 * Notes:
 * - Only env cascade + validators live here. Boot policy is in shared bootstrap.
 * - Getters take an explicit env source so config builders stay testable.
 */

import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

export type EnvSource = Record<string, string | undefined>;

/** Find the repo root: the outermost ancestor holding .git or package.json. */
function findRepoRoot(start: string): string {
  let dir = path.resolve(start);
  let lastHit: string | null = null;
  for (;;) {
    const hasGit = fs.existsSync(path.join(dir, ".git"));
    const hasPkg = fs.existsSync(path.join(dir, "package.json"));
    if (hasGit || hasPkg) lastHit = dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return lastHit ?? path.resolve(start, "..", "..");
}

/** Load a single env file if it exists; expand; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath });
  if (parsed.error)
    throw new Error(
      `Failed to load env file: ${absPath}: ${String(parsed.error)}`
    );
  dotenvExpand.expand(parsed);
  return true;
}

/**
 * Cascading loader for a service.
 * Layers: serviceRoot → repoRoot. Returns the files that were loaded.
 *
 * dotenv never overrides keys already present in process.env, so injected
 * values always win over files.
 */
export function loadEnvCascadeForService(serviceRootAbs: string): string[] {
  const mode = (process.env.NODE_ENV || "dev").trim();

  const serviceRoot = path.resolve(serviceRootAbs);
  const repoRoot = findRepoRoot(serviceRoot);

  const modeFiles =
    mode === "production" ? [".env"] : [`.env.${mode}`, ".env"];

  // Service first: dotenv keeps the first value it sees for a key.
  const layers = [serviceRoot, repoRoot];
  const loaded: string[] = [];
  for (const dir of layers) {
    for (const name of modeFiles) {
      const p = path.join(dir, name);
      if (loadIfExists(p)) loaded.push(p);
    }
  }
  return loaded;
}

/** Getters */
export function requireEnv(name: string, env: EnvSource = process.env): string {
  const v = env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

export function optionalEnv(
  name: string,
  env: EnvSource = process.env
): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

function parseNumber(name: string, v: string): number {
  if (!/^-?\d+(\.\d+)?$/.test(v))
    throw new Error(`Env var ${name} must be a number, got "${v}"`);
  return Number(v);
}

export function requireNumber(name: string, env: EnvSource = process.env): number {
  return parseNumber(name, requireEnv(name, env));
}

/** Optional number; present-but-malformed still throws. */
export function optionalNumber(
  name: string,
  fallback: number,
  env: EnvSource = process.env
): number {
  const v = optionalEnv(name, env);
  return v === undefined ? fallback : parseNumber(name, v);
}

function parseBoolean(name: string, v: string): boolean {
  const s = v.toLowerCase();
  if (s !== "true" && s !== "false")
    throw new Error(`Env var ${name} must be "true" or "false"`);
  return s === "true";
}

export function optionalBoolean(
  name: string,
  fallback: boolean,
  env: EnvSource = process.env
): boolean {
  const v = optionalEnv(name, env);
  return v === undefined ? fallback : parseBoolean(name, v);
}

/** Comma-separated list; blanks dropped. */
export function optionalList(name: string, env: EnvSource = process.env): string[] {
  return (env[name] ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
