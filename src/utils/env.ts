import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

export function loadDotEnv(cwd: string = process.cwd()): void {
  const envPath = path.resolve(cwd, ".env");
  if (!fs.existsSync(envPath)) return;

  dotenv.config({ path: envPath });
}

export function getEnv(name: string): string | undefined {
  const value = process.env[name];
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
}

export function getIntEnv(name: string, fallback: number): number {
  const value = getEnv(name);
  if (!value) return fallback;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) ? n : fallback;
}

export function getVersion(): string {
  return process.env.npm_package_version ?? process.env.APP_VERSION ?? "dev";
}
