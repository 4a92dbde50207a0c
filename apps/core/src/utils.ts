import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CrewConfigError } from "./errors.js";

export function fail(msg: string): never {
  throw new CrewConfigError(msg);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function requireString(obj: Record<string, unknown>, key: string, context: string): string {
  const val = obj[key];
  if (typeof val !== "string" || val.trim() === "") {
    fail(`"${key}" must be a non-empty string in ${context}`);
  }
  return val;
}

export function optionalString(obj: Record<string, unknown>, key: string, context: string): string | undefined {
  const val = obj[key];
  if (val === undefined || val === null) return undefined;
  if (typeof val !== "string") fail(`"${key}" must be a string if provided in ${context}`);
  return val === "" ? undefined : val;
}

export function optionalBoolean(obj: Record<string, unknown>, key: string, context: string): boolean | undefined {
  const val = obj[key];
  if (val === undefined || val === null) return undefined;
  if (typeof val !== "boolean") fail(`"${key}" must be a boolean in ${context}`);
  return val;
}

export function optionalNumber(obj: Record<string, unknown>, key: string, context: string): number | undefined {
  const val = obj[key];
  if (val === undefined || val === null) return undefined;
  if (typeof val !== "number" || !Number.isFinite(val)) fail(`"${key}" must be a number in ${context}`);
  return val;
}

export function optionalPositiveInt(obj: Record<string, unknown>, key: string, context: string): number | undefined {
  const val = optionalNumber(obj, key, context);
  if (val !== undefined && (!Number.isInteger(val) || val <= 0)) {
    fail(`"${key}" must be a positive integer in ${context}`);
  }
  return val;
}

export function optionalStringArray(obj: Record<string, unknown>, key: string, context: string): string[] {
  const val = obj[key];
  if (val === undefined || val === null) return [];
  if (!Array.isArray(val) || !val.every((item): item is string => typeof item === "string" && item !== "")) {
    fail(`"${key}" must be an array of non-empty strings in ${context}`);
  }
  return val;
}

/**
 * Write a file so readers never observe partial content:
 * write to a sibling temp file, then rename over the target.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(filePath)}.${crypto.randomBytes(6).toString("hex")}.tmp`);
  try {
    await fs.writeFile(tmp, content);
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/** First line of a response, shortened for log output. */
export function preview(text: string, max = 80): string {
  const firstLine = text.trim().split("\n")[0] ?? "";
  return firstLine.length > max ? `${firstLine.substring(0, max)}…` : firstLine;
}
