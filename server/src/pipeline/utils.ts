import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import { fileURLToPath } from "node:url";

const ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

export function nowIso(): string {
  return new Date().toISOString();
}

export function epochSeconds(ms = Date.now()): number {
  return Math.round(ms) / 1000;
}

export function repoRoot(): string {
  // Three levels above server/src/pipeline.
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../../..");
}

export function outputRootAbs(): string {
  const env = process.env.ONCO_OUTPUT_DIR;
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), "output");
}

export function sessionDirAbs(sessionId: string): string {
  return path.join(outputRootAbs(), sessionId);
}

export function isSafeSessionId(id: string): boolean {
  // Prevent path traversal; session ids double as directory names.
  if (id.includes("/") || id.includes("\\") || id.includes("..")) return false;
  return /^[A-Za-z0-9_-]+$/.test(id);
}

export function randomSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (const b of bytes) {
    out += ID_SUFFIX_ALPHABET[b % ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

async function atomicWrite(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp.${process.pid}.${Date.now()}.${randomSuffix(4)}`;
  await fs.writeFile(tmpPath, data);
  await fs.rename(tmpPath, filePath);
}

export async function writeJsonFile(filePath: string, obj: unknown): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(obj, null, 2)}\n`);
}

export async function readJsonFile<T>(filePath: string): Promise<T> {
  const raw = await fs.readFile(filePath, "utf8");
  return JSON.parse(raw) as T;
}

export async function tryReadJsonFile<T>(filePath: string): Promise<T | null> {
  try {
    return await readJsonFile<T>(filePath);
  } catch {
    return null;
  }
}

export async function appendJsonLine(filePath: string, obj: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.appendFile(filePath, `${JSON.stringify(obj)}\n`, "utf8");
}

async function readTextOrEmpty(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return "";
    throw err;
  }
}

/**
 * Reads an append-only JSONL file. A torn final line (a crash mid-append) is
 * dropped; a malformed line anywhere else is corruption and throws. With
 * `repair` the torn bytes are also cut from the file, so the next append
 * starts on a clean line.
 */
export async function readJsonLines<T>(filePath: string, options: { repair?: boolean } = {}): Promise<T[]> {
  const raw = await readTextOrEmpty(filePath);
  const lines = raw.split("\n");
  const rows: T[] = [];
  let offset = 0;
  for (let i = 0; i < lines.length; i++) {
    const lineStart = offset;
    offset += Buffer.byteLength(lines[i], "utf8") + 1;
    const line = lines[i].trim();
    if (line.length === 0) continue;
    try {
      rows.push(JSON.parse(line) as T);
    } catch (err) {
      const isLast = i === lines.length - 1;
      if (!isLast) {
        throw new Error(`Corrupt JSONL row ${i + 1} in ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
      }
      if (options.repair) await fs.truncate(filePath, lineStart);
      break;
    }
  }
  return rows;
}

export async function fileSizeOrZero(filePath: string): Promise<number> {
  try {
    const st = await fs.stat(filePath);
    return st.size;
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return 0;
    throw err;
  }
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
