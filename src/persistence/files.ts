import { writeFile } from "node:fs/promises";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local date as `YYYY-MM-DD`. */
export function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** Local time as `YYYY-MM-DD_HH-mm-ss`. */
export function formatTimestamp(d: Date): string {
  return `${formatDate(d)}_${pad(d.getHours())}-${pad(d.getMinutes())}-${pad(d.getSeconds())}`;
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

/**
 * Write `content` to the first path `candidate(n)` (n = 0, 1, ...) that does
 * not exist yet. Existing files are never touched.
 */
export async function writeExclusive(
  candidate: (n: number) => string,
  content: string,
): Promise<string> {
  for (let n = 0; ; n++) {
    const path = candidate(n);
    try {
      await writeFile(path, content, { encoding: "utf-8", flag: "wx" });
      return path;
    } catch (err) {
      if (isAlreadyExists(err)) continue;
      throw err;
    }
  }
}
