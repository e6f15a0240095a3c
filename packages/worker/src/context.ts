import { readFile } from "node:fs/promises";

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Reads the active-problems note. Returns null when the file is missing or
 * blank; other read errors propagate.
 */
export async function readActiveProblems(path: string): Promise<string | null> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }
  return text.trim().length > 0 ? text : null;
}
