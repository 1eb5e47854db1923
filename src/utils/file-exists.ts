import { stat } from "node:fs/promises";

/**
 * Check if a path exists; with "file", only a regular file counts
 */
export async function fileExists(
  target: string,
  kind?: "file",
): Promise<boolean> {
  try {
    const info = await stat(target);
    return kind === "file" ? info.isFile() : true;
  } catch {
    return false;
  }
}
