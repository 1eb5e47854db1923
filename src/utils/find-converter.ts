/**
 * Converter Lookup
 * Finds the msconvert executable from config, PATH, or the usual ProteoWizard install locations
 */

import path from "node:path";
import glob from "fast-glob";
import { fileExists } from "./file-exists";
import type { ConversionConfig } from "../types";

export function converterExecutableName(
  platform: NodeJS.Platform = process.platform,
): string {
  return platform === "win32" ? "msconvert.exe" : "msconvert";
}

/**
 * Directories where ProteoWizard is usually installed
 * Versioned subdirectories (e.g. "ProteoWizard 3.0.21") are searched as well
 */
export function typicalConverterLocations(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
): string[] {
  if (platform === "win32") {
    return arch === "x64" || arch === "arm64"
      ? ["C:\\Program Files\\ProteoWizard", "C:\\DMS_Programs\\ProteoWizard"]
      : [
          "C:\\Program Files (x86)\\ProteoWizard",
          "C:\\DMS_Programs\\ProteoWizard_x86",
        ];
  }
  return ["/usr/local/bin", "/usr/bin", "/opt/pwiz"];
}

async function searchPath(
  executable: string,
  envPath: string | undefined,
): Promise<string | null> {
  if (!envPath) return null;

  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, executable);
    if (await fileExists(candidate, "file")) return candidate;
  }
  return null;
}

async function searchInstallRoot(
  root: string,
  executable: string,
): Promise<string | null> {
  const direct = path.join(root, executable);
  if (await fileExists(direct, "file")) return direct;

  const parent = path.dirname(root);
  if (!(await fileExists(parent))) return null;

  // e.g. C:\Program Files\ProteoWizard\ProteoWizard 3.0.21\msconvert.exe
  const matches = await glob(`${path.basename(root)}*/**/${executable}`, {
    cwd: parent,
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: false,
    deep: 3,
  });

  // Newest install last when sorted by name
  matches.sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));
  const newest = matches.at(-1);
  return newest ? path.normalize(newest) : null;
}

/**
 * Locate the converter executable
 * Returns null when it cannot be found
 */
export async function findConverter(
  config: ConversionConfig,
  envPath: string | undefined = process.env.PATH,
): Promise<string | null> {
  const configured = config.converter.path;
  if (configured) {
    return (await fileExists(configured, "file"))
      ? path.resolve(configured)
      : null;
  }

  const executable = converterExecutableName();

  const onPath = await searchPath(executable, envPath);
  if (onPath) return onPath;

  for (const root of typicalConverterLocations()) {
    const found = await searchInstallRoot(root, executable);
    if (found) return found;
  }

  return null;
}
