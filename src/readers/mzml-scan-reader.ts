/**
 * mzML Scan Reader
 * Collects the scan filter text of every spectrum in an mzML file
 */

import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import type { RawScanReader } from "../types";

const SPECTRUM_START = /<spectrum\s[^>]*\bindex="(\d+)"[^>]*>/;
const SPECTRUM_ID = /\bid="([^"]*)"/;
const SCAN_IN_ID = /\bscan=(\d+)/;
// PSI-MS term MS:1000512 is the "filter string" of a scan
const FILTER_STRING = /<cvParam\b[^>]*\baccession="MS:1000512"[^>]*\bvalue="([^"]*)"/;
const SPECTRUM_END = "</spectrum>";

const XML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&apos;": "'",
};

function decodeXmlEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|apos);/g, (m) => XML_ENTITIES[m] ?? m);
}

/**
 * Scan number from a nativeID such as "controllerType=0 controllerNumber=1 scan=42"
 * Falls back to the 0-based spectrum index + 1 for IDs without a scan number
 */
function scanNumberOf(spectrumTag: string, index: number): number {
  const id = SPECTRUM_ID.exec(spectrumTag)?.[1];
  const scan = id ? SCAN_IN_ID.exec(id)?.[1] : undefined;
  return scan ? Number.parseInt(scan, 10) : index + 1;
}

export class MzmlScanReader implements RawScanReader {
  private constructor(
    readonly sourcePath: string,
    private filterTexts: Map<number, string>,
    readonly scanRangeStart: number,
    readonly scanRangeEnd: number,
  ) {}

  /**
   * Stream the file once and index filter text by scan number
   * Spectra without a filter string are left out
   */
  static async open(
    filePath: string,
    sourcePath: string = filePath,
  ): Promise<MzmlScanReader> {
    const filterTexts = new Map<number, string>();
    let rangeStart = Infinity;
    let rangeEnd = -Infinity;
    let currentScan: number | null = null;

    const lines = createInterface({
      input: createReadStream(filePath, { encoding: "utf-8" }),
      crlfDelay: Infinity,
    });

    for await (const line of lines) {
      const start = SPECTRUM_START.exec(line);
      if (start) {
        currentScan = scanNumberOf(start[0], Number.parseInt(start[1], 10));
        rangeStart = Math.min(rangeStart, currentScan);
        rangeEnd = Math.max(rangeEnd, currentScan);
      }

      if (currentScan === null) continue;

      const filter = FILTER_STRING.exec(line);
      if (filter && !filterTexts.has(currentScan)) {
        filterTexts.set(currentScan, decodeXmlEntities(filter[1]));
      }

      if (line.includes(SPECTRUM_END)) {
        currentScan = null;
      }
    }

    // An empty file yields the empty range 1..0
    if (rangeStart > rangeEnd) {
      rangeStart = 1;
      rangeEnd = 0;
    }

    return new MzmlScanReader(sourcePath, filterTexts, rangeStart, rangeEnd);
  }

  lookupFilterText(scanNumber: number): string | undefined {
    return this.filterTexts.get(scanNumber);
  }

  get scanCount(): number {
    return this.filterTexts.size;
  }
}
