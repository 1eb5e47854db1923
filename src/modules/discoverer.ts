/**
 * Discoverer Module
 * Walks the scan range of a file and collects its distinct FAIMS compensation voltages
 */

import type { CvDiscovery, CvObservation, RawScanReader } from "../types";
import type { Logger } from "../utils/logger";
import type { ScanWarningLedger } from "../utils/warning-ledger";

/**
 * Matches scan filters of the form
 *   FTMS + p NSI cv=-45.00 Full ms
 *   ITMS + c NSI cv=-65.00 r d Full ms2 438.7423@cid35.00
 */
// The marker check ignores case; the value itself must follow a lower-case "cv="
const CV_PATTERN = /cv=([0-9.+-]+)/;
const CV_MARKER = "cv=";

// Preview only: once every CV has been seen this many times, stop scanning
const EARLY_STOP_OCCURRENCES = 50;

export interface DiscoverOptions {
  preview?: boolean;
  logger: Logger;
  ledger: ScanWarningLedger;
  // Missing scans are skipped silently unless this is set
  warnOnMissingScans?: boolean;
}

type CvExtraction =
  | { ok: true; cv: number; filterTextMatch: string }
  | { ok: false; warning: string; rateLimited: boolean };

/**
 * Pull the CV value out of a scan's filter text
 */
export function extractCv(
  scanNumber: number,
  filterText: string | undefined,
): CvExtraction {
  if (filterText === undefined) {
    return {
      ok: false,
      warning: `Scan ${scanNumber} not found; skipping`,
      rateLimited: false,
    };
  }

  if (!filterText.toLowerCase().includes(CV_MARKER)) {
    return {
      ok: false,
      warning: `Scan ${scanNumber} does not contain cv=; skipping`,
      rateLimited: true,
    };
  }

  const match = CV_PATTERN.exec(filterText);
  if (!match) {
    return {
      ok: false,
      warning: `Scan ${scanNumber} has cv= in the filter text, but it is not followed by a number: ${filterText}`,
      rateLimited: true,
    };
  }

  // Number() rejects partial numbers such as "1.2.3" or "-"
  const cv = Number(match[1]);
  if (!Number.isFinite(cv)) {
    return {
      ok: false,
      warning: `Unable to parse the CV value for scan ${scanNumber}: ${match[1]}`,
      rateLimited: true,
    };
  }

  return { ok: true, cv, filterTextMatch: match[0] };
}

/**
 * Find the distinct CV values of a file, in the order they are first seen
 */
export function discoverCvValues(
  reader: RawScanReader,
  options: DiscoverOptions,
): CvDiscovery {
  const { preview = false, logger, ledger, warnOnMissingScans = false } =
    options;
  const observations = new Map<number, CvObservation>();
  let scansExamined = 0;
  let stoppedEarly = false;

  for (
    let scanNumber = reader.scanRangeStart;
    scanNumber <= reader.scanRangeEnd;
    scanNumber++
  ) {
    scansExamined++;
    const result = extractCv(scanNumber, reader.lookupFilterText(scanNumber));

    if (!result.ok) {
      const report = result.rateLimited
        ? ledger.record(reader.sourcePath, scanNumber)
        : warnOnMissingScans;
      if (report) logger.warn(result.warning);
      continue;
    }

    const known = observations.get(result.cv);
    if (!known) {
      observations.set(result.cv, {
        filterTextMatch: result.filterTextMatch,
        occurrenceCount: 1,
      });
      continue;
    }

    known.occurrenceCount++;

    // Instruments cycle through their CV list, so once every value has been
    // seen often enough no new value is expected
    // Counts include the current scan, so the stop comes on a value's 51st occurrence
    if (preview && known.occurrenceCount > EARLY_STOP_OCCURRENCES) {
      const allSeen = [...observations.values()].every(
        (o) => o.occurrenceCount > EARLY_STOP_OCCURRENCES,
      );
      if (allSeen) {
        stoppedEarly = true;
        break;
      }
    }
  }

  const cvValues = new Map<number, string>();
  for (const [cv, observation] of observations) {
    cvValues.set(cv, observation.filterTextMatch);
  }

  return { cvValues, scansExamined, stoppedEarly };
}
