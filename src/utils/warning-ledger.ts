/**
 * Scan Warning Ledger
 * Rate-limits per-scan discovery warnings: the first ten warnings for a file
 * are reported, after that only every hundredth one
 */

const UNCONDITIONAL_WARNINGS = 10;
const WARNING_INTERVAL = 100;

export class ScanWarningLedger {
  private scansByFile = new Map<string, number[]>();

  /**
   * Record a scan that failed CV extraction
   * Returns true when the caller should report the warning
   */
  record(filePath: string, scanNumber: number): boolean {
    let scans = this.scansByFile.get(filePath);
    if (!scans) {
      scans = [];
      this.scansByFile.set(filePath, scans);
    }
    scans.push(scanNumber);

    const count = scans.length;
    return count <= UNCONDITIONAL_WARNINGS || count % WARNING_INTERVAL === 0;
  }

  getScans(filePath: string): readonly number[] {
    return this.scansByFile.get(filePath) ?? [];
  }
}
