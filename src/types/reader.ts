/**
 * Scan metadata source used by CV discovery
 */

export interface RawScanReader {
  // Path the reader was opened on; keys the scan warning ledger
  readonly sourcePath: string;
  readonly scanRangeStart: number;
  readonly scanRangeEnd: number;

  /**
   * Filter text of a scan, or undefined when the scan does not exist
   */
  lookupFilterText(scanNumber: number): string | undefined;
}
