/**
 * AGP writer
 *
 * Renders records back to tab-separated AGP v2.1 lines.
 */

import { EVIDENCE_SEPARATOR, SUPPORTED_AGP_VERSION } from "./constants";
import type { AgpRecord } from "./types";

export class AgpWriter {
  private readonly includeVersion: boolean;

  constructor(options: { includeVersion?: boolean } = {}) {
    this.includeVersion = options.includeVersion ?? true;
  }

  /**
   * Format one record as an AGP line (no line terminator)
   */
  formatRecord(record: AgpRecord): string {
    const objectColumns = [
      record.objectId,
      record.objectBegin.toString(),
      record.objectEnd.toString(),
      record.partNumber.toString(),
      record.componentType,
    ];

    const partColumns =
      record.kind === "gap"
        ? [
            record.gapLength.toString(),
            record.gapType,
            record.linkage,
            record.linkageEvidence.join(EVIDENCE_SEPARATOR),
          ]
        : [
            record.componentId,
            record.componentBegin.toString(),
            record.componentEnd.toString(),
            record.orientation,
          ];

    return [...objectColumns, ...partColumns].join("\t");
  }

  /**
   * Format a whole file, with a version directive unless disabled
   */
  formatRecords(records: Iterable<AgpRecord>): string {
    const lines: string[] = [];
    if (this.includeVersion) {
      lines.push(`##agp-version\t${SUPPORTED_AGP_VERSION}`);
    }
    for (const record of records) {
      lines.push(this.formatRecord(record));
    }
    return `${lines.join("\n")}\n`;
  }
}
