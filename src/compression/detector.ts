/**
 * Compression format detection
 *
 * Component FASTA files must be plain text for byte-offset access, so the
 * index layer uses this to refuse gzip and zstd inputs before reading them.
 */

import { CompressionError } from "../errors";
import type { CompressionDetection, CompressionFormat } from "../types";

const GZIP_MAGIC = new Uint8Array([0x1f, 0x8b]);
const ZSTD_MAGIC = new Uint8Array([0x28, 0xb5, 0x2f, 0xfd]);

/**
 * Extensions matched against the lower-cased path
 */
const COMPRESSION_EXTENSIONS: Record<Exclude<CompressionFormat, "none">, readonly string[]> = {
  gzip: [".gz", ".gzip", ".bgz"],
  zstd: [".zst", ".zstd"],
};

/**
 * Compression format detector
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension("contigs.fa.gz"); // "gzip"
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])).format; // "gzip"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");

    for (const ext of COMPRESSION_EXTENSIONS.gzip) {
      if (normalizedPath.endsWith(ext)) return "gzip";
    }
    for (const ext of COMPRESSION_EXTENSIONS.zstd) {
      if (normalizedPath.endsWith(ext)) return "zstd";
    }
    return "none";
  }

  /**
   * Detect compression format from the leading bytes of a file
   *
   * @throws {CompressionError} If no bytes are given
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    if (bytes.length === 0) {
      throw new CompressionError("Bytes array must not be empty", "none", "detect");
    }

    if (startsWith(bytes, GZIP_MAGIC)) {
      return {
        format: "gzip",
        magicBytes: bytes.slice(0, GZIP_MAGIC.length),
        detectionMethod: "magic-bytes",
      };
    }

    if (startsWith(bytes, ZSTD_MAGIC)) {
      return {
        format: "zstd",
        magicBytes: bytes.slice(0, ZSTD_MAGIC.length),
        detectionMethod: "magic-bytes",
      };
    }

    return {
      format: "none",
      detectionMethod: "magic-bytes",
    };
  }

  /**
   * Combine extension and magic bytes; magic bytes win a disagreement
   *
   * Without bytes (or with an empty file) only the extension is used.
   */
  static hybrid(filePath: string, bytes?: Uint8Array): CompressionDetection {
    const extensionFormat = CompressionDetector.fromExtension(filePath);
    const extension = filePath.substring(filePath.lastIndexOf("."));

    if (bytes === undefined || bytes.length === 0) {
      return { format: extensionFormat, extension, detectionMethod: "extension" };
    }

    const magic = CompressionDetector.fromMagicBytes(bytes);
    return {
      format: magic.format,
      ...(magic.magicBytes !== undefined && { magicBytes: magic.magicBytes }),
      extension,
      detectionMethod: "hybrid",
    };
  }
}

function startsWith(bytes: Uint8Array, magic: Uint8Array): boolean {
  return bytes.length >= magic.length && magic.every((byte, index) => bytes[index] === byte);
}
