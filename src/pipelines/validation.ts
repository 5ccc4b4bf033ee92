import { constants as fsConstants, promises as fs, Stats } from "node:fs";
import path from "node:path";
import mime from "mime-types";
import { ValidationError } from "../domain/errors.js";
import { ValidationReport } from "../domain/types.js";
import { ContentSniffer } from "../infra/parsers/contentSniffer.js";
import {
  getSupportedDocumentExtensions,
  isSupportedDocumentExtension,
} from "../infra/parsers/documentLoader.js";
import { Logger } from "../infra/logging/logger.js";

const BYTES_PER_MB = 1024 * 1024;

const EXPECTED_CONTENT_TYPES: Record<string, readonly string[]> = {
  ".txt": ["text/plain", "text/x-plain"],
  ".md": ["text/plain", "text/markdown", "text/x-markdown"],
  ".pdf": ["application/pdf"],
};

// Traversal, home expansion, shell metacharacters and NUL.
const UNSAFE_PATH_PATTERNS = ["..", "~", "$", "`", "|", ";", "&", "\0"];

export class FileValidator {
  private readonly logger: Logger;

  constructor(
    private readonly sniffer: ContentSniffer,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "validator" });
  }

  /**
   * Read-only inspection of an uploaded file. The path check runs before any
   * filesystem access, so an unsafe path is rejected whatever the file holds.
   */
  async validate(filePath: string, maxSizeBytes: number): Promise<ValidationReport> {
    assertSafePath(filePath);

    const absolutePath = path.resolve(filePath);
    const stats = await statFile(absolutePath);
    if (!stats.isFile()) {
      throw new ValidationError("NotARegularFile", `Path is not a file: ${filePath}`, {
        path: absolutePath,
      });
    }

    const sizeBytes = stats.size;
    if (sizeBytes === 0) {
      throw new ValidationError("Empty", "File is empty.", { path: absolutePath, sizeBytes });
    }
    if (sizeBytes > maxSizeBytes) {
      throw new ValidationError(
        "TooLarge",
        `File too large: ${toMb(sizeBytes)}MB (max: ${toMb(maxSizeBytes)}MB).`,
        { path: absolutePath, sizeBytes, limitBytes: maxSizeBytes },
      );
    }

    const extension = path.extname(absolutePath).toLowerCase();
    if (!isSupportedDocumentExtension(absolutePath)) {
      throw new ValidationError(
        "UnsupportedType",
        `Unsupported file type: ${extension || "(none)"}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
        { path: absolutePath, extension },
      );
    }

    const warnings: string[] = [];
    let contentType = "unknown";
    const sniffed = await this.sniffer.sniff(absolutePath);
    if (sniffed.status === "unavailable") {
      const warning = `Content type could not be verified: ${sniffed.reason}`;
      warnings.push(warning);
      this.logger.warn({ path: absolutePath }, warning);
    } else {
      contentType = sniffed.mimeType;
      const expected = EXPECTED_CONTENT_TYPES[extension] ?? [];
      if (!expected.includes(contentType)) {
        throw new ValidationError(
          "TypeMismatch",
          `Content type mismatch: file has extension ${extension} but content type is ${contentType}.`,
          { path: absolutePath, extension, contentType },
        );
      }
    }

    try {
      await fs.access(absolutePath, fsConstants.R_OK);
    } catch (error) {
      throw new ValidationError("PermissionDenied", "File is not readable.", {
        path: absolutePath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    return {
      valid: true,
      absolutePath,
      fileName: path.basename(absolutePath),
      sizeBytes,
      sizeMb: toMb(sizeBytes),
      extension,
      declaredContentType: mime.lookup(extension) || null,
      contentType,
      warnings,
    };
  }
}

export function findUnsafePathPattern(filePath: string): string | null {
  return UNSAFE_PATH_PATTERNS.find((pattern) => filePath.includes(pattern)) ?? null;
}

function assertSafePath(filePath: string): void {
  const pattern = findUnsafePathPattern(filePath);
  if (pattern !== null) {
    throw new ValidationError("UnsafePath", "Suspicious characters detected in file path.", {
      pattern: pattern === "\0" ? "NUL" : pattern,
    });
  }
}

async function statFile(absolutePath: string): Promise<Stats> {
  try {
    return await fs.stat(absolutePath);
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new ValidationError("NotFound", `File does not exist: ${absolutePath}`, {
        path: absolutePath,
      });
    }
    if (code === "EACCES" || code === "EPERM") {
      throw new ValidationError("PermissionDenied", `Cannot inspect file: ${absolutePath}`, {
        path: absolutePath,
      });
    }
    throw error;
  }
}

function toMb(bytes: number): number {
  return Math.round((bytes / BYTES_PER_MB) * 100) / 100;
}
