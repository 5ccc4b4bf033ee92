import { open } from "node:fs/promises";
import { fileTypeFromBuffer } from "file-type";

export type SniffResult =
  | { status: "detected"; mimeType: string }
  | { status: "unavailable"; reason: string };

export interface ContentSniffer {
  sniff(filePath: string): Promise<SniffResult>;
}

// file-type needs at most 4100 bytes for the signatures it knows.
const SAMPLE_BYTES = 4100;

/**
 * Magic-byte sniffer. Files with no known binary signature are classified
 * by their head: no NUL bytes means `text/plain`.
 */
export class FileTypeSniffer implements ContentSniffer {
  async sniff(filePath: string): Promise<SniffResult> {
    let head: Buffer;
    try {
      head = await readHead(filePath, SAMPLE_BYTES);
    } catch (error) {
      return { status: "unavailable", reason: `cannot read file head: ${messageOf(error)}` };
    }

    let detected: Awaited<ReturnType<typeof fileTypeFromBuffer>>;
    try {
      detected = await fileTypeFromBuffer(head);
    } catch (error) {
      return { status: "unavailable", reason: `signature detection failed: ${messageOf(error)}` };
    }

    if (detected) {
      return { status: "detected", mimeType: detected.mime };
    }
    return {
      status: "detected",
      mimeType: head.includes(0) ? "application/octet-stream" : "text/plain",
    };
  }
}

async function readHead(filePath: string, bytes: number): Promise<Buffer> {
  const handle = await open(filePath, "r");
  try {
    const { buffer, bytesRead } = await handle.read(Buffer.alloc(bytes), 0, bytes, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
