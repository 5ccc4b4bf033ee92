import { promises as fs } from "node:fs";
import path from "node:path";
import { LoadError } from "../../domain/errors.js";
import { normalizeText } from "../../utils/text.js";

const SUPPORTED_EXTENSIONS = new Set([".md", ".txt", ".pdf"]);

export type DocumentFormat = "text" | "markdown" | "pdf";

/** Start offset of a page or section inside the loaded text. */
export interface TextBoundary {
  offset: number;
  label: string;
}

export interface LoadedDocument {
  format: DocumentFormat;
  text: string;
  boundaries: TextBoundary[];
}

interface MarkdownLine {
  text: string;
  heading: string | null;
}

interface PdfPage {
  text: string;
  num: number | null;
}

interface PdfParseResult {
  text?: unknown;
  pages?: unknown;
}

type LegacyPdfParseFn = (dataBuffer: Buffer) => Promise<PdfParseResult>;
type PdfParseV2Ctor = new (input: { data: Buffer }) => {
  getText: () => Promise<PdfParseResult>;
  destroy?: () => Promise<void> | void;
};

export function isSupportedDocumentExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

export async function loadDocument(filePath: string): Promise<LoadedDocument> {
  const ext = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.has(ext)) {
    throw new LoadError(
      "ParseFailed",
      `Unsupported extension: ${ext}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
      { extension: ext },
    );
  }

  const data = await fs.readFile(filePath);

  if (ext === ".txt") {
    return { format: "text", text: normalizeText(decodeUtf8(data)), boundaries: [] };
  }
  if (ext === ".md") {
    return parseMarkdown(decodeUtf8(data));
  }
  return parsePdf(data, filePath);
}

/**
 * Strips markdown syntax down to readable text and records where each
 * heading starts.
 */
export function parseMarkdown(source: string): LoadedDocument {
  const lines = collapseBlankLines(toMarkdownLines(source.replace(/\r\n?/g, "\n")));

  let text = "";
  const boundaries: TextBoundary[] = [];
  lines.forEach((line, index) => {
    if (index > 0) {
      text += "\n";
    }
    if (line.heading) {
      boundaries.push({ offset: text.length, label: line.heading });
    }
    text += line.text;
  });

  const normalized = normalizeText(text);
  const shift = text.length - text.trimStart().length;
  return {
    format: "markdown",
    text: normalized,
    boundaries: boundaries.map((boundary) => ({
      offset: Math.max(0, boundary.offset - shift),
      label: boundary.label,
    })),
  };
}

function toMarkdownLines(source: string): MarkdownLine[] {
  const out: MarkdownLine[] = [];
  let inFence = false;

  for (const raw of source.split("\n")) {
    const line = raw.replace(/\t/g, " ").replace(/\s+$/g, "");

    if (/^\s*(```|~~~)/.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) {
      out.push({ text: line, heading: null });
      continue;
    }
    if (/^\s*([-*_])(\s*\1){2,}\s*$/.test(line)) {
      continue;
    }

    const heading = /^\s{0,3}#{1,6}\s+(.*?)(\s+#+)?$/.exec(line);
    if (heading) {
      const title = stripInline(heading[1]).trim();
      out.push({ text: title, heading: title || null });
      continue;
    }

    const body = line
      .replace(/^\s*>\s?/, "")
      .replace(/^(\s*)(?:[-*+]|\d+[.)])\s+(\[[ xX]\]\s+)?/, "$1");
    out.push({ text: stripInline(body), heading: null });
  }

  return out;
}

function stripInline(text: string): string {
  return text
    .replace(/!\[([^\]]*)\]\([^)]*\)/g, "$1")
    .replace(/\[([^\]]+)\]\([^)]*\)/g, "$1")
    .replace(/`([^`]*)`/g, "$1")
    .replace(/(\*\*|__)(.+?)\1/g, "$2")
    .replace(/\*(\S(?:.*?\S)?)\*/g, "$1")
    .replace(/(^|[^\w])_(\S(?:.*?\S)?)_(?=[^\w]|$)/g, "$1$2")
    .replace(/~~(.+?)~~/g, "$1")
    .replace(/<\/?[a-zA-Z][^>]*>/g, "");
}

function collapseBlankLines(lines: MarkdownLine[]): MarkdownLine[] {
  const out: MarkdownLine[] = [];
  for (const line of lines) {
    const blank = line.text.trim() === "";
    if (blank && (out.length === 0 || out[out.length - 1].text.trim() === "")) {
      continue;
    }
    out.push(blank ? { text: "", heading: null } : line);
  }
  while (out.length > 0 && out[out.length - 1].text === "") {
    out.pop();
  }
  return out;
}

async function parsePdf(buffer: Buffer, filePath: string): Promise<LoadedDocument> {
  let result: PdfParseResult;
  try {
    result = await extractPdf(buffer);
  } catch (error) {
    if (error instanceof LoadError) {
      throw error;
    }
    throw new LoadError(
      "ParseFailed",
      `Failed to extract text from PDF ${path.basename(filePath)}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      { path: filePath },
      { cause: error },
    );
  }

  const pages = readPages(result.pages);
  if (pages.length === 0) {
    const text = typeof result.text === "string" ? result.text : "";
    return { format: "pdf", text: normalizeText(text), boundaries: [] };
  }

  let text = "";
  const boundaries: TextBoundary[] = [];
  pages.forEach((page, index) => {
    const pageText = normalizeText(page.text);
    if (!pageText) {
      return;
    }
    if (text) {
      text += "\n\n";
    }
    boundaries.push({ offset: text.length, label: `page ${page.num ?? index + 1}` });
    text += pageText;
  });

  return { format: "pdf", text, boundaries };
}

async function extractPdf(buffer: Buffer): Promise<PdfParseResult> {
  const mod: unknown = await import("pdf-parse");

  const ctor = resolvePdfParseV2Ctor(mod);
  if (ctor) {
    const parser = new ctor({ data: buffer });
    try {
      return await parser.getText();
    } finally {
      if (typeof parser.destroy === "function") {
        await parser.destroy();
      }
    }
  }

  const legacy = resolveLegacyPdfParse(mod);
  if (legacy) {
    return legacy(buffer);
  }

  throw new LoadError(
    "ParseFailed",
    "PDF parsing is unavailable: the installed pdf-parse exposes no known entry point.",
  );
}

function readPages(value: unknown): PdfPage[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const pages: PdfPage[] = [];
  for (const item of value) {
    if (!item || typeof item !== "object") {
      continue;
    }
    const page = item as { text?: unknown; num?: unknown };
    if (typeof page.text !== "string") {
      continue;
    }
    pages.push({ text: page.text, num: typeof page.num === "number" ? page.num : null });
  }
  return pages;
}

function resolveLegacyPdfParse(mod: unknown): LegacyPdfParseFn | null {
  if (typeof mod === "function") {
    return mod as LegacyPdfParseFn;
  }

  if (!mod || typeof mod !== "object") {
    return null;
  }

  const candidate = (mod as { default?: unknown }).default;
  if (typeof candidate === "function") {
    return candidate as LegacyPdfParseFn;
  }

  return null;
}

function resolvePdfParseV2Ctor(mod: unknown): PdfParseV2Ctor | null {
  if (!mod || typeof mod !== "object") {
    return null;
  }

  const named = (mod as { PDFParse?: unknown }).PDFParse;
  if (typeof named === "function") {
    return named as PdfParseV2Ctor;
  }

  return null;
}

function decodeUtf8(data: Buffer): string {
  const text = data.toString("utf-8");
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}
