/**
 * Per-format text extraction.
 *
 * Every supported source format is one variant of {@link DocumentFormat}; the
 * loader only ever talks to that interface. Adding a format means adding a
 * variant to {@link FORMATS}, nothing else.
 *
 *  - markdown / text : read verbatim, YAML front matter parsed into metadata
 *  - pdf             : page text joined with blank lines, page markers dropped
 *  - docx            : raw paragraph text
 *  - csv / json      : records rendered as `field: value` lines
 */
import path from "node:path";
import matter from "gray-matter";
import mammoth from "mammoth";
import { PDFParse } from "pdf-parse";
import { parse as parseCsv } from "csv-parse/sync";
import { parse as parseJson } from "lossless-json";
import type { FileType, MetadataScalar, MetadataValue } from "./types";

export interface ParsedContent {
  text: string;
  metadata: Record<string, MetadataValue>;
}

/** Capability interface implemented by every format variant. */
export interface DocumentFormat {
  readonly fileType: FileType;
  /** Extensions handled, lower-case, without leading dot. */
  readonly extensions: readonly string[];
  parse(bytes: Buffer, filePath: string): Promise<ParsedContent>;
}

function toScalar(value: unknown): MetadataScalar {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  return JSON.stringify(value);
}

/**
 * Coerce arbitrary parsed values (YAML, JSON) into the flat metadata model:
 * dates become ISO strings, nested structures become JSON text.
 */
export function toMetadataValue(value: unknown): MetadataValue {
  return Array.isArray(value) ? value.map(toScalar) : toScalar(value);
}

function normalizeMetadata(data: Record<string, unknown>): Record<string, MetadataValue> {
  const out: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(data)) {
    if (value === undefined) continue;
    out[key] = toMetadataValue(value);
  }
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Flatten a record into `dotted.path: value` lines, keeping field names. */
export function renderRecord(record: Record<string, unknown>, prefix = ""): string[] {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(record)) {
    const name = prefix ? `${prefix}.${key}` : key;
    if (isRecord(value)) {
      lines.push(...renderRecord(value, name));
    } else if (Array.isArray(value) && value.some((v) => typeof v === "object" && v !== null)) {
      value.forEach((item, i) => {
        if (isRecord(item)) lines.push(...renderRecord(item, `${name}.${i}`));
        else lines.push(`${name}.${i}: ${String(toScalar(item))}`);
      });
    } else if (Array.isArray(value)) {
      lines.push(`${name}: ${value.map((v) => String(toScalar(v))).join(", ")}`);
    } else {
      lines.push(`${name}: ${String(toScalar(value))}`);
    }
  }
  return lines;
}

function refuseCode(language: string) {
  return (): object => {
    throw new Error(`front matter in "${language}" is executable and is not parsed`);
  };
}

// gray-matter evaluates `---js` blocks by default. Front matter is data only.
const FRONT_MATTER_OPTIONS = {
  engines: { js: refuseCode("js"), javascript: refuseCode("javascript") },
};

/** Front-matter aware plain text (shared by markdown and text variants). */
function frontMatterFormat(fileType: FileType, extensions: string[]): DocumentFormat {
  return {
    fileType,
    extensions,
    async parse(bytes) {
      const parsed = matter(bytes.toString("utf8"), FRONT_MATTER_OPTIONS);
      return { text: parsed.content, metadata: normalizeMetadata(parsed.data) };
    },
  };
}

const pdfFormat: DocumentFormat = {
  fileType: "pdf",
  extensions: ["pdf"],
  async parse(bytes) {
    const parser = new PDFParse({ data: bytes });
    try {
      const result = await parser.getText();
      const text = result.pages
        .map((p) => p.text.trim())
        .filter(Boolean)
        .join("\n\n");
      return { text, metadata: { pages: result.pages.length } };
    } finally {
      await parser.destroy();
    }
  },
};

const docxFormat: DocumentFormat = {
  fileType: "docx",
  extensions: ["docx"],
  async parse(bytes) {
    const result = await mammoth.extractRawText({ buffer: bytes });
    // Paragraph breaks come through as runs of newlines; keep one blank line.
    const text = result.value.replace(/\r\n/g, "\n").replace(/\n{3,}/g, "\n\n").trim();
    return { text, metadata: {} };
  },
};

const csvFormat: DocumentFormat = {
  fileType: "csv",
  extensions: ["csv", "tsv"],
  async parse(bytes, filePath) {
    const delimiter = path.extname(filePath).toLowerCase() === ".tsv" ? "\t" : ",";
    const rows: unknown = parseCsv(bytes, {
      columns: true,
      bom: true,
      delimiter,
      skip_empty_lines: true,
      trim: true,
    });
    if (!Array.isArray(rows)) throw new Error("CSV parser returned no records");
    const records = rows.filter(isRecord);
    const columns = records.length ? Object.keys(records[0]) : [];
    const text = records.map((r) => renderRecord(r).join("\n")).join("\n\n");
    return { text, metadata: { rows: records.length, columns } };
  },
};

const jsonFormat: DocumentFormat = {
  fileType: "json",
  extensions: ["json"],
  async parse(bytes) {
    // Numbers stay as their source text so ids beyond 2^53 render unchanged.
    const data: unknown = parseJson(bytes.toString("utf8"), null, (digits) => digits);
    const records: unknown[] = Array.isArray(data) ? data : [data];
    const text = records
      .map((r) => (isRecord(r) ? renderRecord(r).join("\n") : String(toScalar(r))))
      .join("\n\n");
    return { text, metadata: { records: records.length } };
  },
};

export const FORMATS: readonly DocumentFormat[] = [
  frontMatterFormat("markdown", ["md", "markdown", "mdx"]),
  frontMatterFormat("text", ["txt", "log", "adoc", "rst"]),
  pdfFormat,
  docxFormat,
  csvFormat,
  jsonFormat,
];

const byExtension = new Map<string, DocumentFormat>(
  FORMATS.flatMap((f) => f.extensions.map((ext) => [ext, f] as const)),
);

/** Resolve the format variant for a path, or undefined when unsupported. */
export function formatFor(filePath: string): DocumentFormat | undefined {
  return byExtension.get(path.extname(filePath).slice(1).toLowerCase());
}

/** All extensions any variant can parse. */
export function supportedExtensions(): string[] {
  return [...byExtension.keys()];
}
