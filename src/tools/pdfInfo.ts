/**
 * PDF metadata extraction. pdf-lib reads the structure (pages, page boxes,
 * info dictionary, encryption flag) without decrypting anything; pdf-parse
 * is only opened for page text or to unlock an encrypted file's metadata.
 */
import fs from "node:fs";
import { PDFDocument } from "pdf-lib";
import { PDFParse } from "pdf-parse";
import { ToolError, errorMessage } from "../utils/errors.js";
import { resolveInputPath } from "../utils/security.js";
import { timed } from "../utils/timing.js";

export interface PageDimensions {
  page: number;
  width: number;
  height: number;
  unit: "pt";
}

export interface PdfInfoResult {
  success: boolean;
  errorMessage?: string;
  filePath: string;
  fileSizeBytes: number;
  pageCount: number;
  pageDimensions: PageDimensions[];
  pdfVersion: string | null;
  isEncrypted: boolean;
  title: string | null;
  author: string | null;
  subject: string | null;
  keywords: string | null;
  creator: string | null;
  producer: string | null;
  creationDate: string | null;
  modificationDate: string | null;
  // One entry per page, in page order; null unless requested
  textContent: string[] | null;
  elapsedMs: number;
}

export interface PdfInfoArgs {
  path: string;
  includeText?: boolean;
  // User or owner password of an encrypted file
  password?: string;
}

type PdfMetadata = Omit<PdfInfoResult, "success" | "errorMessage" | "filePath" | "fileSizeBytes" | "pdfVersion" | "elapsedMs">;

const HEADER_RE = /%PDF-(\d+\.\d+)/;
// The header must appear within the first 1024 bytes
const HEADER_WINDOW = 1024;

export function pdfHeaderVersion(bytes: Uint8Array): string | null {
  const head = Buffer.from(bytes.subarray(0, HEADER_WINDOW)).toString("latin1");
  const m = HEADER_RE.exec(head);
  return m ? m[1] : null;
}

function isoDate(d: Date | undefined): string | null {
  return d && !Number.isNaN(d.getTime()) ? d.toISOString() : null;
}

const text = (s: string | undefined): string | null => (s === undefined || s === "" ? null : s);

const EMPTY_METADATA: PdfMetadata = {
  pageCount: 0,
  pageDimensions: [],
  isEncrypted: false,
  title: null,
  author: null,
  subject: null,
  keywords: null,
  creator: null,
  producer: null,
  creationDate: null,
  modificationDate: null,
  textContent: null,
};

async function readMetadata(bytes: Uint8Array): Promise<PdfMetadata> {
  // Encrypted files are opened without decrypting; structure and page boxes stay readable
  const doc = await PDFDocument.load(bytes, { ignoreEncryption: true, updateMetadata: false });
  const pageDimensions = doc.getPages().map((p, i): PageDimensions => {
    const { width, height } = p.getSize();
    return { page: i + 1, width, height, unit: "pt" };
  });
  if (doc.isEncrypted) {
    // Strings in the info dictionary are still ciphertext
    return { ...EMPTY_METADATA, pageCount: doc.getPageCount(), pageDimensions, isEncrypted: true };
  }
  return {
    pageCount: doc.getPageCount(),
    pageDimensions,
    isEncrypted: false,
    title: text(doc.getTitle()),
    author: text(doc.getAuthor()),
    subject: text(doc.getSubject()),
    keywords: text(doc.getKeywords()),
    creator: text(doc.getCreator()),
    producer: text(doc.getProducer()),
    creationDate: isoDate(doc.getCreationDate()),
    modificationDate: isoDate(doc.getModificationDate()),
    textContent: null,
  };
}

function infoStrings(info: unknown): Partial<PdfMetadata> {
  if (typeof info !== "object" || info === null) return {};
  const pick = (key: string): string | null => {
    const v: unknown = Reflect.get(info, key);
    return typeof v === "string" && v !== "" ? v : null;
  };
  return {
    title: pick("Title"),
    author: pick("Author"),
    subject: pick("Subject"),
    keywords: pick("Keywords"),
    creator: pick("Creator"),
    producer: pick("Producer"),
  };
}

async function readWithPdfParse(
  bytes: Uint8Array,
  want: { password?: string; text: boolean; info: boolean }
): Promise<Partial<PdfMetadata>> {
  // pdf.js may detach the buffer it is handed
  const parser = new PDFParse({ data: new Uint8Array(bytes), password: want.password });
  try {
    let out: Partial<PdfMetadata> = {};
    if (want.info) {
      const { info } = await parser.getInfo();
      out = infoStrings(info);
    }
    if (want.text) {
      const { pages } = await parser.getText();
      out.textContent = pages.map((p) => p.text.trim());
    }
    return out;
  } finally {
    await parser.destroy();
  }
}

type Inspection = Omit<PdfInfoResult, "filePath" | "fileSizeBytes" | "pdfVersion" | "elapsedMs">;

async function inspect(bytes: Uint8Array, args: PdfInfoArgs): Promise<Inspection> {
  let meta: PdfMetadata;
  try {
    meta = await readMetadata(bytes);
  } catch (err: unknown) {
    return { success: false, errorMessage: `Not a valid PDF file: ${errorMessage(err)}`, ...EMPTY_METADATA };
  }

  const unlock = meta.isEncrypted && args.password !== undefined;
  if (!args.includeText && !unlock) return { success: true, ...meta };

  try {
    const extra = await readWithPdfParse(bytes, { password: args.password, text: !!args.includeText, info: unlock });
    return { success: true, ...meta, ...extra };
  } catch (err: unknown) {
    const reason = meta.isEncrypted ? "Failed to decrypt PDF" : "Failed to extract text";
    return { success: false, errorMessage: `${reason}: ${errorMessage(err)}`, ...meta };
  }
}

export async function extractPdfInfo(args: PdfInfoArgs): Promise<PdfInfoResult> {
  const src = resolveInputPath(args.path, { extensions: [".pdf"] });

  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(src.path);
  } catch (err: unknown) {
    throw new ToolError("read-failed", `Failed to read ${src.path}: ${errorMessage(err)}`);
  }

  const { value, elapsedMs } = await timed(() => inspect(bytes, args));
  return { ...value, filePath: src.path, fileSizeBytes: src.sizeBytes, pdfVersion: pdfHeaderVersion(bytes), elapsedMs };
}
