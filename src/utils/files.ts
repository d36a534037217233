import fs from "node:fs";
import path from "node:path";
import { ToolError, errorMessage } from "./errors.js";

export const LATEX_SOURCE_EXTENSIONS = [".tex", ".latex", ".ltx"] as const;

export type TextEncoding = "utf-8" | "latin1";

export interface DecodedText {
  text: string;
  encoding: TextEncoding;
}

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: false });

// Strict UTF-8 first; Latin-1 maps every byte, so the fallback cannot fail
export function decodeText(buf: Uint8Array): DecodedText {
  try {
    return { text: utf8.decode(buf), encoding: "utf-8" };
  } catch {
    return { text: Buffer.from(buf).toString("latin1"), encoding: "latin1" };
  }
}

export function readTextWithFallback(p: string): DecodedText {
  let buf: Buffer;
  try {
    buf = fs.readFileSync(p);
  } catch (err: unknown) {
    throw new ToolError("read-failed", `Failed to read ${p}: ${errorMessage(err)}`);
  }
  return decodeText(buf);
}

export function isLatexSource(p: string): boolean {
  const ext = path.extname(p).toLowerCase();
  return LATEX_SOURCE_EXTENSIONS.some((e) => e === ext);
}
