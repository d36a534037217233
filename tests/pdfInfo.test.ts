import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PDFDocument, StandardFonts } from "pdf-lib";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { extractPdfInfo, pdfHeaderVersion } from "../src/tools/pdfInfo.js";
import { ToolError } from "../src/utils/errors.js";
import { encryptedPdf } from "./helpers/encryptedPdf.js";

describe("extractPdfInfo", () => {
  let dir: string;

  beforeAll(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "ltm-pdf-"));
    const doc = await PDFDocument.create();
    const font = await doc.embedFont(StandardFonts.Helvetica);
    doc.addPage([612, 792]).drawText("First page", { x: 72, y: 700, size: 12, font });
    doc.addPage([595.28, 841.89]);
    doc.setTitle("Quarterly Notes");
    doc.setAuthor("A. Writer");
    doc.setKeywords(["alpha", "beta"]);
    doc.setCreationDate(new Date("2024-03-01T10:00:00Z"));
    fs.writeFileSync(path.join(dir, "doc.pdf"), await doc.save());
    fs.writeFileSync(path.join(dir, "broken.pdf"), "this is not a pdf");
    fs.writeFileSync(path.join(dir, "doc.txt"), "plain");
    fs.writeFileSync(
      path.join(dir, "locked.pdf"),
      encryptedPdf({ userPassword: "test-secret", ownerPassword: "owner-secret", title: "Locked Notes", text: "Hello encrypted" })
    );
  });

  afterAll(() => fs.rmSync(dir, { recursive: true, force: true }));

  it("reports pages, dimensions and metadata", async () => {
    const info = await extractPdfInfo({ path: path.join(dir, "doc.pdf") });
    expect(info.success).toBe(true);
    expect(info.pdfVersion).toBe("1.7");
    expect(info.pageCount).toBe(2);
    expect(info.isEncrypted).toBe(false);
    expect(info.pageDimensions).toEqual([
      { page: 1, width: 612, height: 792, unit: "pt" },
      { page: 2, width: 595.28, height: 841.89, unit: "pt" },
    ]);
    expect(info.title).toBe("Quarterly Notes");
    expect(info.author).toBe("A. Writer");
    expect(info.keywords).toBe("alpha beta");
    expect(info.subject).toBeNull();
    expect(info.creationDate).toBe("2024-03-01T10:00:00.000Z");
    expect(info.fileSizeBytes).toBe(fs.statSync(path.join(dir, "doc.pdf")).size);
    expect(info.textContent).toBeNull();
  });

  it("returns the text of every page when asked", async () => {
    const info = await extractPdfInfo({ path: path.join(dir, "doc.pdf"), includeText: true });
    expect(info.success).toBe(true);
    expect(info.textContent).toEqual(["First page", ""]);
    expect(info.title).toBe("Quarterly Notes");
  });

  it("reads the structure of an encrypted PDF without its metadata", async () => {
    const info = await extractPdfInfo({ path: path.join(dir, "locked.pdf") });
    expect(info.success).toBe(true);
    expect(info.isEncrypted).toBe(true);
    expect(info.pdfVersion).toBe("1.4");
    expect(info.pageCount).toBe(1);
    expect(info.pageDimensions).toEqual([{ page: 1, width: 300, height: 200, unit: "pt" }]);
    expect(info.title).toBeNull();
    expect(info.author).toBeNull();
    expect(info.creationDate).toBeNull();
    expect(info.textContent).toBeNull();
  });

  it("decrypts metadata and text with the password", async () => {
    const info = await extractPdfInfo({ path: path.join(dir, "locked.pdf"), password: "test-secret", includeText: true });
    expect(info.errorMessage).toBeUndefined();
    expect(info.success).toBe(true);
    expect(info.isEncrypted).toBe(true);
    expect(info.title).toBe("Locked Notes");
    expect(info.author).toBeNull();
    expect(info.textContent).toEqual(["Hello encrypted"]);
  });

  it("reports a wrong password", async () => {
    const info = await extractPdfInfo({ path: path.join(dir, "locked.pdf"), password: "wrong", includeText: true });
    expect(info.success).toBe(false);
    expect(info.errorMessage).toMatch(/^Failed to decrypt PDF: /);
    expect(info.isEncrypted).toBe(true);
    expect(info.pageCount).toBe(1);
    expect(info.textContent).toBeNull();
  });

  it("returns an unsuccessful result for an unreadable PDF", async () => {
    const info = await extractPdfInfo({ path: path.join(dir, "broken.pdf") });
    expect(info.success).toBe(false);
    expect(info.errorMessage).toMatch(/^Not a valid PDF file: /);
    expect(info.pdfVersion).toBeNull();
    expect(info.pageCount).toBe(0);
    expect(info.pageDimensions).toEqual([]);
  });

  it("rejects files without the pdf extension", async () => {
    await expect(extractPdfInfo({ path: path.join(dir, "doc.txt") })).rejects.toBeInstanceOf(ToolError);
  });
});

describe("pdfHeaderVersion", () => {
  it("finds the header near the start of the file", () => {
    expect(pdfHeaderVersion(Buffer.from("\n%PDF-1.4\n%abc"))).toBe("1.4");
    expect(pdfHeaderVersion(Buffer.from("x".repeat(2000) + "%PDF-1.4"))).toBeNull();
  });
});
