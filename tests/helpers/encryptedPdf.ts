// Builds a one-page PDF protected with the standard security handler,
// revision 2 (RC4, 40-bit key), so tests need no fixture files on disk.
import { createHash } from "node:crypto";

const PASSWORD_PAD = Buffer.from("28bf4e5e4e758a4164004e56fffa01082e2e00b6d0683e802f0ca9fe6453697a", "hex");
const FILE_ID = Buffer.from("0123456789abcdef0123456789abcdef", "hex");
const PERMISSIONS = -44;

function rc4(key: Buffer, data: Buffer): Buffer {
  const s = Array.from({ length: 256 }, (_, i) => i);
  let j = 0;
  for (let i = 0; i < 256; i++) {
    j = (j + s[i] + key[i % key.length]) & 0xff;
    [s[i], s[j]] = [s[j], s[i]];
  }
  const out = Buffer.alloc(data.length);
  let a = 0;
  let b = 0;
  for (let k = 0; k < data.length; k++) {
    a = (a + 1) & 0xff;
    b = (b + s[a]) & 0xff;
    [s[a], s[b]] = [s[b], s[a]];
    out[k] = data[k] ^ s[(s[a] + s[b]) & 0xff];
  }
  return out;
}

const md5 = (...parts: Buffer[]): Buffer => createHash("md5").update(Buffer.concat(parts)).digest();

const padded = (password: string): Buffer =>
  Buffer.concat([Buffer.from(password, "latin1"), PASSWORD_PAD]).subarray(0, 32);

export interface EncryptedPdfOptions {
  userPassword: string;
  ownerPassword: string;
  title: string;
  text: string;
}

export function encryptedPdf(opts: EncryptedPdfOptions): Buffer {
  const ownerKey = md5(padded(opts.ownerPassword)).subarray(0, 5);
  const o = rc4(ownerKey, padded(opts.userPassword));
  const p = Buffer.alloc(4);
  p.writeInt32LE(PERMISSIONS);
  const fileKey = md5(padded(opts.userPassword), o, p, FILE_ID).subarray(0, 5);
  const u = rc4(fileKey, PASSWORD_PAD);

  const objectKey = (num: number): Buffer =>
    md5(fileKey, Buffer.from([num & 0xff, (num >> 8) & 0xff, (num >> 16) & 0xff, 0, 0])).subarray(0, 10);
  const encrypt = (num: number, data: Buffer): Buffer => rc4(objectKey(num), data);

  const content = encrypt(5, Buffer.from(`BT /F1 24 Tf 40 100 Td (${opts.text}) Tj ET`, "latin1"));
  const title = encrypt(6, Buffer.from(opts.title, "latin1")).toString("hex");

  const objects: Buffer[] = [
    Buffer.from("1 0 obj\n<< /Type /Catalog /Pages 2 0 R >>\nendobj\n"),
    Buffer.from("2 0 obj\n<< /Type /Pages /Kids [3 0 R] /Count 1 >>\nendobj\n"),
    Buffer.from(
      "3 0 obj\n<< /Type /Page /Parent 2 0 R /MediaBox [0 0 300 200] " +
        "/Resources << /Font << /F1 4 0 R >> >> /Contents 5 0 R >>\nendobj\n"
    ),
    Buffer.from("4 0 obj\n<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>\nendobj\n"),
    Buffer.concat([
      Buffer.from(`5 0 obj\n<< /Length ${content.length} >>\nstream\n`),
      content,
      Buffer.from("\nendstream\nendobj\n"),
    ]),
    Buffer.from(`6 0 obj\n<< /Title <${title}> >>\nendobj\n`),
    Buffer.from(
      `7 0 obj\n<< /Filter /Standard /V 1 /R 2 /Length 40 /O <${o.toString("hex")}> ` +
        `/U <${u.toString("hex")}> /P ${PERMISSIONS} >>\nendobj\n`
    ),
  ];

  const chunks: Buffer[] = [Buffer.from("%PDF-1.4\n")];
  let offset = chunks[0].length;
  const offsets: number[] = [];
  for (const obj of objects) {
    offsets.push(offset);
    chunks.push(obj);
    offset += obj.length;
  }

  const id = FILE_ID.toString("hex");
  const xref =
    `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n` +
    offsets.map((at) => `${String(at).padStart(10, "0")} 00000 n \n`).join("") +
    `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R /Info 6 0 R /Encrypt 7 0 R /ID [<${id}> <${id}>] >>\n` +
    `startxref\n${offset}\n%%EOF\n`;
  chunks.push(Buffer.from(xref));
  return Buffer.concat(chunks);
}
