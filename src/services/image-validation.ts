import { open, stat } from "fs/promises";
import { hasErrorCode } from "../core/errors";

export type ImageFormat = "jpeg" | "png" | "gif" | "webp" | "bmp";

const HEADER_BYTES = 12;

export function detectImageFormat(header: Uint8Array): ImageFormat | null {
  const at = (i: number) => header[i] ?? -1;
  const ascii = (start: number, text: string) =>
    [...text].every((ch, i) => at(start + i) === ch.charCodeAt(0));

  if (at(0) === 0xff && at(1) === 0xd8 && at(2) === 0xff) return "jpeg";
  if (at(0) === 0x89 && ascii(1, "PNG") && at(4) === 0x0d && at(5) === 0x0a) return "png";
  if (ascii(0, "GIF87a") || ascii(0, "GIF89a")) return "gif";
  if (ascii(0, "RIFF") && ascii(8, "WEBP")) return "webp";
  if (ascii(0, "BM")) return "bmp";
  return null;
}

export function isImageContentType(contentType: string | undefined): boolean {
  if (!contentType) return false;
  const mime = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  return mime.startsWith("image/") || mime === "application/octet-stream" || mime === "binary/octet-stream";
}

export interface FileCheck {
  present: boolean;
  size: number;
  format: ImageFormat | null;
}

/** A file counts as present only when it reaches `minBytes` and starts with a known image header. */
export async function inspectImageFile(path: string, minBytes: number): Promise<FileCheck> {
  let size: number;
  try {
    const info = await stat(path);
    if (!info.isFile()) return { present: false, size: 0, format: null };
    size = info.size;
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) return { present: false, size: 0, format: null };
    throw error;
  }

  if (size < minBytes) return { present: false, size, format: null };

  const handle = await open(path, "r");
  try {
    const header = Buffer.alloc(HEADER_BYTES);
    await handle.read(header, 0, HEADER_BYTES, 0);
    const format = detectImageFormat(header);
    return { present: format !== null, size, format };
  } finally {
    await handle.close();
  }
}

export async function isValidImageFile(path: string, minBytes: number): Promise<boolean> {
  return (await inspectImageFile(path, minBytes)).present;
}
