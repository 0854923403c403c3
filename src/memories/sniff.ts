import fs, { type FileHandle } from "node:fs/promises";
import { fileTypeFromBuffer, type FileTypeResult } from "file-type";

/** file-type needs at most this many leading bytes to recognise a format. */
const SNIFF_BYTES = 4100;

/**
 * Detect a file's format from its magic bytes. Returns undefined for empty,
 * unrecognised or unreadable files.
 */
export async function sniffFileType(filePath: string): Promise<FileTypeResult | undefined> {
  let fd: FileHandle;
  try {
    fd = await fs.open(filePath, "r");
  } catch {
    return undefined;
  }
  try {
    const buf = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await fd.read(buf, 0, SNIFF_BYTES, 0);
    if (bytesRead === 0) {
      return undefined;
    }
    return await fileTypeFromBuffer(buf.subarray(0, bytesRead));
  } finally {
    await fd.close();
  }
}

/** Same detection for bytes already in memory (e.g. an archive member). */
export async function sniffBufferType(data: Buffer): Promise<FileTypeResult | undefined> {
  if (data.length === 0) {
    return undefined;
  }
  return fileTypeFromBuffer(data.subarray(0, SNIFF_BYTES));
}
