import fs from "node:fs/promises";
import path from "node:path";
import JSZip from "jszip";
import sharp from "sharp";
import * as tar from "tar";

export type Rgba = { r: number; g: number; b: number; alpha: number };

const SOLID_RED: Rgba = { r: 220, g: 30, b: 30, alpha: 1 };

/** Write a solid-colour image generated with sharp. */
export async function writeImage(
  filePath: string,
  width: number,
  height: number,
  format: "png" | "jpeg",
  background: Rgba = SOLID_RED,
): Promise<void> {
  const image = sharp({ create: { width, height, channels: 4, background } });
  const buf = format === "png" ? await image.png().toBuffer() : await image.jpeg().toBuffer();
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, buf);
}

/** Build a zip at `zipPath` from name → contents. */
export async function writeZip(zipPath: string, members: Record<string, Buffer | string>): Promise<void> {
  const zip = new JSZip();
  for (const [name, contents] of Object.entries(members)) {
    zip.file(name, contents);
  }
  await fs.writeFile(zipPath, await zip.generateAsync({ type: "nodebuffer" }));
}

/** Pack the named files under `cwd` into a tar (gzipped when `gzip` is set). */
export async function writeTar(
  tarPath: string,
  cwd: string,
  names: string[],
  gzip = false,
): Promise<void> {
  await tar.c({ file: tarPath, cwd, gzip }, names);
}

/** Leading `ftyp` box of an ISO-BMFF MP4; magic-byte sniffing reports video/mp4. */
export function mp4Header(): Buffer {
  return Buffer.concat([
    Buffer.from([0x00, 0x00, 0x00, 0x18]),
    Buffer.from("ftypisom", "ascii"),
    Buffer.from([0x00, 0x00, 0x02, 0x00]),
    Buffer.from("isomiso2", "ascii"),
  ]);
}
