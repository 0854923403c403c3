import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import JSZip from "jszip";
import * as tar from "tar";
import { archiveSuffix } from "./classify.js";
import { InvalidArchiveError, relocateError } from "./errors.js";
import { sniffFileType } from "./sniff.js";

export type ArchiveFormat = "zip" | "tar" | "tar.gz";

/** Number of top-level members an export archive must hold: one media, one overlay. */
export const ARCHIVE_MEMBER_COUNT = 2;

const EXPECTED_MIME: Record<ArchiveFormat, string> = {
  zip: "application/zip",
  tar: "application/x-tar",
  "tar.gz": "application/gzip",
};

export type UnpackOptions = {
  /** Parent for the private scratch directory. Default: the OS temp dir. */
  scratchRoot?: string;
};

export function archiveFormat(filePath: string): ArchiveFormat | null {
  switch (archiveSuffix(filePath)) {
    case ".zip":
      return "zip";
    case ".tar":
      return "tar";
    case ".tar.gz":
    case ".tgz":
      return "tar.gz";
    default:
      return null;
  }
}

async function validateArchive(archivePath: string): Promise<ArchiveFormat> {
  const format = archiveFormat(archivePath);
  if (!format) {
    throw new InvalidArchiveError("unsupported format (expected .zip, .tar, .tar.gz or .tgz)", archivePath);
  }

  let stat;
  try {
    stat = await fs.stat(archivePath);
  } catch {
    throw new InvalidArchiveError("file does not exist", archivePath);
  }
  if (!stat.isFile()) {
    throw new InvalidArchiveError("not a regular file", archivePath);
  }
  if (stat.size === 0) {
    throw new InvalidArchiveError("file is empty", archivePath);
  }

  const detected = await sniffFileType(archivePath);
  if (detected?.mime !== EXPECTED_MIME[format]) {
    throw new InvalidArchiveError(
      `contents are ${detected?.mime ?? "unrecognised"}, expected ${EXPECTED_MIME[format]}`,
      archivePath,
    );
  }
  return format;
}

async function loadZip(archivePath: string): Promise<JSZip> {
  try {
    return await JSZip.loadAsync(await fs.readFile(archivePath));
  } catch (err) {
    throw new InvalidArchiveError("zip could not be read", archivePath, { cause: err });
  }
}

async function extractZip(archivePath: string, dest: string): Promise<void> {
  const zip = await loadZip(archivePath);
  for (const entry of Object.values(zip.files)) {
    const target = path.resolve(dest, entry.name);
    if (target !== dest && !target.startsWith(dest + path.sep)) {
      throw new InvalidArchiveError(`member escapes the extraction directory: ${entry.name}`, archivePath);
    }
    if (entry.dir) {
      await fs.mkdir(target, { recursive: true });
      continue;
    }
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, await entry.async("nodebuffer"));
  }
}

async function extractTar(archivePath: string, dest: string): Promise<void> {
  try {
    // node-tar detects gzip itself and strips absolute / ".." member paths.
    await tar.x({ file: archivePath, cwd: dest, strict: true });
  } catch (err) {
    throw new InvalidArchiveError("tar could not be extracted", archivePath, { cause: err });
  }
}

function normalizeMemberPath(memberPath: string): string {
  return memberPath.replace(/\\/g, "/").replace(/^(\.\/)+/, "");
}

function topLevelName(memberPath: string): string {
  return normalizeMemberPath(memberPath).split("/")[0];
}

function isTopLevel(memberPath: string): boolean {
  return !normalizeMemberPath(memberPath).includes("/");
}

export type ArchiveMember = {
  /** Top-level name inside the archive. */
  name: string;
  /** File contents; null when the member is a directory. */
  data: Buffer | null;
};

async function readZipMembers(archivePath: string): Promise<Map<string, Buffer | null>> {
  const zip = await loadZip(archivePath);
  const members = new Map<string, Buffer | null>();
  for (const entry of Object.values(zip.files)) {
    const top = topLevelName(entry.name);
    const isTopLevelFile = !entry.dir && isTopLevel(entry.name);
    if (isTopLevelFile) {
      members.set(top, await entry.async("nodebuffer"));
    } else if (!members.has(top)) {
      members.set(top, null);
    }
  }
  return members;
}

async function readTarMembers(archivePath: string): Promise<Map<string, Buffer | null>> {
  const members = new Map<string, Buffer | null>();
  try {
    await tar.t({
      file: archivePath,
      strict: true,
      onReadEntry: (entry) => {
        const top = topLevelName(entry.path);
        const isTopLevelFile = entry.type === "File" && isTopLevel(entry.path);
        if (!isTopLevelFile) {
          if (!members.has(top)) {
            members.set(top, null);
          }
          return;
        }
        const chunks: Buffer[] = [];
        entry.on("data", (chunk: Buffer) => chunks.push(chunk));
        entry.on("end", () => members.set(top, Buffer.concat(chunks)));
      },
    });
  } catch (err) {
    throw new InvalidArchiveError("tar could not be read", archivePath, { cause: err });
  }
  return members;
}

/**
 * Top-level members of an archive with the bytes of each top-level file,
 * read in memory. Nothing is written to disk; dry runs plan merges from this.
 */
export async function readArchiveMembers(archivePath: string): Promise<ArchiveMember[]> {
  const format = await validateArchive(archivePath);
  const members =
    format === "zip" ? await readZipMembers(archivePath) : await readTarMembers(archivePath);

  members.delete("");
  members.delete(".");
  return [...members.keys()].toSorted().map((name) => ({ name, data: members.get(name) ?? null }));
}

/** Top-level member names of an archive, read without extracting. */
export async function listArchiveEntries(archivePath: string): Promise<string[]> {
  return (await readArchiveMembers(archivePath)).map((m) => m.name);
}

/**
 * Extract `archivePath` into a fresh private scratch directory, check that it
 * holds exactly two top-level entries, and run `fn` on that directory.
 * The scratch directory is removed when `fn` settles, whatever the outcome.
 * Failures from `fn` that name scratch paths are re-pointed at the archive.
 */
export async function withUnpacked<T>(
  archivePath: string,
  fn: (dir: string) => Promise<T>,
  opts: UnpackOptions = {},
): Promise<T> {
  const format = await validateArchive(archivePath);

  const scratchRoot = opts.scratchRoot ?? os.tmpdir();
  await fs.mkdir(scratchRoot, { recursive: true, mode: 0o700 });
  const scratch = await fs.mkdtemp(path.join(scratchRoot, "memento-unpack-"));

  try {
    if (format === "zip") {
      await extractZip(archivePath, scratch);
    } else {
      await extractTar(archivePath, scratch);
    }

    const members = await fs.readdir(scratch);
    if (members.length !== ARCHIVE_MEMBER_COUNT) {
      throw new InvalidArchiveError(
        `expected exactly ${ARCHIVE_MEMBER_COUNT} top-level entries, found ${members.length}`,
        archivePath,
      );
    }

    try {
      return await fn(scratch);
    } catch (err) {
      throw relocateError(err, scratch, archivePath);
    }
  } finally {
    await fs.rm(scratch, { recursive: true, force: true });
  }
}
