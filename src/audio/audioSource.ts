import fs from "fs/promises";
import path from "path";
import { randomUUID } from "crypto";
import { fail, ok, type AudioHandle, type Result } from "../pipeline/types.js";

// The fmt chunk normally sits at byte 12, but LIST/JUNK chunks may precede it
const HEADER_PROBE_BYTES = 64 * 1024;

export interface WavFormat {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
}

/**
 * Walk the RIFF chunks of a WAV header and return its fmt chunk, or null when
 * the buffer is not a RIFF/WAVE file.
 */
export function inspectWav(header: Buffer): WavFormat | null {
  if (header.length < 12) return null;
  if (header.toString("ascii", 0, 4) !== "RIFF" || header.toString("ascii", 8, 12) !== "WAVE") {
    return null;
  }

  let offset = 12;
  while (offset + 8 <= header.length) {
    const id = header.toString("ascii", offset, offset + 4);
    const size = header.readUInt32LE(offset + 4);
    if (id === "fmt ") {
      if (offset + 8 + 16 > header.length) return null;
      return {
        channels: header.readUInt16LE(offset + 10),
        sampleRate: header.readUInt32LE(offset + 12),
        bitsPerSample: header.readUInt16LE(offset + 22),
      };
    }
    // Chunks are word-aligned
    offset += 8 + size + (size % 2);
  }
  return null;
}

async function readHeader(filePath: string): Promise<Buffer> {
  const file = await fs.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(HEADER_PROBE_BYTES);
    const { bytesRead } = await file.read(buffer, 0, HEADER_PROBE_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await file.close();
  }
}

export function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Resolve a caller-supplied path into an AudioHandle ready for transcription.
 * `displayName` replaces the file's own name in titles and notices.
 */
export async function openAudio(filePath: string, displayName?: string): Promise<Result<AudioHandle>> {
  const resolved = path.resolve(filePath);

  let bytes: number;
  let header: Buffer;
  try {
    const stat = await fs.stat(resolved);
    if (!stat.isFile()) {
      return fail("invalid_audio", `Audio path ${filePath} is not a file.`);
    }
    bytes = stat.size;
    header = bytes > 0 ? await readHeader(resolved) : Buffer.alloc(0);
  } catch (err) {
    if (isMissing(err)) {
      return fail("file_not_found", `Audio file ${filePath} not found.`);
    }
    return fail("invalid_audio", `Audio file ${filePath} cannot be read: ${errorMessage(err)}`);
  }

  if (bytes === 0) {
    return fail("invalid_audio", `Audio file ${filePath} is empty.`);
  }

  const format = inspectWav(header);
  if (!format) {
    return fail("invalid_audio", `Audio file ${filePath} is not a WAV (RIFF/WAVE) file.`);
  }

  const name = displayName?.trim() || path.basename(resolved);
  console.log(`[audio] ${name}: ${format.sampleRate} Hz, ${format.channels} channel(s), ${bytes} bytes`);
  return ok({ path: resolved, name, sampleRate: format.sampleRate, channels: format.channels, bytes });
}

function safeName(name: string): string {
  const base = path.basename(name).replace(/[^\w.-]+/g, "_");
  return base.toLowerCase().endsWith(".wav") ? base : `${base || "upload"}.wav`;
}

/** Persist an uploaded body under the upload directory and return its path. */
export async function saveUpload(data: Buffer, uploadDir: string, originalName?: string): Promise<string> {
  const dir = path.resolve(uploadDir);
  await fs.mkdir(dir, { recursive: true });
  const fileName = `${randomUUID()}-${safeName(originalName || "upload.wav")}`;
  const filePath = path.join(dir, fileName);
  await fs.writeFile(filePath, data);
  console.log(`[audio] Saved upload ${fileName} (${data.length} bytes)`);
  return filePath;
}
