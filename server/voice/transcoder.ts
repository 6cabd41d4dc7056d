/**
 * Convert arbitrary uploads (webm, ogg, mp3, m4a, wav) to canonical
 * single-channel 16-bit PCM WAV with ffmpeg.
 */

import { execFile } from "child_process";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { promisify } from "util";
import { logDebug } from "../logger";
import { TranscodeError } from "./errors";

const execFileAsync = promisify(execFile);

export interface AudioTranscoder {
  /** Rejects with TranscodeError when the upload cannot be converted. */
  transcode(rawUpload: Buffer, targetRate: number, targetChannels: number): Promise<Buffer>;
}

export interface WavFormat {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

const PCM_FORMAT = 1;

/**
 * Read the fmt chunk of a RIFF/WAVE buffer; null when the buffer is not WAV.
 */
export function readWavFormat(buffer: Buffer): WavFormat | null {
  if (buffer.length < 12) return null;
  if (buffer.toString("ascii", 0, 4) !== "RIFF" || buffer.toString("ascii", 8, 12) !== "WAVE") {
    return null;
  }

  let offset = 12;
  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString("ascii", offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === "fmt ") {
      if (body + 16 > buffer.length) return null;
      return {
        audioFormat: buffer.readUInt16LE(body),
        channels: buffer.readUInt16LE(body + 2),
        sampleRate: buffer.readUInt32LE(body + 4),
        bitsPerSample: buffer.readUInt16LE(body + 14),
      };
    }

    // chunks are word-aligned
    offset = body + chunkSize + (chunkSize % 2);
  }

  return null;
}

export function isCanonicalWav(buffer: Buffer, targetRate: number, targetChannels: number): boolean {
  const format = readWavFormat(buffer);
  return (
    format !== null &&
    format.audioFormat === PCM_FORMAT &&
    format.sampleRate === targetRate &&
    format.channels === targetChannels &&
    format.bitsPerSample === 16
  );
}

function describeFfmpegFailure(error: unknown, ffmpegPath: string): string {
  if (typeof error === "object" && error !== null) {
    if ("code" in error && error.code === "ENOENT") {
      return `ffmpeg not found at "${ffmpegPath}"; install ffmpeg or set FFMPEG_PATH`;
    }
    if ("killed" in error && error.killed === true) {
      return "ffmpeg timed out while converting audio";
    }
    if ("stderr" in error && typeof error.stderr === "string" && error.stderr.trim()) {
      const lastLine = error.stderr.trim().split("\n").pop() ?? "";
      return `ffmpeg conversion failed: ${lastLine}`;
    }
  }
  return `ffmpeg conversion failed: ${error instanceof Error ? error.message : String(error)}`;
}

export interface FfmpegTranscoderOptions {
  ffmpegPath: string;
  timeoutMs: number;
  tmpDir?: string;
}

export class FfmpegTranscoder implements AudioTranscoder {
  private readonly tmpDir: string;

  constructor(private readonly options: FfmpegTranscoderOptions) {
    this.tmpDir = options.tmpDir ?? os.tmpdir();
  }

  async transcode(rawUpload: Buffer, targetRate: number, targetChannels: number): Promise<Buffer> {
    if (isCanonicalWav(rawUpload, targetRate, targetChannels)) {
      return rawUpload;
    }

    let workDir: string;
    try {
      workDir = await fs.mkdtemp(path.join(this.tmpDir, "voiceprint-"));
    } catch (error) {
      throw new TranscodeError("Could not create a working directory for audio conversion", { cause: error });
    }

    logDebug(`Converting ${rawUpload.length} byte upload to ${targetRate}Hz/${targetChannels}ch WAV`, "transcoder");
    const inputPath = path.join(workDir, "upload");
    const outputPath = path.join(workDir, "canonical.wav");

    try {
      await fs.writeFile(inputPath, rawUpload);
      await execFileAsync(
        this.options.ffmpegPath,
        [
          "-y",
          "-i", inputPath,
          "-ar", String(targetRate),
          "-ac", String(targetChannels),
          "-sample_fmt", "s16",
          "-f", "wav",
          outputPath,
        ],
        { timeout: this.options.timeoutMs, maxBuffer: 4 * 1024 * 1024 }
      );
      return await fs.readFile(outputPath);
    } catch (error) {
      throw new TranscodeError(describeFfmpegFailure(error, this.options.ffmpegPath), { cause: error });
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }
}
