import fs from "fs/promises";
import path from "path";
import wavefile from "wavefile";
import { z } from "zod";
import { DecodeError, errorMessage } from "./errors.js";
import type { DecodedAudio } from "./types.js";

/**
 * Source of decoded PCM for a file
 *
 * The engine does not parse audio containers itself; callers inject a
 * decoder. The cache counts on `decode` being the expensive step.
 */
export interface AudioDecoder {
  /**
   * @throws DecodeError when samples cannot be obtained
   */
  decode(filePath: string): Promise<DecodedAudio>;
}

const WAV_EXTENSIONS = new Set([".wav", ".wave"]);

const wavFormatSchema = z.object({
  numChannels: z.number().int().positive(),
  sampleRate: z.number().positive(),
});

/**
 * Decoder for PCM and float WAV files
 */
export class WavDecoder implements AudioDecoder {
  async decode(filePath: string): Promise<DecodedAudio> {
    const ext = path.extname(filePath).toLowerCase();
    if (!WAV_EXTENSIONS.has(ext)) {
      throw new DecodeError(filePath, `unsupported format "${ext || "(none)"}"`);
    }

    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      throw new DecodeError(filePath, errorMessage(error), { cause: error });
    }

    return decodeWavBuffer(buffer, filePath);
  }
}

/**
 * Decode an in-memory WAV file into float channels
 */
export function decodeWavBuffer(buffer: Uint8Array, filePath = "<buffer>"): DecodedAudio {
  const wav = readWav(buffer, filePath);

  const format = wavFormatSchema.safeParse(wav.fmt);
  if (!format.success) {
    throw new DecodeError(filePath, "missing or invalid fmt chunk");
  }
  const { numChannels, sampleRate } = format.data;

  const interleaved = wav.getSamples(true, Float64Array);
  if (!(interleaved instanceof Float64Array)) {
    throw new DecodeError(filePath, "unexpected sample layout");
  }
  const frames = Math.floor(interleaved.length / numChannels);
  const channels = Array.from({ length: numChannels }, () => new Float32Array(frames));

  for (let i = 0; i < frames; i++) {
    for (let c = 0; c < numChannels; c++) {
      channels[c][i] = interleaved[i * numChannels + c];
    }
  }

  return { channels, sampleRate };
}

function readWav(buffer: Uint8Array, filePath: string) {
  try {
    const wav = new wavefile.WaveFile(buffer);
    wav.toBitDepth("32f");
    return wav;
  } catch (error) {
    throw new DecodeError(filePath, errorMessage(error), { cause: error });
  }
}
