import { execFile } from 'child_process';
import { promisify } from 'util';
import { MediaProbe, ProbeResult } from '../types/quality.types';

const execFilePromise = promisify(execFile);

/**
 * Raw stream object as printed by `ffprobe -print_format json -show_streams`
 */
interface FFprobeStream {
  index: number;
  codec_type?: string;
  codec_name?: string;
  height?: number;
  channels?: number;
}

function isStream(value: unknown): value is FFprobeStream {
  return typeof value === 'object' && value !== null && 'index' in value;
}

/**
 * Reduce ffprobe JSON output to the first video and first audio stream.
 * Returns null when the output carries no usable stream.
 */
export function parseProbeOutput(stdout: string): ProbeResult | null {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch {
    return null;
  }

  if (typeof data !== 'object' || data === null || !('streams' in data) || !Array.isArray(data.streams)) {
    return null;
  }

  const streams = data.streams.filter(isStream);
  const video = streams.find((s) => s.codec_type === 'video');
  const audio = streams.find((s) => s.codec_type === 'audio');

  if (!video && !audio) {
    return null;
  }

  const result: ProbeResult = {};
  if (video?.height) result.videoHeight = video.height;
  if (video?.codec_name) result.videoCodec = video.codec_name;
  if (audio?.codec_name) result.audioCodec = audio.codec_name;
  if (audio?.channels) result.audioChannels = audio.channels;
  return result;
}

/**
 * FFprobe Service
 *
 * Reads stream details straight from the container. Needs the ffprobe binary
 * on PATH; every failure is reported as "no result".
 */
export class FfprobeService implements MediaProbe {
  constructor(
    private readonly binary = 'ffprobe',
    private readonly timeoutMs = 30000
  ) {}

  async probe(filePath: string): Promise<ProbeResult | null> {
    try {
      const { stdout } = await execFilePromise(
        this.binary,
        ['-v', 'quiet', '-print_format', 'json', '-show_streams', filePath],
        { timeout: this.timeoutMs, maxBuffer: 10 * 1024 * 1024 }
      );

      const result = parseProbeOutput(stdout);
      if (!result) {
        console.warn(`  ⚠ ffprobe returned no streams for: ${filePath}`);
      }
      return result;
    } catch (error) {
      console.warn(`  ⚠ ffprobe failed for ${filePath}:`, error instanceof Error ? error.message : error);
      return null;
    }
  }
}
