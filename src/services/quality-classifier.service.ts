import fs from 'fs';
import path from 'path';
import { MediaProbe, ProbeResult, QualityProfile } from '../types/quality.types';

interface ExtractionRule {
  pattern: RegExp;
  normalize?: (value: string) => string;
  accept?: (value: string) => boolean;
}

const EMPTY_PROFILE: QualityProfile = { qualityTags: [] };

export function normalizeVideoCodec(codec: string): string {
  const lower = codec.toLowerCase();
  if (['h264', 'x264', 'avc'].includes(lower)) {
    return 'h264';
  }
  if (['h265', 'x265', 'hevc'].includes(lower)) {
    return 'h265';
  }
  return codec;
}

export function normalizeSource(source: string): string {
  const compact = source.toLowerCase().replace(/[-.]/g, '');
  if (compact.includes('webdl')) return 'WEBDL';
  if (compact.includes('webrip')) return 'WEBRip';
  if (compact.includes('bluray')) return 'BluRay';
  if (compact.includes('hdtv')) return 'HDTV';
  if (compact.includes('dvd')) return 'DVD';
  return source.toUpperCase();
}

const RESOLUTION_RULES: ExtractionRule[] = [
  { pattern: /\b(2160p|4K)\b/, normalize: () => '4K' },
  { pattern: /\b(1080p)\b/ },
  { pattern: /\b(720p)\b/ },
  { pattern: /\b(480p)\b/ },
  { pattern: /\b(360p)\b/ },
];

const VIDEO_CODEC_RULES: ExtractionRule[] = [
  { pattern: /\b(h264|x264|AVC)\b/, normalize: normalizeVideoCodec },
  { pattern: /\b(h265|x265|HEVC)\b/, normalize: normalizeVideoCodec },
  { pattern: /\b(XviD)\b/ },
  { pattern: /\b(DivX)\b/ },
];

const AUDIO_CODEC_RULES: ExtractionRule[] = [
  { pattern: /\b(DTS-HD|DTS-X|DTS)\b/ },
  { pattern: /\b(TrueHD|Atmos)\b/ },
  { pattern: /\b(EAC3|E-AC-3)\b/ },
  { pattern: /\b(AC3|AC-3)\b/ },
  { pattern: /\b(AAC)\b/ },
  { pattern: /\b(MP3)\b/ },
  { pattern: /\b(FLAC)\b/ },
  // Dolby Digital Plus, also as the prefix of DDP5.1
  { pattern: /\b(DDP)/ },
  // Plain Dolby Digital; never the head of DDP or DD5.1
  { pattern: /\b(DD)(?![a-z\d])/ },
];

const AUDIO_CHANNEL_RULES: ExtractionRule[] = [
  { pattern: /\b(7\.1|7\.0)\b/ },
  { pattern: /\b(5\.1|5\.0)\b/ },
  { pattern: /\b(2\.1|2\.0)\b/ },
  { pattern: /\b(Stereo)\b/ },
  { pattern: /\b(Mono)\b/ },
  { pattern: /\bDDP(5\.1|7\.1|2\.0)\b/ },
  { pattern: /\bDD(5\.1|7\.1|2\.0)\b/ },
];

const SOURCE_RULES: ExtractionRule[] = [
  { pattern: /\b(WEBDL|WEB-DL|WEB\.DL)\b/, normalize: normalizeSource },
  { pattern: /\b(WEBRip|WEB-Rip|WEB\.Rip)\b/, normalize: normalizeSource },
  { pattern: /\b(WEB)\b/, normalize: normalizeSource },
  { pattern: /\b(BluRay|Blu-Ray|BDRip|BD)\b/, normalize: normalizeSource },
  { pattern: /\b(HDTV|HDTVRip)\b/, normalize: normalizeSource },
  { pattern: /\b(DVDRip|DVD)\b/, normalize: normalizeSource },
  { pattern: /\b(CAM|TS|TC)\b/, normalize: normalizeSource },
  { pattern: /\b(HDRIP)\b/, normalize: normalizeSource },
];

const QUALITY_TAG_RULES: ExtractionRule[] = [
  { pattern: /\b(Proper)\b/ },
  { pattern: /\b(Repack)\b/ },
  { pattern: /\b(Extended)\b/ },
  { pattern: /\b(Director'?s?[.\s]?Cut)\b/ },
  { pattern: /\b(Uncut)\b/ },
  { pattern: /\b(Internal)\b/ },
  { pattern: /\b(HDR|HDR10|DV|Dolby[.\s]?Vision)\b/ },
  { pattern: /\b(Atmos)\b/ },
  { pattern: /\b(IMAX)\b/ },
];

const PLATFORM_RULES: ExtractionRule[] = [
  { pattern: /\b(AMZN|Amazon)\b/ },
  { pattern: /\b(NF|Netflix)\b/ },
  { pattern: /\b(HULU)\b/ },
  { pattern: /\b(HBO|Max)\b/ },
  { pattern: /\b(DSNP|Disney)\b/ },
  { pattern: /\b(ATVP|AppleTV)\b/ },
];

/**
 * True when a bracketed token is itself a technical attribute, e.g. "[1080p]"
 * or "[h264]", rather than the name of a release group.
 */
function isQualityToken(token: string): boolean {
  const technical = [
    ...RESOLUTION_RULES,
    ...VIDEO_CODEC_RULES,
    ...AUDIO_CODEC_RULES,
    ...AUDIO_CHANNEL_RULES,
    ...SOURCE_RULES,
    ...QUALITY_TAG_RULES,
    ...PLATFORM_RULES,
  ];
  return technical.some((rule) => new RegExp(rule.pattern.source, 'i').test(token));
}

const RELEASE_GROUP_RULES: ExtractionRule[] = [
  // -GroupName.ext
  { pattern: /-([A-Za-z0-9]+)(?:\.[a-z0-9]+)?$/ },
  // [GroupName]
  { pattern: /\[([A-Za-z][A-Za-z0-9]*)\]/, accept: (token) => !isQualityToken(token) },
];

function applyRule(rule: ExtractionRule, value: string): string {
  return rule.normalize ? rule.normalize(value) : value;
}

/**
 * First accepted match of the first rule that matches at all.
 */
function extractFirst(text: string, rules: ExtractionRule[]): string | undefined {
  for (const rule of rules) {
    const regex = new RegExp(rule.pattern.source, 'gi');
    for (const match of text.matchAll(regex)) {
      const value = match[1] ?? match[0];
      if (rule.accept && !rule.accept(value)) {
        continue;
      }
      return applyRule(rule, value);
    }
  }
  return undefined;
}

/**
 * Every match of every rule, in rule order.
 */
function extractAll(text: string, rules: ExtractionRule[]): string[] {
  const results: string[] = [];
  for (const rule of rules) {
    const regex = new RegExp(rule.pattern.source, 'gi');
    for (const match of text.matchAll(regex)) {
      results.push(applyRule(rule, match[1] ?? match[0]));
    }
  }
  return results;
}

function heightToResolution(height: number): string | undefined {
  if (height >= 2160) return '4K';
  if (height >= 1080) return '1080p';
  if (height >= 720) return '720p';
  if (height >= 480) return '480p';
  return undefined;
}

function channelsToLayout(channels: number): string | undefined {
  switch (channels) {
    case 8:
      return '7.1';
    case 6:
      return '5.1';
    case 2:
      return '2.0';
    case 1:
      return 'Mono';
    default:
      return undefined;
  }
}

/**
 * QualityClassifier infers technical attributes of a media file:
 * - from its name, using ordered pattern tables per attribute
 * - from a container probe when the name says too little
 * and renders them back into the bracketed form used in file names.
 */
export class QualityClassifier {
  constructor(private readonly probe?: MediaProbe) {}

  classifyFromText(name: string): QualityProfile {
    const platform = extractFirst(name, PLATFORM_RULES);
    let source = extractFirst(name, SOURCE_RULES);
    if (platform && source) {
      source = `${platform} ${source}`;
    } else if (platform) {
      source = platform;
    }

    return {
      resolution: extractFirst(name, RESOLUTION_RULES),
      videoCodec: extractFirst(name, VIDEO_CODEC_RULES),
      audioCodec: extractFirst(name, AUDIO_CODEC_RULES),
      audioChannels: extractFirst(name, AUDIO_CHANNEL_RULES),
      source,
      qualityTags: extractAll(name, QUALITY_TAG_RULES),
      releaseGroup: extractFirst(name, RELEASE_GROUP_RULES),
    };
  }

  async classifyFromProbe(filePath: string): Promise<QualityProfile> {
    if (!this.probe) {
      console.warn('  ⚠ No media probe available, cannot analyze file directly');
      return EMPTY_PROFILE;
    }

    if (!fs.existsSync(filePath)) {
      console.warn(`  ⚠ File does not exist: ${filePath}`);
      return EMPTY_PROFILE;
    }

    let result: ProbeResult | null;
    try {
      result = await this.probe.probe(filePath);
    } catch (error) {
      console.warn(`  ⚠ Probe failed for ${filePath}:`, error instanceof Error ? error.message : error);
      return EMPTY_PROFILE;
    }
    if (!result) {
      return EMPTY_PROFILE;
    }

    return {
      resolution: result.videoHeight !== undefined ? heightToResolution(result.videoHeight) : undefined,
      videoCodec: result.videoCodec ? normalizeVideoCodec(result.videoCodec) : undefined,
      audioCodec: result.audioCodec,
      audioChannels: result.audioChannels !== undefined ? channelsToLayout(result.audioChannels) : undefined,
      qualityTags: [],
    };
  }

  /**
   * Name first; the probe only fills in what the name leaves out.
   */
  async classify(filePath: string): Promise<QualityProfile> {
    const fromText = this.classifyFromText(path.basename(filePath));
    if (this.isComplete(fromText)) {
      return fromText;
    }

    const fromProbe = await this.classifyFromProbe(filePath);
    return this.merge(fromText, fromProbe);
  }

  merge(primary: QualityProfile, fallback: QualityProfile): QualityProfile {
    return {
      resolution: primary.resolution || fallback.resolution,
      videoCodec: primary.videoCodec || fallback.videoCodec,
      audioCodec: primary.audioCodec || fallback.audioCodec,
      audioChannels: primary.audioChannels || fallback.audioChannels,
      source: primary.source || fallback.source,
      qualityTags: primary.qualityTags,
      releaseGroup: primary.releaseGroup,
    };
  }

  format(profile: QualityProfile): string {
    const parts: string[] = [];
    const tags = profile.qualityTags;
    const atmosTagged = tags.some((tag) => tag.toLowerCase() === 'atmos');

    if (profile.source && profile.resolution) {
      let sourcePart = `${profile.source}-${profile.resolution}`;
      if (tags.length > 0) {
        sourcePart += ` ${tags.join(' ')}`;
      }
      parts.push(`[${sourcePart}]`);
    } else if (profile.source) {
      parts.push(`[${profile.source}]`);
    } else if (profile.resolution) {
      parts.push(`[${profile.resolution}]`);
    }

    if (profile.audioCodec && profile.audioChannels) {
      if (profile.audioCodec.toLowerCase() === 'atmos' && atmosTagged) {
        parts.push(`[${profile.audioChannels}]`);
      } else {
        parts.push(`[${profile.audioCodec} ${profile.audioChannels}]`);
      }
    } else if (profile.audioCodec && profile.audioCodec.toLowerCase() !== 'atmos') {
      parts.push(`[${profile.audioCodec}]`);
    } else if (profile.audioCodec === 'Atmos' && !atmosTagged) {
      parts.push(`[${profile.audioCodec}]`);
    }

    if (profile.videoCodec) {
      parts.push(`[${profile.videoCodec}]`);
    }

    if (profile.releaseGroup) {
      parts.push(`-${profile.releaseGroup}`);
    }

    return parts.join('');
  }

  private isComplete(profile: QualityProfile): boolean {
    const essential = [profile.resolution, profile.videoCodec, profile.source];
    return essential.filter(Boolean).length >= 2;
  }
}
