export interface QualityProfile {
  readonly resolution?: string;
  readonly videoCodec?: string;
  readonly audioCodec?: string;
  readonly audioChannels?: string;
  readonly source?: string;
  readonly qualityTags: readonly string[];
  readonly releaseGroup?: string;
}

/**
 * Track-level facts reported by a technical probe of a media container.
 */
export interface ProbeResult {
  videoHeight?: number;
  videoCodec?: string;
  audioCodec?: string;
  audioChannels?: number;
}

export interface MediaProbe {
  /** Resolves to null when the file cannot be probed. */
  probe(filePath: string): Promise<ProbeResult | null>;
}
