export const VIDEO_EXTENSIONS = [
  '.mkv',
  '.mp4',
  '.avi',
  '.mov',
  '.wmv',
  '.flv',
  '.webm',
  '.m4v',
];

export const SUBTITLE_EXTENSIONS = ['.srt', '.sub', '.idx', '.ass', '.ssa', '.vtt'];

export const MEDIA_NAME_PATTERNS = {
  YEAR: /\b(19\d{2}|20\d{2})\b/,
  // S01E02, S01.E02, s1e2
  SEASON_EPISODE: /\bS(\d{1,2})[.\s]?E(\d{1,3})/i,
  // 1x02
  CROSS_EPISODE: /\b(\d{1,2})x(\d{2,3})\b/i,
  SEASON_EPISODE_WORDS: /\bSeason[\s.]*(\d+).*?Episode[\s.]*(\d+)/i,
  SEASON_ONLY: /\bS(\d{1,2})(?![\dE])/i,
  SEASON_WORD: /\bSeason[\s.]*(\d+)/i,
  QUALITY: /\b(480p|720p|1080p|2160p|4k|uhd|bluray|brrip|bdrip|dvdrip|webrip|web-dl|webdl|web|hdtv|proper|repack)\b/i,
  CODEC: /\b(x264|x265|h264|h265|hevc|xvid|divx|avc)\b/i,
  AUDIO: /\b(aac|ac3|eac3|dts|truehd|atmos|ddp?\d\.\d)\b/i,
  BRACKETS: /[\[\](){}]/g,
  DOTS_UNDERSCORES: /[._]/g,
  MULTI_SPACES: /\s+/g,
};

// Recurring franchises that appear under many marketing names.
export const SHOW_TITLE_ALIASES: Readonly<Record<string, readonly string[]>> = {
  smackdown: ['wwe smackdown', 'smackdown live', 'friday night smackdown'],
  raw: ['wwe raw', 'monday night raw'],
  nxt: ['wwe nxt', 'nxt wrestling'],
};

export const DEFAULT_MOVIE_PATTERN = '{title} ({year})';
export const DEFAULT_TV_PATTERN = '{title} - S{season:02d}E{episode:02d} - {episode_title}';
