import { MediaNameParser } from '../utils/media-name-parser.util';

describe('MediaNameParser', () => {
  let parser: MediaNameParser;

  beforeEach(() => {
    parser = new MediaNameParser();
  });

  test('episode with title, year and quality block', () => {
    expect(parser.guess('Supernatural (2005) - S01E01 - Pilot [AMZN WEBDL-1080p Proper][EAC3 2.0][h264]-Kitsune.mkv')).toEqual({
      title: 'Supernatural',
      year: 2005,
      season: 1,
      episode: 1,
      episodeTitle: 'Pilot',
      kind: 'episode',
    });
  });

  test('scene episode without episode title', () => {
    const guess = parser.guess('Show.Name.S02E05.720p.HDTV.x264-GRP.mkv');

    expect(guess.title).toBe('Show Name');
    expect(guess.season).toBe(2);
    expect(guess.episode).toBe(5);
    expect(guess.episodeTitle).toBeUndefined();
    expect(guess.kind).toBe('episode');
  });

  test('scene episode with episode title', () => {
    const guess = parser.guess('Show.Name.S02E05.The.Long.Night.1080p.WEB-DL.x264-GRP.mkv');

    expect(guess.title).toBe('Show Name');
    expect(guess.episodeTitle).toBe('The Long Night');
  });

  test('cross style episode marker', () => {
    const guess = parser.guess('Show Name 3x07.mkv');

    expect([guess.title, guess.season, guess.episode, guess.kind]).toEqual(['Show Name', 3, 7, 'episode']);
  });

  test('movie with year', () => {
    const guess = parser.guess('Inception.2010.1080p.BluRay.x264-GRP.mkv');

    expect(guess.title).toBe('Inception');
    expect(guess.year).toBe(2010);
    expect(guess.kind).toBe('movie');
  });

  test('season-only marker is not an episode', () => {
    const guess = parser.guess('Show.Name.S03.Extras.mkv');

    expect(guess.season).toBe(3);
    expect(guess.episode).toBeUndefined();
    expect(guess.kind).toBe('unknown');
  });

  test('plain name stays unknown', () => {
    expect(parser.guess('holiday_video.mkv')).toEqual({
      title: 'holiday video',
      year: undefined,
      season: undefined,
      episode: undefined,
      episodeTitle: undefined,
      kind: 'unknown',
    });
  });
});
