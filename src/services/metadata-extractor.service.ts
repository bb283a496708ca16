import path from 'path';
import { FilenameGuesser, MediaInfo } from '../types/media.types';
import { QualityClassifier } from './quality-classifier.service';

export class MetadataExtractorService {
  constructor(
    private readonly guesser: FilenameGuesser,
    private readonly classifier: QualityClassifier
  ) {}

  async extract(filePath: string): Promise<MediaInfo> {
    const fileName = path.basename(filePath);
    const extension = path.extname(fileName);
    const guess = this.guesser.guess(fileName);
    const quality = await this.classifier.classify(filePath);

    return {
      originalPath: filePath,
      kind: guess.kind,
      title: guess.title || path.basename(fileName, extension),
      year: guess.year,
      season: guess.season,
      episode: guess.episode,
      episodeTitle: guess.episodeTitle,
      extension,
      quality,
    };
  }
}
