import { initConfig, getConfig } from './config/env.config';
import { createApp } from './app';
import { LibraryController } from './controllers/library.controller';
import { FfprobeService } from './services/ffprobe.service';
import { FileRenamerService } from './services/file-renamer.service';
import { IdentityLookupService } from './services/identity-lookup.service';
import { MetadataExtractorService } from './services/metadata-extractor.service';
import { QualityClassifier } from './services/quality-classifier.service';
import { SeasonResolver } from './services/season-resolver.service';
import { ShowDirectoryAnalyzer } from './services/show-directory-analyzer.service';
import { ShowGrouper } from './services/show-grouper.service';
import { TMDbService } from './services/tmdb.service';
import { TVDBService } from './services/tvdb.service';
import { TVShowConsolidator } from './services/tv-show-consolidator.service';
import { ConsolidateTask } from './tasks/consolidate.task';
import { RenameTask } from './tasks/rename.task';
import { TaskRunner } from './tasks/task-runner';
import { MediaNameParser } from './utils/media-name-parser.util';
import { Scheduler } from './utils/scheduler.util';
import { TitleNormalizer } from './utils/title-normalizer.util';

async function bootstrap() {
  // Load secrets from AWS Secrets Manager (or local .env fallback)
  await initConfig();
  const config = getConfig();

  const guesser = new MediaNameParser();
  const classifier = new QualityClassifier(new FfprobeService());
  const identityLookup = new IdentityLookupService(
    new TMDbService(config.tmdbApiKey),
    new TVDBService(config.tvdbApiKey)
  );

  const consolidator = new TVShowConsolidator({
    analyzer: new ShowDirectoryAnalyzer(guesser, new TitleNormalizer(), { extensions: config.supportedExtensions }),
    grouper: new ShowGrouper(),
    seasonResolver: new SeasonResolver(),
    identityLookup,
  });

  const fileRenamer = new FileRenamerService(
    new MetadataExtractorService(guesser, classifier),
    identityLookup,
    classifier,
    {
      moviePattern: config.moviePattern,
      tvPattern: config.tvPattern,
      extensions: config.supportedExtensions,
    }
  );

  const taskRunner = new TaskRunner();
  taskRunner.registerTask(new ConsolidateTask(consolidator, config.librariesTxtPath, config.dryRun));
  taskRunner.registerTask(new RenameTask(fileRenamer, config.librariesTxtPath, config.dryRun));

  const scheduler = new Scheduler(taskRunner);
  scheduler.scheduleConsolidation(config.consolidateCronSchedule);

  const libraryController = new LibraryController(consolidator, fileRenamer, classifier, taskRunner, config.dryRun);
  const app = createApp(libraryController);

  const server = app.listen(config.port, () => {
    console.log('='.repeat(50));
    console.log('Media Organizer Server');
    console.log('='.repeat(50));
    console.log(`Server running on port: ${config.port}`);
    console.log(`API URL: http://localhost:${config.port}`);
    console.log(`Consolidation schedule: ${config.consolidateCronSchedule || 'disabled'}`);
    console.log(`Dry run: ${config.dryRun}`);
    console.log('='.repeat(50));
  });

  const gracefulShutdown = () => {
    console.log('\nShutting down gracefully...');
    scheduler.stopAll();
    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', gracefulShutdown);
  process.on('SIGINT', gracefulShutdown);
}

// Start the application
bootstrap().catch((error) => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
