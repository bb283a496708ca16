import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { LibraryController } from './controllers/library.controller';

export function createApp(libraryController: LibraryController): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: 'Media Organizer API',
      version: '1.0.0',
      endpoints: {
        'GET /': 'API information',
        'POST /api/consolidate': 'Merge split TV show directories (body: { path, dryRun? })',
        'POST /api/rename': 'Rename media files to the configured patterns (body: { path, dryRun? })',
        'GET /api/quality': 'Classify a release name (query: ?name=...)',
        'GET /api/tasks': 'Get registered tasks',
        'POST /api/tasks/:name/run': 'Run a registered task over every library',
        'GET /health': 'Health check',
      },
    });
  });

  app.post('/api/consolidate', libraryController.consolidate);
  app.post('/api/rename', libraryController.rename);
  app.get('/api/quality', libraryController.getQuality);
  app.get('/api/tasks', libraryController.getTasks);
  app.post('/api/tasks/:name/run', libraryController.runTask);

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ success: true, status: 'healthy', timestamp: new Date().toISOString() });
  });

  return app;
}
