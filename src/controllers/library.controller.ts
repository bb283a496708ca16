import { Request, Response } from 'express';
import fs from 'fs';
import { TaskRunner } from '../tasks/task-runner';
import { TVShowConsolidator } from '../services/tv-show-consolidator.service';
import { FileRenamerService } from '../services/file-renamer.service';
import { QualityClassifier } from '../services/quality-classifier.service';

interface LibraryRequest {
  path: string;
  dryRun: boolean;
}

export class LibraryController {
  constructor(
    private readonly consolidator: TVShowConsolidator,
    private readonly fileRenamer: FileRenamerService,
    private readonly classifier: QualityClassifier,
    private readonly taskRunner: TaskRunner,
    private readonly defaultDryRun: boolean
  ) {}

  consolidate = async (req: Request, res: Response): Promise<void> => {
    const body = this.parseLibraryRequest(req.body);
    if (typeof body === 'string') {
      res.status(400).json({ success: false, error: body });
      return;
    }

    try {
      console.log(`Consolidation triggered via API: ${body.path}`);
      const results = await this.consolidator.consolidate(body.path, { dryRun: body.dryRun });
      res.json({ success: true, dryRun: body.dryRun, results });
    } catch (error) {
      console.error('Consolidation failed:', error);
      res.status(500).json({ success: false, error: 'Failed to consolidate library' });
    }
  };

  rename = async (req: Request, res: Response): Promise<void> => {
    const body = this.parseLibraryRequest(req.body);
    if (typeof body === 'string') {
      res.status(400).json({ success: false, error: body });
      return;
    }

    try {
      console.log(`Rename triggered via API: ${body.path}`);
      const results = await this.fileRenamer.processDirectory(body.path, body.dryRun);
      res.json({ success: true, dryRun: body.dryRun, results });
    } catch (error) {
      console.error('Rename failed:', error);
      res.status(500).json({ success: false, error: 'Failed to rename library' });
    }
  };

  getQuality = (req: Request, res: Response): void => {
    const name = req.query.name;
    if (typeof name !== 'string' || !name.trim()) {
      res.status(400).json({ success: false, error: 'Query parameter "name" is required' });
      return;
    }

    const profile = this.classifier.classifyFromText(name);
    res.json({ success: true, profile, formatted: this.classifier.format(profile) });
  };

  getTasks = (_req: Request, res: Response): void => {
    res.json({ success: true, tasks: this.taskRunner.getRegisteredTasks() });
  };

  runTask = (req: Request, res: Response): void => {
    const taskName = req.params.name;
    if (!this.taskRunner.hasTask(taskName)) {
      res.status(404).json({ success: false, error: `Task not found: ${taskName}` });
      return;
    }

    console.log(`${taskName} triggered via API`);
    res.json({ success: true, message: `${taskName} started` });

    this.taskRunner.executeTask(taskName).catch((error) => {
      console.error(`${taskName} failed:`, error);
    });
  };

  private parseLibraryRequest(body: unknown): LibraryRequest | string {
    if (typeof body !== 'object' || body === null || !('path' in body)) {
      return 'Body field "path" is required';
    }

    const { path: libraryPath } = body;
    if (typeof libraryPath !== 'string' || !libraryPath.trim()) {
      return 'Body field "path" must be a non-empty string';
    }
    if (!fs.existsSync(libraryPath) || !fs.statSync(libraryPath).isDirectory()) {
      return `Not a directory: ${libraryPath}`;
    }

    let dryRun = this.defaultDryRun;
    if ('dryRun' in body) {
      if (typeof body.dryRun !== 'boolean') {
        return 'Body field "dryRun" must be a boolean';
      }
      dryRun = body.dryRun;
    }

    return { path: libraryPath, dryRun };
  }
}
