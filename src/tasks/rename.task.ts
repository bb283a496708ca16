import { ITask, TaskResult } from '../types/task.types';
import { FileRenamerService } from '../services/file-renamer.service';
import { readLibraryRoots } from '../utils/library-list.util';

export class RenameTask implements ITask {
  name = 'RenameTask';

  constructor(
    private readonly renamer: FileRenamerService,
    private readonly librariesTxtPath: string,
    private readonly dryRun: boolean
  ) {}

  async execute(): Promise<TaskResult> {
    console.log(`\n[${new Date().toISOString()}] Starting ${this.name}...`);

    const roots = readLibraryRoots(this.librariesTxtPath);
    let renamed = 0;
    let failed = 0;

    for (const root of roots) {
      const results = await this.renamer.processDirectory(root, this.dryRun);
      renamed += results.filter((result) => result.success).length;
      failed += results.filter((result) => !result.success).length;
    }

    console.log('\n=== Rename Results ===');
    console.log(`Renamed: ${renamed}`);
    console.log(`Errors: ${failed}`);
    console.log('======================\n');

    return {
      taskName: this.name,
      success: failed === 0,
      message: `${renamed} files renamed, ${failed} errors`,
    };
  }
}
