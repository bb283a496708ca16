import { ITask, TaskResult } from '../types/task.types';
import { TVShowConsolidator } from '../services/tv-show-consolidator.service';
import { readLibraryRoots } from '../utils/library-list.util';

export class ConsolidateTask implements ITask {
  name = 'ConsolidateTask';

  constructor(
    private readonly consolidator: TVShowConsolidator,
    private readonly librariesTxtPath: string,
    private readonly dryRun: boolean
  ) {}

  async execute(): Promise<TaskResult> {
    console.log(`\n[${new Date().toISOString()}] Starting ${this.name}...`);

    const roots = readLibraryRoots(this.librariesTxtPath);
    if (roots.length === 0) {
      console.log('No libraries to consolidate. Check libraries.txt file.');
      return { taskName: this.name, success: true, message: 'No libraries configured' };
    }

    let shows = 0;
    let moved = 0;
    let failed = 0;

    for (const root of roots) {
      const results = await this.consolidator.consolidate(root, { dryRun: this.dryRun });
      shows += results.length;
      for (const result of results) {
        for (const operation of result.operations) {
          if (operation.success) {
            moved++;
          } else {
            failed++;
          }
        }
      }
    }

    console.log('\n=== Consolidation Results ===');
    console.log(`Libraries: ${roots.length}`);
    console.log(`Shows: ${shows}`);
    console.log(`Merged: ${moved}`);
    console.log(`Failed: ${failed}`);
    console.log('=============================\n');

    return {
      taskName: this.name,
      success: failed === 0,
      message: `${shows} shows consolidated, ${moved} directories merged, ${failed} failed`,
    };
  }
}
