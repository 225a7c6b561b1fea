import fs from 'fs';
import path from 'path';
import { logger, errorMessage } from '../../config/logger';

/**
 * Scratch directory of one export. Everything an export writes besides the
 * final artifact lives here and is removed when the job ends, however it ends.
 */
export class JobWorkspace {
  private disposed = false;

  private constructor(readonly dir: string) {}

  static async create(workDir: string, jobId: string): Promise<JobWorkspace> {
    await fs.promises.mkdir(workDir, { recursive: true });
    const dir = await fs.promises.mkdtemp(path.join(workDir, `mix_${jobId}_`));
    return new JobWorkspace(dir);
  }

  file(name: string): string {
    return path.join(this.dir, name);
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    try {
      await fs.promises.rm(this.dir, { recursive: true, force: true });
    } catch (error) {
      // a leftover scratch dir must not change the job's outcome
      logger.warn('Failed to remove job workspace', { dir: this.dir, error: errorMessage(error) });
    }
  }
}
