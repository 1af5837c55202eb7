import path from 'node:path';

import { ExportConfig } from '../config';
import { logger as rootLogger } from '../utils/logger';
import { atomicWrite, ensureDirectory, withLock } from './fileHelpers';

import type { SerializedExport } from '../export';
import type { Logger } from '../utils/logger';

export interface ExportWriterOptions {
  exportsDir?: string;
  log?: Logger;
}

/**
 * Persists serialized export documents under the exports directory.
 * A later export of the same workout on the same day replaces the earlier file.
 */
export class ExportWriter {
  private exportsDir: string;
  private log: Logger;

  constructor(options: ExportWriterOptions = {}) {
    this.exportsDir = options.exportsDir ?? ExportConfig.exportsDir;
    this.log = options.log ?? rootLogger;
  }

  async init(): Promise<void> {
    await ensureDirectory(this.exportsDir);
    this.log.info('Export directory ready', { exportsDir: path.resolve(this.exportsDir) });
  }

  /**
   * Write the document atomically and return its absolute path.
   */
  async write(serialized: SerializedExport): Promise<string> {
    // Filenames come from exportFilename; never let one escape the directory
    const filePath = path.resolve(this.exportsDir, path.basename(serialized.filename));

    await withLock(filePath, () => atomicWrite(filePath, serialized.bytes));
    this.log.debug('Export written', { bytes: serialized.bytes.length, filePath });
    return filePath;
  }
}
