import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { DocumentStoragePort } from '../../ports/DocumentStoragePort.js';
import { createLogger } from '../../utils/logger.js';
import { IOError } from '../../utils/errors.js';

export class TextFileAdapter implements DocumentStoragePort {
  private readonly logger = createLogger({ adapter: 'TextFileAdapter' });

  constructor(public readonly location: string) {}

  async read(): Promise<string | null> {
    const logger = this.logger.child({ method: 'read', path: this.location });

    try {
      const content = await readFile(this.location, 'utf8');
      logger.info({ contentLength: content.length }, 'Read document');
      return content;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        logger.warn('Document not found; it will be created on first save');
        return null;
      }
      logger.error({ error }, 'Failed to read document');
      throw new IOError(this.location, 'Failed to read document', { cause: error });
    }
  }

  async write(content: string): Promise<void> {
    const logger = this.logger.child({ method: 'write', path: this.location });

    try {
      await mkdir(dirname(this.location), { recursive: true });
      await writeFile(this.location, content, 'utf8');
      logger.debug({ contentLength: content.length }, 'Wrote document');
    } catch (error) {
      logger.error({ error }, 'Failed to write document');
      throw new IOError(this.location, 'Failed to write document', { cause: error });
    }
  }

  writeSync(content: string): void {
    try {
      mkdirSync(dirname(this.location), { recursive: true });
      writeFileSync(this.location, content, 'utf8');
    } catch (error) {
      this.logger.error({ error, path: this.location }, 'Failed to write document synchronously');
      throw new IOError(this.location, 'Failed to write document', { cause: error });
    }
  }
}
