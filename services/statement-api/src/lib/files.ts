/**
 * Local File Store
 *
 * Uploaded PDFs live under UPLOAD_DIR as `<uuid>.pdf`; the locator is the
 * file name, never a caller-controlled path.
 */

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { config, type FileStore } from '@ledgerline/shared';

const LOCATOR_PATTERN = /^[0-9a-f-]{36}\.pdf$/;

export class LocalFileStore implements FileStore {
  constructor(private readonly root: string = config.uploadDir) {}

  private resolve(locator: string): string {
    if (!LOCATOR_PATTERN.test(locator)) {
      throw new Error(`Invalid file locator: ${locator}`);
    }
    return path.join(this.root, locator);
  }

  async save(bytes: Buffer, _originalFilename: string): Promise<string> {
    await fs.mkdir(this.root, { recursive: true });
    const locator = `${uuidv4()}.pdf`;
    await fs.writeFile(this.resolve(locator), bytes, { flag: 'wx' });
    return locator;
  }

  async read(locator: string): Promise<Buffer> {
    return fs.readFile(this.resolve(locator));
  }

  async remove(locator: string): Promise<void> {
    await fs.rm(this.resolve(locator), { force: true });
  }
}
