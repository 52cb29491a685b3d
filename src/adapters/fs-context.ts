import { access } from 'fs/promises';
import path from 'path';
import { ContextSource } from '../engine/image-publisher';

/** Resolves build context and recipe paths against a base directory. */
export class FsContextSource implements ContextSource {
  constructor(private baseDir: string) {}

  async exists(target: string): Promise<boolean> {
    try {
      await access(path.resolve(this.baseDir, target));
      return true;
    } catch {
      return false;
    }
  }
}
