/**
 * Script payload source.
 *
 * Supplies the text (or host-side path) of a stage's script. The relay
 * attaches no meaning to the content; it only has to exist and be
 * readable when the stage is about to run.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import { RelayError } from './relay-error.js';
import { ErrorKind } from '../types/errors.js';

export interface ScriptSource {
  /** Absolute path for a script reference. */
  resolvePath(path: string): string;
  /** Script text. Rejects with RelayError(INVALID_COMMAND) if unreadable. */
  readScript(path: string): Promise<string>;
}

/** Reads UTF-8 script files relative to a base directory. */
export class FileScriptSource implements ScriptSource {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  resolvePath(path: string): string {
    return isAbsolute(path) ? path : resolve(this.baseDir, path);
  }

  async readScript(path: string): Promise<string> {
    const fullPath = this.resolvePath(path);
    try {
      return await readFile(fullPath, 'utf-8');
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined;
      throw new RelayError({
        kind: ErrorKind.INVALID_COMMAND,
        message:
          code === 'ENOENT'
            ? `Script file not found: ${fullPath}`
            : `Cannot read script ${fullPath}: ${err instanceof Error ? err.message : String(err)}`,
        cause: err,
      });
    }
  }
}
