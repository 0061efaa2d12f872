import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileScriptSource } from './script-source.js';

describe('FileScriptSource', () => {
  let dir: string;
  let source: FileScriptSource;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'scriptrelay-scripts-'));
    source = new FileScriptSource(dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('resolves relative paths against the base directory', () => {
    expect(source.resolvePath('scripts/clear.py')).toBe(join(dir, 'scripts', 'clear.py'));
  });

  it('leaves absolute paths alone', () => {
    expect(source.resolvePath('/opt/scenes/build.py')).toBe('/opt/scenes/build.py');
  });

  it('reads script text as UTF-8', async () => {
    mkdirSync(join(dir, 'scripts'));
    writeFileSync(join(dir, 'scripts', 'label.py'), 'print("ß → ✓")\n', 'utf-8');

    await expect(source.readScript('scripts/label.py')).resolves.toBe('print("ß → ✓")\n');
  });

  it('rejects a missing file with INVALID_COMMAND', async () => {
    await expect(source.readScript('nope.py')).rejects.toMatchObject({
      kind: 'INVALID_COMMAND',
      retriable: false,
      message: `Script file not found: ${join(dir, 'nope.py')}`,
    });
  });

  it('rejects a directory with a read error', async () => {
    mkdirSync(join(dir, 'folder.py'));
    await expect(source.readScript('folder.py')).rejects.toMatchObject({
      kind: 'INVALID_COMMAND',
      message: expect.stringContaining(`Cannot read script ${join(dir, 'folder.py')}:`),
    });
  });
});
