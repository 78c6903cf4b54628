import { promises as fs } from 'fs';
import path from 'path';
import { ScriptPathError, hasErrorCode } from './errors';

export interface ScriptSource {
  path: string;
  content: string;
}

type SourceFileSystem = Pick<typeof fs, 'readFile'>;

/**
 * Remote paths are absolute POSIX paths with no `..` segment and nothing the
 * console would split into another line.
 */
export function validateRemotePath(remotePath: string): string {
  const trimmed = remotePath.trim();
  if (!trimmed.startsWith('/')) {
    throw new ScriptPathError(`Remote path '${remotePath}' must be absolute`);
  }
  if (/[\r\n\0]/.test(trimmed)) {
    throw new ScriptPathError(`Remote path '${remotePath}' contains control characters`);
  }
  if (trimmed.split('/').includes('..')) {
    throw new ScriptPathError(`Remote path '${remotePath}' must not contain '..'`);
  }
  if (trimmed.endsWith('/')) {
    throw new ScriptPathError(`Remote path '${remotePath}' names a directory`);
  }
  return trimmed;
}

/**
 * Reads a local script that must live under `baseDir`.
 */
export async function resolveScriptSource(
  baseDir: string,
  localPath: string,
  fileSystem: SourceFileSystem = fs
): Promise<ScriptSource> {
  const root = path.resolve(baseDir);
  const resolved = path.resolve(root, localPath);
  const relative = path.relative(root, resolved);

  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new ScriptPathError(`Script '${localPath}' is outside ${baseDir}`);
  }

  try {
    const content = await fileSystem.readFile(resolved, 'utf8');
    return { path: resolved, content };
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'EISDIR')) {
      throw new ScriptPathError(`Script '${localPath}' not found`);
    }
    throw error;
  }
}
