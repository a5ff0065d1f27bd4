import path from 'node:path';
import { promises as fsp, type Dirent } from 'node:fs';
import type { Logger } from 'pino';
import { describeError, errorCode } from '../errors.js';

/**
 * Full paths of the regular files in `directory` named `*.<extension>`, in
 * the order the directory listing returns them (unspecified; callers sort).
 * Never throws: a missing or unreadable directory yields an empty list.
 */
export async function listFiles(directory: string, extension: string, logger: Logger): Promise<string[]> {
  const suffix = `.${extension.replace(/^\./, '')}`;

  let entries: Dirent[];
  try {
    entries = await fsp.readdir(directory, { withFileTypes: true });
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT') {
      logger.warn({ directory }, `Folder "${directory}" does not exist.`);
    } else if (code === 'ENOTDIR') {
      logger.warn({ directory }, `Path "${directory}" is not a folder.`);
    } else {
      logger.error({ directory, err: error }, `Error retrieving file list: ${describeError(error)}`);
    }
    return [];
  }

  const files = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(suffix))
    .map((entry) => path.join(directory, entry.name));

  if (!files.length) {
    logger.warn({ directory, extension: suffix }, `No "${suffix}" files found in "${directory}".`);
  } else {
    logger.info({ directory, count: files.length }, `Found ${files.length} "${suffix}" file(s) in "${directory}".`);
  }

  return files;
}
