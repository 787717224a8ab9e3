import { promises as fs, constants } from 'fs';
import path from 'path';

/**
 * True when the path is a regular file the current user may execute
 */
export async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      return false;
    }
    await fs.access(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a command the way the shell would
 *
 * A command containing a path separator is checked as-is; a bare name is
 * looked up in each PATH entry in order.
 *
 * @returns Absolute path of the executable, or null when none is found
 */
export async function resolveExecutable(
  command: string,
  searchPath: string = process.env.PATH ?? ''
): Promise<string | null> {
  if (command.includes('/') || command.includes(path.sep)) {
    return (await isExecutableFile(command)) ? path.resolve(command) : null;
  }

  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, command);
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }

  return null;
}
