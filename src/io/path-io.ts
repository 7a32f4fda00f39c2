import * as fs from 'fs/promises';
import * as path from 'node:path';

/**
 * Reads path data from a text file, trimmed of surrounding whitespace.
 *
 * @param filePath - Absolute path to a file holding an SVG path "d" string
 * @returns The trimmed path data (may be empty; callers decide whether that is an error)
 */
export async function loadPathDataFile(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath, 'utf8');
  return content.trim();
}

/**
 * True when a file system error means the file does not exist.
 */
export function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Writes a converted document or shape list as JSON.
 *
 * @param filePath - Absolute path of the output file; its directory is created if missing
 * @param data - Any JSON-compatible value
 * @param pretty - Indent with 2 spaces instead of writing a single line
 */
export async function saveLottieFile(filePath: string, data: unknown, pretty = false): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, pretty ? 2 : undefined), 'utf8');
}
