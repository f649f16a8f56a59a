import * as fs from 'fs';
import { TextDecoder } from 'util';
import { ResultBuilder } from './resultBuilder';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Confirm the path exists, is a regular file and is not empty.
 * Records one file error and returns false on the first failed check.
 */
export function checkFileAccess(filePath: string, result: ResultBuilder): boolean {
  let stats: fs.Stats | undefined;
  try {
    stats = fs.statSync(filePath, { throwIfNoEntry: false });
  } catch (error) {
    result.addError(0, '', 'file', `File access error: ${describe(error)}`);
    return false;
  }

  if (!stats) {
    result.addError(0, '', 'file', `File not found: ${filePath}`);
    return false;
  }
  if (!stats.isFile()) {
    result.addError(0, '', 'file', `Path is not a file: ${filePath}`);
    return false;
  }
  if (stats.size === 0) {
    result.addError(0, '', 'file', 'File is empty');
    return false;
  }
  return true;
}

/**
 * Read the file and decode it under the declared encoding.
 * Returns the decoded text, or null after recording one file error.
 * Invalid byte sequences anywhere in the file count as an encoding failure.
 */
export function readWithEncoding(filePath: string, encoding: string, result: ResultBuilder): string | null {
  let decoder: TextDecoder;
  let bytes: Buffer;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
    bytes = fs.readFileSync(filePath);
  } catch (error) {
    result.addError(0, '', 'file', `Error opening file: ${describe(error)}`);
    return null;
  }

  try {
    return decoder.decode(bytes);
  } catch (error) {
    result.addError(
      0,
      '',
      'file',
      `Encoding error: Unable to read file with ${encoding} encoding. ${describe(error)}`
    );
    return null;
  }
}
