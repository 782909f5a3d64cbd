import * as fs from 'node:fs';
import * as path from 'node:path';

/** Source name meaning "read standard input". */
export const STDIN_SOURCE = '-';

export interface InputDeps {
  readFile: (filePath: string) => string;
  readStdin: () => string;
}

const defaultDeps: InputDeps = {
  readFile: (filePath: string) => fs.readFileSync(filePath, 'utf-8'),
  readStdin: () => fs.readFileSync(0, 'utf-8'),
};

/**
 * Read a whole text input from a file, or from stdin when the source is "-".
 * Fails fast with the path in the message when the file cannot be read.
 */
export function readTextInput(source: string, deps: Partial<InputDeps> = {}): string {
  const { readFile, readStdin } = { ...defaultDeps, ...deps };
  if (source === STDIN_SOURCE) {
    return readStdin();
  }

  const resolved = path.resolve(source);
  try {
    return readFile(resolved);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read ${resolved}: ${message}`);
  }
}

/**
 * Split text into address lines: trimmed, with blank lines and `#` comment
 * lines dropped.
 */
export function toAddressList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}
