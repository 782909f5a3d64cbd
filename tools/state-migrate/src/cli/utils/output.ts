import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Write content to a file, or to stdout when no path is given.
 * Returns the resolved path when a file was written.
 */
export function writeOutput(content: string, outputPath?: string): string | undefined {
  if (outputPath && outputPath !== '-') {
    const resolved = path.resolve(outputPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, content);
    return resolved;
  }
  process.stdout.write(content);
  return undefined;
}
