import * as fs from 'fs';
import * as path from 'path';

export class ChangeStamper {
  /**
   * Appends an "Updated on" line so every run leaves a diff for git to pick up.
   * @returns The line written, without its trailing newline.
   */
  static appendTimestamp(filePath: string, now: Date = new Date()): string {
    const line = `Updated on ${now.toISOString()}`;
    fs.appendFileSync(path.resolve(filePath), `${line}\n`, 'utf8');
    console.log(`Appended "${line}" to ${filePath}`);
    return line;
  }
}
