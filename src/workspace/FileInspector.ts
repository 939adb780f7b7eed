import * as fs from 'fs';
import * as path from 'path';

export interface FileInspection {
  exists: boolean;
  size: number;
}

export class FileInspector {
  /**
   * Logs the directory listing and the state of one file in it.
   * A missing or empty file is reported, never raised.
   */
  static inspect(directory: string, fileName: string): FileInspection {
    const resolvedDir = path.resolve(directory);
    for (const entry of fs.readdirSync(resolvedDir, { withFileTypes: true })) {
      const entryPath = path.join(resolvedDir, entry.name);
      const size = entry.isFile() ? fs.statSync(entryPath).size : 0;
      console.log(`${entry.isDirectory() ? 'd' : '-'} ${String(size).padStart(10)} ${entry.name}`);
    }

    const filePath = path.resolve(resolvedDir, fileName);
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      console.log('File does not exist or is empty');
      return { exists: false, size: 0 };
    }

    const size = fs.statSync(filePath).size;
    if (size === 0) {
      console.log('File does not exist or is empty');
    } else {
      console.log(`${fileName}: ${size} bytes`);
    }
    return { exists: true, size };
  }
}
