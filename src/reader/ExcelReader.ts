import * as XLSX from 'xlsx';
import * as fs from 'fs';
import * as path from 'path';

export class ExcelReader {
  static readWorkbook(filePath: string): XLSX.WorkBook {
    const resolvedPath = path.resolve(filePath);
    if (!fs.existsSync(resolvedPath)) {
      throw new Error(`Workbook file "${filePath}" not found.`);
    }
    try {
      // Number formats are kept so a save does not turn dates into bare serials
      return XLSX.readFile(resolvedPath, { cellNF: true });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Error reading Excel file "${filePath}": ${message}`);
    }
  }

  /**
   * Finds the 0-based index of the header cell matching the column name.
   * Header values are trimmed and compared case-insensitively; non-text headers never match.
   */
  static getColumnIndex(worksheet: XLSX.WorkSheet, columnName: string): number | null {
    const ref = worksheet['!ref'];
    if (!ref) {
      return null;
    }
    const range = XLSX.utils.decode_range(ref);
    const wanted = columnName.toLowerCase();

    for (let C = range.s.c; C <= range.e.c; ++C) {
      const cell: XLSX.CellObject | undefined = worksheet[XLSX.utils.encode_cell({ r: 0, c: C })];
      const value = cell?.v;
      if (typeof value === 'string' && value.trim().toLowerCase() === wanted) {
        return C;
      }
    }
    return null;
  }
}
