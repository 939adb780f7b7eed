import * as XLSX from 'xlsx';
import * as path from 'path';

export class ExcelGenerator {
  /**
   * Writes the workbook to the given path; the book type follows the file extension.
   */
  static writeWorkbook(workbook: XLSX.WorkBook, filePath: string): void {
    const resolvedPath = path.resolve(filePath);
    try {
      XLSX.writeFile(workbook, resolvedPath);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('Error generating Excel file:', message);
      throw error;
    }
  }
}
