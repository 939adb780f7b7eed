import * as XLSX from 'xlsx';
import { AppConfiguration } from '../model/AppConfiguration';
import { ERROR_LABEL, Sentiment, SentimentLabel } from '../model/Sentiment';
import { SheetReport } from '../model/SheetReport';
import { ExcelReader } from '../reader/ExcelReader';
import { ExcelGenerator } from '../generator/ExcelGenerator';

export interface ReviewClassifier {
  classify(review: string): Promise<Sentiment>;
}

export class SentimentProcessor {
  /**
   * Reads the workbook, labels every sheet that has no sentiment column yet and saves the file back.
   * The workbook is saved even when no sheet needed work.
   */
  static async processWorkbookFile(
    appConfiguration: AppConfiguration,
    classifier: ReviewClassifier
  ): Promise<SheetReport[]> {
    const filePath = appConfiguration.workbookPath;
    const workbook = ExcelReader.readWorkbook(filePath);
    const reports = await this.processWorkbook(workbook, appConfiguration, classifier);
    ExcelGenerator.writeWorkbook(workbook, filePath);
    console.log(`Sentiment analysis completed. Updated file: ${filePath}`);
    return reports;
  }

  static async processWorkbook(
    workbook: XLSX.WorkBook,
    appConfiguration: AppConfiguration,
    classifier: ReviewClassifier
  ): Promise<SheetReport[]> {
    const reports: SheetReport[] = [];
    for (const sheetName of workbook.SheetNames) {
      reports.push(await this.processSheet(sheetName, workbook.Sheets[sheetName], appConfiguration, classifier));
    }
    return reports;
  }

  static async processSheet(
    sheetName: string,
    worksheet: XLSX.WorkSheet,
    appConfiguration: AppConfiguration,
    classifier: ReviewClassifier
  ): Promise<SheetReport> {
    console.log(`Processing sheet: ${sheetName}`);
    const report: SheetReport = {
      name: sheetName,
      status: 'processed',
      labels: { Positive: 0, Negative: 0, Neutral: 0, [ERROR_LABEL]: 0 },
      emptyReviews: 0,
    };

    if (ExcelReader.getColumnIndex(worksheet, appConfiguration.sentimentColumn) !== null) {
      report.status = 'skipped-existing';
      return report;
    }

    const reviewsColumn = ExcelReader.getColumnIndex(worksheet, appConfiguration.reviewsColumn);
    const ref = worksheet['!ref'];
    if (reviewsColumn === null || !ref) {
      console.error(`Error: '${appConfiguration.reviewsColumn}' column not found in sheet ${sheetName}. Skipping...`);
      report.status = 'skipped-missing-reviews';
      return report;
    }

    const range = XLSX.utils.decode_range(ref);
    const sentimentColumn = range.e.c + 1;
    range.e.c = sentimentColumn;
    worksheet['!ref'] = XLSX.utils.encode_range(range);
    this.setText(worksheet, 0, sentimentColumn, appConfiguration.sentimentColumn);

    for (let R = 1; R <= range.e.r; ++R) {
      const review = this.readReview(worksheet, R, reviewsColumn);
      if (review === null) {
        console.log('No review text found. Skipping...\n');
        report.emptyReviews++;
        continue;
      }

      let label: SentimentLabel;
      try {
        label = await classifier.classify(review);
        console.log(`Review: ${review}\nSentiment: ${label}\n`);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Error processing review in sheet ${sheetName} row ${R + 1}: ${message}`);
        label = ERROR_LABEL;
      }
      this.setText(worksheet, R, sentimentColumn, label);
      report.labels[label]++;
    }

    return report;
  }

  // Missing cells, empty strings, zero and false count as no review.
  private static readReview(worksheet: XLSX.WorkSheet, row: number, column: number): string | null {
    const cell: XLSX.CellObject | undefined = worksheet[XLSX.utils.encode_cell({ r: row, c: column })];
    const value = cell?.v;
    if (value === undefined || value === '' || value === 0 || value === false) {
      return null;
    }
    return String(value);
  }

  private static setText(worksheet: XLSX.WorkSheet, row: number, column: number, text: string): void {
    worksheet[XLSX.utils.encode_cell({ r: row, c: column })] = { t: 's', v: text };
  }
}
