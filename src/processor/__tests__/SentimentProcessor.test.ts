import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as XLSX from 'xlsx';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ReviewClassifier, SentimentProcessor } from '../SentimentProcessor';
import { ExcelReader } from '../../reader/ExcelReader';
import { ChangeStamper } from '../../workspace/ChangeStamper';
import { AppConfiguration } from '../../model/AppConfiguration';
import { Sentiment } from '../../model/Sentiment';

function appConfiguration(workbookPath = 'book.xlsx'): AppConfiguration {
  return new AppConfiguration(workbookPath, 'Reviews', 'Sentiment', 'gemini-2.0-flash', 5, 9);
}

class FakeClassifier implements ReviewClassifier {
  reviews: string[] = [];

  async classify(review: string): Promise<Sentiment> {
    this.reviews.push(review);
    if (review === 'Awful') {
      throw new Error('model unavailable');
    }
    if (review.includes('Great')) {
      return 'Positive';
    }
    return 'Neutral';
  }
}

function textAt(sheet: XLSX.WorkSheet, address: string): unknown {
  const cell: XLSX.CellObject | undefined = sheet[address];
  return cell?.v;
}

describe('SentimentProcessor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('adds a sentiment column after the last column', async () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['Reviews', 'Stars'],
      ['Great food', 5],
      ['', 3],
      ['Awful', 1],
      ['Okay I guess', 3],
    ]);
    const classifier = new FakeClassifier();

    const report = await SentimentProcessor.processSheet('January', sheet, appConfiguration(), classifier);

    expect(sheet['!ref']).toBe('A1:C5');
    expect(textAt(sheet, 'C1')).toBe('Sentiment');
    expect(textAt(sheet, 'C2')).toBe('Positive');
    expect(textAt(sheet, 'C3')).toBeUndefined();
    expect(textAt(sheet, 'C4')).toBe('Error');
    expect(textAt(sheet, 'C5')).toBe('Neutral');
    expect(classifier.reviews).toEqual(['Great food', 'Awful', 'Okay I guess']);
    expect(report).toEqual({
      name: 'January',
      status: 'processed',
      labels: { Positive: 1, Negative: 0, Neutral: 1, Error: 1 },
      emptyReviews: 1,
    });
    expect(console.error).toHaveBeenCalledWith('Error processing review in sheet January row 4: model unavailable');
  });

  it('skips sheets that already carry a sentiment column', async () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['Reviews', ' sentiment '],
      ['Great food', 'Positive'],
    ]);
    const classifier = new FakeClassifier();

    const report = await SentimentProcessor.processSheet('Done', sheet, appConfiguration(), classifier);

    expect(report.status).toBe('skipped-existing');
    expect(classifier.reviews).toEqual([]);
    expect(sheet['!ref']).toBe('A1:B2');
  });

  it('skips sheets without a reviews column', async () => {
    const sheet = XLSX.utils.aoa_to_sheet([['Comment'], ['Great food']]);
    const classifier = new FakeClassifier();

    const report = await SentimentProcessor.processSheet('Notes', sheet, appConfiguration(), classifier);

    expect(report.status).toBe('skipped-missing-reviews');
    expect(textAt(sheet, 'B1')).toBeUndefined();
    expect(console.error).toHaveBeenCalledWith("Error: 'Reviews' column not found in sheet Notes. Skipping...");
  });

  it('classifies numeric reviews as text and skips zero', async () => {
    const sheet = XLSX.utils.aoa_to_sheet([['Reviews'], [42], [0]]);
    const classifier = new FakeClassifier();

    const report = await SentimentProcessor.processSheet('Numbers', sheet, appConfiguration(), classifier);

    expect(classifier.reviews).toEqual(['42']);
    expect(textAt(sheet, 'B2')).toBe('Neutral');
    expect(textAt(sheet, 'B3')).toBeUndefined();
    expect(report.emptyReviews).toBe(1);
  });

  it('processes every sheet of the workbook in order', async () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['Reviews'], ['Great value']]), 'First');
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['Other'], ['x']]), 'Second');

    const reports = await SentimentProcessor.processWorkbook(workbook, appConfiguration(), new FakeClassifier());

    expect(reports.map(report => [report.name, report.status])).toEqual([
      ['First', 'processed'],
      ['Second', 'skipped-missing-reviews'],
    ]);
    expect(console.log).toHaveBeenCalledWith('Processing sheet: Second');
  });

  it('saves the labelled workbook back to its file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentiment-proc-'));
    const file = path.join(dir, 'book.xlsx');
    try {
      const workbook = XLSX.utils.book_new();
      XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['Reviews'], ['Great coffee']]), 'January');
      XLSX.writeFile(workbook, file);

      const reports = await SentimentProcessor.processWorkbookFile(appConfiguration(file), new FakeClassifier());

      expect(reports[0].labels.Positive).toBe(1);
      const saved = XLSX.readFile(file);
      expect(saved.Sheets.January.B1.v).toBe('Sentiment');
      expect(saved.Sheets.January.B2.v).toBe('Positive');
      expect(console.log).toHaveBeenCalledWith(`Sentiment analysis completed. Updated file: ${file}`);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('keeps number formats of untouched cells when saving', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentiment-proc-'));
    const file = path.join(dir, 'book.xlsx');
    try {
      const sheet = XLSX.utils.aoa_to_sheet([
        ['Reviews', 'Visited'],
        ['Great coffee', 46027],
      ]);
      sheet.B2.z = 'm/d/yy';
      const workbook = XLSX.utils.book_new();
      XLSX.utils.book_append_sheet(workbook, sheet, 'January');
      XLSX.writeFile(workbook, file);

      await SentimentProcessor.processWorkbookFile(appConfiguration(file), new FakeClassifier());

      const saved = ExcelReader.readWorkbook(file);
      expect(saved.Sheets.January.B2.v).toBe(46027);
      expect(saved.Sheets.January.B2.w).toBe('1/5/26');
      expect(saved.Sheets.January.C2.v).toBe('Positive');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('re-reads a stamped workbook on the next run and skips labelled sheets', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentiment-proc-'));
    const file = path.join(dir, 'book.xlsx');
    try {
      const workbook = XLSX.utils.book_new();
      XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['Reviews'], ['Great coffee']]), 'January');
      XLSX.writeFile(workbook, file);

      await SentimentProcessor.processWorkbookFile(appConfiguration(file), new FakeClassifier());
      ChangeStamper.appendTimestamp(file, new Date('2026-10-19T09:30:00.000Z'));

      const nextRun = new FakeClassifier();
      const reports = await SentimentProcessor.processWorkbookFile(appConfiguration(file), nextRun);

      expect(reports.map(report => report.status)).toEqual(['skipped-existing']);
      expect(nextRun.reviews).toEqual([]);
      const saved = ExcelReader.readWorkbook(file);
      expect(saved.Sheets.January.B2.v).toBe('Positive');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('fails when the workbook is missing', async () => {
    await expect(
      SentimentProcessor.processWorkbookFile(appConfiguration('/nonexistent/book.xlsx'), new FakeClassifier())
    ).rejects.toThrow('Workbook file "/nonexistent/book.xlsx" not found.');
  });
});
