// src/model/AppConfiguration.ts
export class AppConfiguration {
  workbookPath: string;
  reviewsColumn: string;
  sentimentColumn: string;
  model: string;
  maxRetries: number;
  retryBackoffBase: number;

  constructor(
    workbookPath: string,
    reviewsColumn: string,
    sentimentColumn: string,
    model: string,
    maxRetries: number,
    retryBackoffBase: number
  ) {
    this.workbookPath = workbookPath;
    this.reviewsColumn = reviewsColumn;
    this.sentimentColumn = sentimentColumn;
    this.model = model;
    this.maxRetries = maxRetries;
    this.retryBackoffBase = retryBackoffBase;
  }
}
