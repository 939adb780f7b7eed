import { SentimentLabel } from './Sentiment';

export type SheetStatus = 'processed' | 'skipped-existing' | 'skipped-missing-reviews';

export interface SheetReport {
  name: string;
  status: SheetStatus;
  labels: { [label in SentimentLabel]: number };
  emptyReviews: number;
}
