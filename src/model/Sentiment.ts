export type Sentiment = 'Positive' | 'Negative' | 'Neutral';

// Written in place of a sentiment when the classifier fails for a row
export const ERROR_LABEL = 'Error';

export type SentimentLabel = Sentiment | typeof ERROR_LABEL;
