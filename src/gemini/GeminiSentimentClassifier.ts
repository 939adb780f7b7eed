import { GoogleGenerativeAI, GoogleGenerativeAIFetchError } from '@google/generative-ai';
import { AppConfiguration } from '../model/AppConfiguration';
import { Sentiment } from '../model/Sentiment';

const MS_IN_SEC = 1000;

export type TextGenerator = (prompt: string) => Promise<string>;
export type Sleeper = (ms: number) => Promise<void>;

const defaultSleep: Sleeper = ms => new Promise(resolve => setTimeout(resolve, ms));

export class GeminiSentimentClassifier {
  private generate: TextGenerator;
  private maxRetries: number;
  private retryBackoffBase: number;
  private sleep: Sleeper;

  constructor(generate: TextGenerator, appConfiguration: AppConfiguration, sleep: Sleeper = defaultSleep) {
    this.generate = generate;
    this.maxRetries = appConfiguration.maxRetries;
    this.retryBackoffBase = appConfiguration.retryBackoffBase;
    this.sleep = sleep;
  }

  /**
   * Builds a classifier backed by the Gemini model named in the configuration.
   */
  static fromApiKey(apiKey: string | undefined, appConfiguration: AppConfiguration): GeminiSentimentClassifier {
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY environment variable not set.');
    }
    const model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: appConfiguration.model });
    return new GeminiSentimentClassifier(async prompt => {
      const result = await model.generateContent(prompt);
      return result.response.text();
    }, appConfiguration);
  }

  static buildPrompt(review: string): string {
    return (
      'You are a machine specialized in segregating whether a review is positive, negative, or neutral. ' +
      'You have to answer in one word whether the review is positive, negative, or neutral. ' +
      `Here is the review: ${review}`
    );
  }

  static normalizeSentiment(answer: string): Sentiment {
    const word = answer.trim().toLowerCase();
    if (word === 'positive') {
      return 'Positive';
    }
    if (word === 'negative') {
      return 'Negative';
    }
    return 'Neutral';
  }

  static isQuotaError(error: unknown): boolean {
    if (error instanceof GoogleGenerativeAIFetchError && error.status === 429) {
      return true;
    }
    const message = error instanceof Error ? error.message : String(error);
    return /\b429\b|RESOURCE_EXHAUSTED|quota/i.test(message);
  }

  /**
   * Asks the model for a one-word verdict and returns its trimmed answer.
   * Quota errors are retried with a delay of retryBackoffBase ** attempt seconds.
   */
  async classifyReview(review: string): Promise<string> {
    const prompt = GeminiSentimentClassifier.buildPrompt(review);

    for (let attempt = 0; ; attempt++) {
      try {
        const text = await this.generate(prompt);
        return text.trim();
      } catch (error: unknown) {
        if (!GeminiSentimentClassifier.isQuotaError(error) || attempt >= this.maxRetries - 1) {
          throw error;
        }
        const sleepTime = this.retryBackoffBase ** attempt;
        console.warn(`Quota exceeded. Retrying in ${sleepTime} seconds...`);
        await this.sleep(sleepTime * MS_IN_SEC);
      }
    }
  }

  async classify(review: string): Promise<Sentiment> {
    return GeminiSentimentClassifier.normalizeSentiment(await this.classifyReview(review));
  }
}
