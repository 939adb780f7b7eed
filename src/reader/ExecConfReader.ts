import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { AppConfiguration } from '../model/AppConfiguration';
import { GitConf } from '../model/GitConf';
import { ExecConf } from '../model/ExecConf';

const DEFAULT_WORKBOOK_PATH = 'A2b_January_month.xlsx';
const DEFAULT_MODEL = 'gemini-2.0-flash';

const appConfigurationSchema = z
  .object({
    workbookPath: z.string().min(1).default(DEFAULT_WORKBOOK_PATH),
    reviewsColumn: z.string().min(1).default('Reviews'),
    sentimentColumn: z.string().min(1).default('Sentiment'),
    model: z.string().min(1).optional(),
    maxRetries: z.number().int().positive().default(5),
    retryBackoffBase: z.number().nonnegative().default(9),
  })
  .default({});

const gitConfSchema = z
  .object({
    userName: z.string().min(1).default('GitHub Actions'),
    userEmail: z.string().min(1).default('github-actions[bot]@users.noreply.github.com'),
    commitMessage: z.string().min(1).default('Automated sentiment analysis update'),
    host: z.string().min(1).default('github.com'),
    repository: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected "owner/name"').optional(),
    branch: z.string().min(1).default('main'),
  })
  .default({});

const execConfSchema = z.object({
  appConfiguration: appConfigurationSchema,
  git: gitConfSchema,
  stampFile: z.string().min(1).optional(),
});

export class ExecConfReader {
  /**
   * Reads the YAML configuration file, or only the defaults when no path is given.
   * Environment variables (GEMINI_MODEL, GITHUB_REPOSITORY) fill values the file leaves out.
   */
  static readConfFile(confFilePath?: string, env: NodeJS.ProcessEnv = process.env): ExecConf {
    try {
      let confData: unknown = {};
      if (confFilePath) {
        const confFileContent = fs.readFileSync(path.resolve(confFilePath), 'utf8');
        confData = yaml.load(confFileContent) ?? {};
      }
      return this.parseConf(confData, env);
    } catch (error: unknown) {
      throw new Error(`Error reading or parsing configuration file: ${this.describeError(error)}`);
    }
  }

  static parseConf(confData: unknown, env: NodeJS.ProcessEnv = process.env): ExecConf {
    const parsed = execConfSchema.parse(confData);

    const app = parsed.appConfiguration;
    const appConfiguration = new AppConfiguration(
      app.workbookPath,
      app.reviewsColumn,
      app.sentimentColumn,
      app.model ?? (env.GEMINI_MODEL || DEFAULT_MODEL),
      app.maxRetries,
      app.retryBackoffBase
    );

    const git = parsed.git;
    const gitConf = new GitConf(
      git.userName,
      git.userEmail,
      git.commitMessage,
      git.host,
      git.branch,
      git.repository ?? (env.GITHUB_REPOSITORY || undefined)
    );

    return new ExecConf(appConfiguration, gitConf, parsed.stampFile);
  }

  private static describeError(error: unknown): string {
    if (error instanceof z.ZodError) {
      return error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join(', ');
    }
    return error instanceof Error ? error.message : String(error);
  }
}
