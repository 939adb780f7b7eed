import * as path from 'path';
import { ExecConf } from './model/ExecConf';
import { SheetReport } from './model/SheetReport';
import { GeminiSentimentClassifier } from './gemini/GeminiSentimentClassifier';
import { ReviewClassifier, SentimentProcessor } from './processor/SentimentProcessor';
import { FileInspection, FileInspector } from './workspace/FileInspector';
import { ChangeStamper } from './workspace/ChangeStamper';
import { GitPublisher, CommitOutcome } from './git/GitPublisher';
import { GitCommandRunner } from './git/GitCommandRunner';

export interface WorkflowEnvironment {
  geminiApiKey?: string;
  pat?: string;
  workingDirectory: string;
  now?: () => Date;
  createClassifier?: (execConf: ExecConf) => ReviewClassifier;
  createPublisher?: (execConf: ExecConf) => GitPublisher;
}

export interface WorkflowResult {
  reports: SheetReport[];
  inspection: FileInspection;
  stampLine: string;
  commit: CommitOutcome;
}

/**
 * One entry point per workflow step, so the CI job and the `run` command share the same code.
 */
export class SentimentWorkflow {
  private execConf: ExecConf;
  private environment: WorkflowEnvironment;

  constructor(execConf: ExecConf, environment: WorkflowEnvironment) {
    this.execConf = execConf;
    this.environment = environment;
  }

  private resolve(filePath: string): string {
    return path.resolve(this.environment.workingDirectory, filePath);
  }

  async analyze(): Promise<SheetReport[]> {
    const classifier = this.environment.createClassifier
      ? this.environment.createClassifier(this.execConf)
      : GeminiSentimentClassifier.fromApiKey(this.environment.geminiApiKey, this.execConf.appConfiguration);

    const appConfiguration = {
      ...this.execConf.appConfiguration,
      workbookPath: this.resolve(this.execConf.appConfiguration.workbookPath),
    };
    return SentimentProcessor.processWorkbookFile(appConfiguration, classifier);
  }

  inspect(): FileInspection {
    return FileInspector.inspect(this.environment.workingDirectory, this.execConf.appConfiguration.workbookPath);
  }

  stamp(): string {
    const now = this.environment.now ? this.environment.now() : new Date();
    return ChangeStamper.appendTimestamp(this.resolve(this.execConf.stampFile), now);
  }

  async publish(): Promise<CommitOutcome> {
    const publisher = this.environment.createPublisher
      ? this.environment.createPublisher(this.execConf)
      : new GitPublisher(
          this.execConf.git,
          this.environment.pat,
          new GitCommandRunner(this.environment.workingDirectory, this.environment.pat ? [this.environment.pat] : []).run
        );

    const files = Array.from(new Set([this.execConf.appConfiguration.workbookPath, this.execConf.stampFile]));
    return publisher.publish(files);
  }

  async run(): Promise<WorkflowResult> {
    const reports = await this.analyze();
    const inspection = this.inspect();
    const stampLine = this.stamp();
    const commit = await this.publish();
    return { reports, inspection, stampLine, commit };
  }
}
