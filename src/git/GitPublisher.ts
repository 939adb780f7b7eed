import { GitConf } from '../model/GitConf';
import { GitRunner, maskSecrets } from './GitCommandRunner';

export type CommitOutcome = 'committed' | 'nothing-to-commit';

export class GitPublisher {
  private gitConf: GitConf;
  private token: string;
  private run: GitRunner;

  constructor(gitConf: GitConf, token: string | undefined, run: GitRunner) {
    if (!token) {
      throw new Error('PAT environment variable not set.');
    }
    if (!gitConf.repository) {
      throw new Error('Repository not configured. Set git.repository or GITHUB_REPOSITORY.');
    }
    this.gitConf = gitConf;
    this.token = token;
    this.run = run;
  }

  get remoteUrl(): string {
    return `https://x-access-token:${this.token}@${this.gitConf.host}/${this.gitConf.repository}.git`;
  }

  /**
   * Commits the given files and pushes the branch. A failed commit is treated as nothing to commit.
   */
  async publish(files: string[]): Promise<CommitOutcome> {
    await this.run(['config', 'user.email', this.gitConf.userEmail]);
    await this.run(['config', 'user.name', this.gitConf.userName]);
    await this.run(['add', '--', ...files]);

    let outcome: CommitOutcome = 'committed';
    try {
      await this.run(['commit', '-m', this.gitConf.commitMessage]);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.log(`No changes to commit (${message})`);
      outcome = 'nothing-to-commit';
    }

    const remote = this.remoteUrl;
    console.log(`Pushing ${this.gitConf.branch} to ${maskSecrets(remote, [this.token])}`);
    await this.run(['push', remote, this.gitConf.branch]);
    return outcome;
  }
}
