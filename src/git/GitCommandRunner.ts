import { execFile } from 'child_process';

export interface GitResult {
  stdout: string;
  stderr: string;
}

export type GitRunner = (args: string[]) => Promise<GitResult>;

/**
 * Hides credentials embedded in remote URLs before text reaches a log or an error.
 */
export function maskSecrets(text: string, secrets: string[]): string {
  return secrets
    .filter(secret => secret.length > 0)
    .reduce((masked, secret) => masked.split(secret).join('***'), text);
}

export class GitCommandRunner {
  private cwd: string;
  private secrets: string[];

  constructor(cwd: string = process.cwd(), secrets: string[] = []) {
    this.cwd = cwd;
    this.secrets = secrets;
  }

  run: GitRunner = args =>
    new Promise((resolve, reject) => {
      execFile('git', args, { cwd: this.cwd }, (error, stdout, stderr) => {
        if (error) {
          const command = maskSecrets(`git ${args.join(' ')}`, this.secrets);
          const detail = maskSecrets((stderr || error.message).trim(), this.secrets);
          return reject(new Error(`Command "${command}" failed: ${detail}`));
        }
        resolve({ stdout, stderr });
      });
    });
}
