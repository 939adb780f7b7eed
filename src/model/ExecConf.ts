import { AppConfiguration } from './AppConfiguration';
import { GitConf } from './GitConf';

export class ExecConf {
  appConfiguration: AppConfiguration;
  git: GitConf;
  stampFile: string;

  constructor(appConfiguration: AppConfiguration, git: GitConf, stampFile?: string) {
    this.appConfiguration = appConfiguration;
    this.git = git;
    this.stampFile = stampFile || appConfiguration.workbookPath;
  }
}
