// src/model/GitConf.ts
export class GitConf {
  userName: string;
  userEmail: string;
  commitMessage: string;
  host: string;
  repository?: string;
  branch: string;

  constructor(
    userName: string,
    userEmail: string,
    commitMessage: string,
    host: string,
    branch: string,
    repository?: string
  ) {
    this.userName = userName;
    this.userEmail = userEmail;
    this.commitMessage = commitMessage;
    this.host = host;
    this.branch = branch;
    this.repository = repository;
  }
}
