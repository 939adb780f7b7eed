// src/Index.ts
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { ExecConf } from './model/ExecConf';
import { ExecConfReader } from './reader/ExecConfReader';
import { SentimentWorkflow } from './SentimentWorkflow';
import { SheetReport } from './model/SheetReport';

interface GlobalOptions {
  confFile?: string;
  excelFile?: string;
}

function loadWorkflow(program: Command): SentimentWorkflow {
  const options = program.opts<GlobalOptions>();
  const execConf: ExecConf = ExecConfReader.readConfFile(options.confFile);

  if (options.excelFile) {
    // The stamp follows the workbook unless the configuration points it elsewhere
    if (execConf.stampFile === execConf.appConfiguration.workbookPath) {
      execConf.stampFile = options.excelFile;
    }
    execConf.appConfiguration.workbookPath = options.excelFile;
  }

  return new SentimentWorkflow(execConf, {
    geminiApiKey: process.env.GEMINI_API_KEY,
    pat: process.env.PAT,
    workingDirectory: process.cwd(),
  });
}

function printReports(reports: SheetReport[]): void {
  for (const report of reports) {
    const labels = report.labels;
    console.log(
      `${report.name}: ${report.status} (positive ${labels.Positive}, negative ${labels.Negative}, neutral ${labels.Neutral}, errors ${labels.Error}, empty ${report.emptyReviews})`
    );
  }
}

async function main() {
  // Load environment variables from .env file
  dotenv.config();

  const program = new Command();
  program
    .name('review-sentiment')
    .description('Labels spreadsheet reviews with Gemini and publishes the workbook back to git')
    .option('-c, --confFile <path>', 'Path to the YAML configuration file')
    .option('-e, --excelFile <path>', 'Path to the Excel file (overrides the configuration)');

  program
    .command('analyze')
    .description('Add a sentiment column to every sheet that has reviews')
    .action(async () => {
      printReports(await loadWorkflow(program).analyze());
    });

  program
    .command('inspect')
    .description('List the working directory and report on the workbook')
    .action(() => {
      loadWorkflow(program).inspect();
    });

  program
    .command('stamp')
    .description('Append an "Updated on" line to the stamp file')
    .action(() => {
      loadWorkflow(program).stamp();
    });

  program
    .command('publish')
    .description('Commit the workbook and push it with the PAT token')
    .action(async () => {
      await loadWorkflow(program).publish();
    });

  program
    .command('run')
    .description('Analyze, inspect, stamp and publish in one go')
    .action(async () => {
      const result = await loadWorkflow(program).run();
      printReports(result.reports);
      console.log('All steps completed successfully.');
    });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error('Failed to run sentiment job:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

void main();
