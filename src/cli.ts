import { Command } from 'commander';

import { getPackageInfo } from './utils/package-info.js';

const pkg = getPackageInfo();

export const program = new Command()
  .name('handin')
  .description(pkg.description)
  .version(pkg.version);

program
  .command('plan')
  .description('Print the submission plan for a repository')
  .requiredOption('--repo_path <path>', 'Path to the repository')
  .option('-o, --output <file>', 'Also write the structured plan as JSON')
  .option('--save', 'Save a timestamped copy of the plan to the logs directory')
  .action(async (options: { repo_path: string; output?: string; save?: boolean }) => {
    const { planCommand } = await import('./commands/plan.js');
    await planCommand({ repoPath: options.repo_path, output: options.output, save: options.save });
  });

program
  .command('execute')
  .description('Execute a JSON plan and write a result log')
  .requiredOption('--repo_path <path>', 'Path to the repository')
  .requiredOption('--plan_path <file>', 'Path to the JSON plan file')
  .action(async (options: { repo_path: string; plan_path: string }) => {
    const { executeCommand } = await import('./commands/execute.js');
    await executeCommand({ repoPath: options.repo_path, planPath: options.plan_path });
  });

program
  .command('check')
  .description('Check required deliverables and README sections')
  .requiredOption('--repo_path <path>', 'Path to the repository')
  .action(async (options: { repo_path: string }) => {
    const { checkCommand } = await import('./commands/check.js');
    await checkCommand({ repoPath: options.repo_path });
  });

interface StudentFlags {
  repo_path: string;
  name?: string;
  university?: string;
  department?: string;
  repo_url?: string;
}

function withStudentFlags(command: Command): Command {
  return command
    .requiredOption('--repo_path <path>', 'Path to the repository')
    .option('--name <name>', 'Student name (default: $STUDENT_NAME)')
    .option('--university <name>', 'University (default: $UNIVERSITY)')
    .option('--department <name>', 'Department (default: $DEPARTMENT)')
    .option('--repo_url <url>', 'Repository URL (default: the configured remote)');
}

withStudentFlags(program.command('readme').description('Generate README.md'))
  .option('--contact <email>', 'Contact email')
  .option('--how_to_run <text>', 'Custom "How to run" section')
  .action(async (options: StudentFlags & { contact?: string; how_to_run?: string }) => {
    const { readmeCommand } = await import('./commands/documents.js');
    await readmeCommand({
      repoPath: options.repo_path,
      name: options.name,
      university: options.university,
      department: options.department,
      repoUrl: options.repo_url,
      contact: options.contact,
      howToRun: options.how_to_run,
    });
  });

withStudentFlags(program.command('email').description('Generate the submission email draft'))
  .option('--to <emails...>', 'Recipient addresses')
  .option('-o, --output <file>', 'Draft path relative to the repository')
  .action(async (options: StudentFlags & { to?: string[]; output?: string }) => {
    const { emailCommand } = await import('./commands/documents.js');
    await emailCommand({
      repoPath: options.repo_path,
      name: options.name,
      university: options.university,
      department: options.department,
      repoUrl: options.repo_url,
      to: options.to,
      output: options.output,
    });
  });

program
  .command('run')
  .description('Interactively plan and execute a submission')
  .option('--repo_path <path>', 'Path to the repository (default: current directory)')
  .action(async (options: { repo_path?: string }) => {
    const { runCommand } = await import('./commands/run.js');
    await runCommand({ repoPath: options.repo_path });
  });
