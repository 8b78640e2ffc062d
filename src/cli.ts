#!/usr/bin/env node

/**
 * issue-desk CLI
 *
 * Browse GitHub issues with private notes, manual status and archive flags
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import path from 'path';
import inquirer from 'inquirer';
import { config as loadEnv } from 'dotenv';
import { AnnotationStore } from './lib/annotation-store';
import { describeChanges, formatChanges, hasChanges } from './lib/change-reporter';
import { ConfigManager } from './lib/config';
import { errorMessage } from './lib/errors';
import { displayName } from './lib/field-mapper';
import { GitHubClient, parseRepoRef } from './lib/github-client';
import { IssueService } from './lib/issue-service';
import { logger } from './lib/logger';
import { projectStatus, sortIssues, StatusCategory } from './lib/status-projection';
import {
  AppConfig,
  IssueRecord,
  IssueStateFilter,
  MANUAL_STATUSES,
  ManualStatus,
  RepoRef,
  SortDirection,
} from './lib/types';

loadEnv({ path: path.join(process.cwd(), '.env.local') });
loadEnv({ path: path.join(process.cwd(), '.env') });

const BADGE_BACKGROUND: Record<StatusCategory, string> = {
  red: '#d73a4a',
  yellow: '#fbca04',
  lightGreen: '#7ee787',
  darkGreen: '#008000',
};

interface Session {
  configManager: ConfigManager;
  config: AppConfig;
  service: IssueService;
}

/**
 * Initialize config, client, store and service
 */
async function initialize(): Promise<Session> {
  const configManager = await ConfigManager.load();
  const config = configManager.config;
  const github = new GitHubClient(config.github);
  const store = new AnnotationStore(config.paths);
  const service = new IssueService(github, store);

  return { configManager, config, service };
}

function fail(error: unknown): never {
  console.error(chalk.red(`\nError: ${errorMessage(error)}`));
  process.exit(1);
}

function requireToken(session: Session): void {
  if (!session.configManager.hasToken()) {
    console.error(chalk.red('Error: No GitHub token configured'));
    console.error(chalk.gray('Either run:'));
    console.error(chalk.gray('  issue-desk config --token <token> --username <login>'));
    console.error(chalk.gray('Or set GITHUB_TOKEN in .env.local'));
    process.exit(1);
  }
}

/**
 * Accept "owner/name", or a bare name owned by the configured user
 */
function resolveRepo(arg: string, config: AppConfig): RepoRef {
  if (arg.includes('/')) {
    return parseRepoRef(arg);
  }
  if (!config.github.username) {
    fail(new Error(`"${arg}" has no owner and no username is configured. Use owner/name.`));
  }
  return parseRepoRef(`${config.github.username}/${arg}`);
}

function parseIssueNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    fail(new Error(`Invalid issue number: ${value}`));
  }
  return parsed;
}

/**
 * Find a cached issue by number, refreshing once when it is not cached yet
 */
async function resolveIssue(session: Session, repo: RepoRef, issueNumber: number): Promise<IssueRecord> {
  const cached = await session.service.findByNumber(repo, issueNumber);
  if (cached) return cached;

  requireToken(session);
  const spinner = ora(`Fetching issues for ${repo.owner}/${repo.name}...`).start();
  try {
    const result = await session.service.refresh(repo);
    spinner.stop();
    const issue = result.issues.find((candidate) => candidate.number === issueNumber);
    if (!issue) {
      fail(new Error(`Issue #${issueNumber} not found in ${repo.owner}/${repo.name}`));
    }
    return issue;
  } catch (error) {
    spinner.fail('Fetch failed');
    fail(error);
  }
}

/**
 * Warn when a change went through but the cache could not be written
 */
function reportSaveError(saveError: Error | undefined): boolean {
  if (saveError) {
    logger.warn(`Change not saved to the local cache: ${saveError.message}`);
    return true;
  }
  return false;
}

function badge(issue: IssueRecord): string {
  const { category, textColor } = projectStatus(issue);
  return chalk.bgHex(BADGE_BACKGROUND[category])[textColor](` ${category.padEnd(10)} `);
}

function formatIssueLine(issue: IssueRecord): string {
  const parts = [badge(issue), chalk.bold(`#${issue.number}`), issue.title];

  if (issue.labels.length > 0) {
    parts.push(chalk.cyan(`[${issue.labels.map((label) => label.name).join(', ')}]`));
  }
  parts.push(chalk.gray(`💬 ${issue.comments}`));
  if (issue.privateNotes) {
    parts.push(chalk.magenta('📝'));
  }
  if (issue.isArchived) {
    parts.push(chalk.gray('(archived)'));
  }

  return parts.join(' ');
}

function printIssues(issues: IssueRecord[], order: SortDirection): void {
  if (issues.length === 0) {
    console.log(chalk.gray('No issues'));
    return;
  }

  for (const issue of sortIssues(issues, order)) {
    console.log(formatIssueLine(issue));
  }
}

function printIssueDetail(issue: IssueRecord): void {
  console.log(chalk.bold('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  console.log(`${badge(issue)} ${chalk.bold.cyan(`#${issue.number} ${issue.title}`)}`);
  console.log(chalk.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n'));

  console.log(chalk.gray(`State:   ${issue.state}`));
  console.log(chalk.gray(`Author:  ${issue.author.login}`));
  console.log(chalk.gray(`Created: ${new Date(issue.createdAt).toLocaleString()}`));
  console.log(chalk.gray(`Updated: ${new Date(issue.updatedAt).toLocaleString()}`));
  if (issue.closedAt) {
    console.log(chalk.gray(`Closed:  ${new Date(issue.closedAt).toLocaleString()}`));
  }
  console.log(chalk.gray(`URL:     ${issue.htmlUrl}`));
  console.log(chalk.gray(`Status:  ${issue.manualStatus === 'none' ? 'automatic' : issue.manualStatus}`));
  console.log();

  console.log(issue.body?.trim() || chalk.gray('(no description)'));
  console.log();

  if (issue.privateNotes) {
    console.log(chalk.bold.magenta('Private notes:'));
    console.log(issue.privateNotes);
    console.log();
  }
}

function parseManualStatus(value: string): ManualStatus {
  const status = MANUAL_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    fail(new Error(`Invalid status "${value}". Expected one of: ${MANUAL_STATUSES.join(', ')}`));
  }
  return status;
}

function parseStateFilter(value: string): IssueStateFilter {
  if (value === 'open' || value === 'closed' || value === 'all') {
    return value;
  }
  fail(new Error(`Invalid state "${value}". Expected open, closed or all`));
}

function parseOrder(value: string): SortDirection {
  if (value === 'asc' || value === 'desc') {
    return value;
  }
  fail(new Error(`Invalid order "${value}". Expected asc or desc`));
}

// Create CLI
const program = new Command();

program
  .name('issue-desk')
  .description('Browse GitHub issues with private notes and manual status')
  .version('1.0.0')
  .option('--verbose', 'Print debug output')
  .hook('preAction', (command) => {
    if (command.opts().verbose) {
      logger.setVerbose(true);
    }
  });

// Repositories
program
  .command('repos')
  .description('List repositories for the configured user')
  .option('--cached', 'Show the cached list without fetching')
  .action(async (options: { cached?: boolean }) => {
    const session = await initialize();
    const cached = await session.service.seedRepositories();

    let repos = cached;
    if (!options.cached) {
      requireToken(session);
      const spinner = ora('Fetching repositories...').start();
      try {
        const result = await session.service.listRepositories(session.config.github.username);
        repos = result.repositories;
        spinner.succeed(`Fetched ${repos.length} repositories`);
        reportSaveError(result.saveError);
      } catch (error) {
        spinner.fail('Fetch failed');
        fail(error);
      }
    }

    if (repos.length === 0) {
      console.log(chalk.gray('No repositories'));
      return;
    }

    for (const repo of repos) {
      const flags = [repo.isPrivate ? '🔒' : '', repo.isFork ? 'fork' : '', repo.isArchived ? 'archived' : '']
        .filter(Boolean)
        .join(' ');
      console.log(
        `${chalk.bold(displayName(repo))} ${chalk.gray(repo.fullName)} ` +
          chalk.yellow(`★ ${repo.stargazersCount}`) +
          ' ' +
          chalk.red(`● ${repo.openIssuesCount}`) +
          (flags ? ' ' + chalk.gray(flags) : '')
      );
      if (repo.description) {
        console.log(chalk.gray(`  ${repo.description}`));
      }
    }
  });

// Issues list
program
  .command('issues <repo>')
  .description('List issues, merged with private annotations')
  .option('--state <state>', 'Issue state to fetch (open|closed|all)', 'all')
  .option('--order <order>', 'Creation-time order within a status (asc|desc)', 'desc')
  .option('--cached', 'Show the cached list without fetching')
  .action(async (repoArg: string, options: { state: string; order: string; cached?: boolean }) => {
    const session = await initialize();
    const repo = resolveRepo(repoArg, session.config);
    const state = parseStateFilter(options.state);
    const order = parseOrder(options.order);

    const before = await session.service.seed(repo);

    if (options.cached) {
      printIssues(before, order);
      return;
    }

    requireToken(session);
    const spinner = ora(`Fetching issues for ${repo.owner}/${repo.name}...`).start();

    try {
      const result = await session.service.refresh(repo, state);
      spinner.succeed(`Fetched ${result.issues.length} issue(s)`);

      if (result.saveError) {
        logger.warn(`Cache not saved: ${result.saveError.message}`);
      }

      const summary = describeChanges(before, result.issues);
      if (before.length > 0 && hasChanges(summary)) {
        console.log(chalk.bold('\nChanges since last refresh:'));
        formatChanges(summary).forEach((line) => console.log(line));
      }

      console.log();
      printIssues(result.issues, order);
    } catch (error) {
      spinner.fail('Fetch failed');
      if (before.length > 0) {
        console.log(chalk.gray('\nShowing cached issues:'));
        printIssues(before, order);
      }
      fail(error);
    }
  });

// Issue detail
program
  .command('show <repo> <number>')
  .description('Show one issue with its private notes')
  .action(async (repoArg: string, numberArg: string) => {
    const session = await initialize();
    const repo = resolveRepo(repoArg, session.config);
    const issue = await resolveIssue(session, repo, parseIssueNumber(numberArg));
    printIssueDetail(issue);
  });

// Private notes
program
  .command('note <repo> <number> [text...]')
  .description('Set private notes on an issue (local only)')
  .option('--clear', 'Remove the notes')
  .action(async (repoArg: string, numberArg: string, text: string[], options: { clear?: boolean }) => {
    const session = await initialize();
    const repo = resolveRepo(repoArg, session.config);
    const issue = await resolveIssue(session, repo, parseIssueNumber(numberArg));

    let notes: string | null = options.clear ? null : text.join(' ');
    if (!options.clear && !notes) {
      const answer = await inquirer.prompt<{ notes: string }>([
        { type: 'editor', name: 'notes', message: `Private notes for #${issue.number}`, default: issue.privateNotes ?? '' },
      ]);
      notes = answer.notes;
    }

    try {
      const { issue: updated, saveError } = await session.service.setNote(repo, issue.id, notes);
      if (!reportSaveError(saveError)) {
        logger.success(updated.privateNotes ? `Notes saved on #${updated.number}` : `Notes cleared on #${updated.number}`);
      }
    } catch (error) {
      fail(error);
    }
  });

// Manual status
program
  .command('status <repo> <number> <status>')
  .description(`Set manual status (${MANUAL_STATUSES.join('|')}); may close or reopen the issue`)
  .action(async (repoArg: string, numberArg: string, statusArg: string) => {
    const session = await initialize();
    const repo = resolveRepo(repoArg, session.config);
    const status = parseManualStatus(statusArg);
    const issue = await resolveIssue(session, repo, parseIssueNumber(numberArg));

    requireToken(session);
    const spinner = ora(`Setting #${issue.number} to ${status}...`).start();

    try {
      const result = await session.service.setManualStatus(repo, issue.id, status);
      // The service has already logged remote and refresh failures
      if (result.saveError) {
        spinner.warn(`#${issue.number} is ${status} for now, but the cache was not saved`);
        reportSaveError(result.saveError);
      } else if (result.refreshError) {
        spinner.warn(`#${issue.number} is now ${status}; status saved, refresh failed`);
      } else if (result.remoteError) {
        spinner.warn(`#${issue.number} is now ${status} locally; GitHub was not updated`);
      } else {
        spinner.succeed(`#${issue.number} is now ${status}`);
      }

      const updated = result.issues.find((candidate) => candidate.id === issue.id);
      if (updated) {
        console.log(formatIssueLine(updated));
      }
    } catch (error) {
      spinner.fail('Status change failed');
      fail(error);
    }
  });

// Archive flag
program
  .command('archive <repo> <number>')
  .description('Archive an issue locally')
  .option('--undo', 'Unarchive')
  .action(async (repoArg: string, numberArg: string, options: { undo?: boolean }) => {
    const session = await initialize();
    const repo = resolveRepo(repoArg, session.config);
    const issue = await resolveIssue(session, repo, parseIssueNumber(numberArg));

    try {
      const { issue: updated, saveError } = await session.service.setArchived(repo, issue.id, !options.undo);
      reportSaveError(saveError);
      console.log(formatIssueLine(updated));
    } catch (error) {
      fail(error);
    }
  });

for (const [name, open] of [
  ['close', false],
  ['reopen', true],
] as const) {
  program
    .command(`${name} <repo> <number>`)
    .description(`${open ? 'Reopen' : 'Close'} an issue on GitHub`)
    .action(async (repoArg: string, numberArg: string) => {
      const session = await initialize();
      requireToken(session);
      const repo = resolveRepo(repoArg, session.config);
      const issue = await resolveIssue(session, repo, parseIssueNumber(numberArg));

      const spinner = ora(`${open ? 'Reopening' : 'Closing'} #${issue.number}...`).start();
      try {
        const { issue: updated, saveError } = await session.service.setOpenState(repo, issue.id, open);
        spinner.succeed(`#${updated.number} is ${updated.state}`);
        reportSaveError(saveError);
        console.log(formatIssueLine(updated));
      } catch (error) {
        spinner.fail(`${open ? 'Reopen' : 'Close'} failed`);
        fail(error);
      }
    });
}

// Create issue
program
  .command('create <repo>')
  .description('Create a new issue')
  .option('--title <title>', 'Issue title')
  .option('--body <body>', 'Issue body')
  .action(async (repoArg: string, options: { title?: string; body?: string }) => {
    const session = await initialize();
    requireToken(session);
    const repo = resolveRepo(repoArg, session.config);

    let { title, body } = options;
    if (!title) {
      const answers = await inquirer.prompt<{ title: string; body: string }>([
        {
          type: 'input',
          name: 'title',
          message: 'Title:',
          validate: (value: string) => (value.trim() ? true : 'Title is required'),
        },
        { type: 'input', name: 'body', message: 'Body (optional):' },
      ]);
      title = answers.title;
      body = body ?? (answers.body || undefined);
    }

    const spinner = ora('Creating issue...').start();
    try {
      const { issue: created, saveError } = await session.service.createIssue(repo, title, body);
      spinner.succeed(`Created #${created.number}`);
      reportSaveError(saveError);
      console.log(chalk.gray(created.htmlUrl));
    } catch (error) {
      spinner.fail('Issue creation failed');
      fail(error);
    }
  });

// Edit issue
program
  .command('edit <repo> <number>')
  .description('Update the title and/or body of an issue')
  .option('--title <title>', 'New title')
  .option('--body <body>', 'New body')
  .action(async (repoArg: string, numberArg: string, options: { title?: string; body?: string }) => {
    if (options.title === undefined && options.body === undefined) {
      fail(new Error('Nothing to change: pass --title and/or --body'));
    }

    const session = await initialize();
    requireToken(session);
    const repo = resolveRepo(repoArg, session.config);
    const issue = await resolveIssue(session, repo, parseIssueNumber(numberArg));

    const spinner = ora(`Updating #${issue.number}...`).start();
    try {
      const { issue: updated, saveError } = await session.service.editIssue(repo, issue.id, options);
      spinner.succeed(`Updated #${updated.number}`);
      reportSaveError(saveError);
      console.log(formatIssueLine(updated));
    } catch (error) {
      spinner.fail('Update failed');
      fail(error);
    }
  });

// Comments
program
  .command('comments <repo> <number>')
  .description('List comments on an issue')
  .action(async (repoArg: string, numberArg: string) => {
    const session = await initialize();
    requireToken(session);
    const repo = resolveRepo(repoArg, session.config);
    const issueNumber = parseIssueNumber(numberArg);

    const spinner = ora(`Fetching comments on #${issueNumber}...`).start();
    try {
      const comments = await session.service.listComments(repo, issueNumber);
      spinner.stop();

      if (comments.length === 0) {
        console.log(chalk.gray('No comments'));
        return;
      }

      for (const comment of comments) {
        console.log(chalk.bold(comment.author.login) + chalk.gray(` · ${new Date(comment.createdAt).toLocaleString()}`));
        console.log(comment.body);
        console.log();
      }
    } catch (error) {
      spinner.fail('Fetch failed');
      fail(error);
    }
  });

program
  .command('comment <repo> <number> <body...>')
  .description('Add a comment to an issue')
  .action(async (repoArg: string, numberArg: string, bodyParts: string[]) => {
    const session = await initialize();
    requireToken(session);
    const repo = resolveRepo(repoArg, session.config);
    const issueNumber = parseIssueNumber(numberArg);

    const spinner = ora(`Commenting on #${issueNumber}...`).start();
    try {
      const { saveError } = await session.service.addComment(repo, issueNumber, bodyParts.join(' '));
      spinner.succeed(`Comment added to #${issueNumber}`);
      reportSaveError(saveError);
    } catch (error) {
      spinner.fail('Comment failed');
      fail(error);
    }
  });

// Configuration
program
  .command('config')
  .description('Show or update configuration')
  .option('--token <token>', 'GitHub token')
  .option('--username <login>', 'GitHub username')
  .option('--data-dir <path>', 'Directory for cached data')
  .action(async (options: { token?: string; username?: string; dataDir?: string }) => {
    const session = await initialize();
    const { configManager } = session;

    try {
      if (options.token !== undefined) {
        await configManager.setToken(options.token, options.username);

        if (options.token) {
          const spinner = ora('Checking token...').start();
          const github = new GitHubClient({ ...configManager.config.github, token: options.token });
          if (await github.verifyAccess()) {
            spinner.succeed('Token accepted by GitHub');
          } else {
            spinner.warn('GitHub rejected the token or could not be reached; it was saved anyway');
          }
        }
      } else if (options.username !== undefined) {
        await configManager.setUsername(options.username);
      }
      if (options.dataDir !== undefined) {
        await configManager.setDataDirectory(options.dataDir);
      }
    } catch (error) {
      fail(error);
    }

    const current = configManager.config;
    const token = current.github.token;
    console.log(chalk.bold('Config file:    ') + configManager.configFilePath);
    console.log(chalk.bold('Username:       ') + (current.github.username || chalk.gray('(not set)')));
    console.log(chalk.bold('Token:          ') + (token ? `${token.slice(0, 4)}…` : chalk.gray('(not set)')));
    console.log(chalk.bold('Data directory: ') + current.paths.dataDirectory);
    console.log(chalk.bold('Theme:          ') + current.settings.theme);
    console.log(chalk.bold('Refresh (s):    ') + current.settings.refreshInterval);
  });

// Parse and execute
program.parseAsync().catch(fail);
