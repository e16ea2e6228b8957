import type { DetasklisterConfig } from './config.js';
import type { IssueClient } from './github/client.js';
import type { Reporter } from './io.js';
import { renderUnifiedDiff } from './tasklist/diff.js';
import type { DecisionPrompt } from './tasklist/session.js';
import { runEditSession } from './tasklist/session.js';

/**
 * Run orchestration: resolve the issues to process, then edit them one at a
 * time, strictly in order.
 *
 * An issue is fully decided and written before the next one is fetched. A
 * `QuitRequestedError` from the edit session propagates out of the loop, so
 * the current issue is not written and later issues are not touched.
 */
export interface IssueReport {
  /** Issue reference as given (number or URL). */
  issue: string;
  url: string;
  blocks: number;
  accepted: number;
  rejected: number;
  changed: boolean;
  /** True if the new body was written to GitHub. */
  updated: boolean;
  /** Unified diff of the body change (empty when unchanged). */
  diff: string;
}

export interface RunSummary {
  reports: IssueReport[];
  updated: number;
  unchanged: number;
  /** Changed issues that were only shown because of `--dry-run`. */
  skippedByDryRun: number;
}

export interface RunDeps {
  client: IssueClient;
  reporter: Reporter;
  /** Required when `config.interactive` is set. */
  prompt?: DecisionPrompt;
}

export type ProcessIssueOptions = Pick<DetasklisterConfig, 'interactive' | 'dryRun' | 'contextLines' | 'color'>;

/**
 * Fetch, edit, and (unless dry run) write back a single issue.
 */
export async function processIssue(
  issue: string,
  options: ProcessIssueOptions,
  deps: RunDeps
): Promise<IssueReport> {
  const { client, reporter } = deps;
  const { url, body } = await client.viewIssue(issue);

  const outcome = await runEditSession(body, {
    mode: options.interactive ? 'interactive' : 'auto-accept',
    contextLines: options.contextLines,
    prompt: deps.prompt,
    label: issue,
  });

  const report: IssueReport = {
    issue,
    url,
    blocks: outcome.blocks,
    accepted: outcome.accepted,
    rejected: outcome.rejected,
    changed: outcome.changed,
    updated: false,
    diff: '',
  };

  if (!outcome.changed) {
    reporter.info(`No changes to make for ${issue}`);
    return report;
  }

  report.diff = renderUnifiedDiff(outcome.oldBody, outcome.newBody, {
    oldLabel: `${issue} (current)`,
    newLabel: `${issue} (updated)`,
  });

  if (options.dryRun) {
    reporter.info(`>>> ${client.editCommand?.(issue) ?? `update body of ${issue}`}`);
    reporter.raw(
      options.color
        ? renderUnifiedDiff(outcome.oldBody, outcome.newBody, {
            oldLabel: `${issue} (current)`,
            newLabel: `${issue} (updated)`,
            color: true,
          })
        : report.diff
    );
    return report;
  }

  reporter.info(`Updating ${issue}...`);
  await client.editIssueBody(issue, outcome.newBody);
  reporter.info(`Updated ${issue}`);
  report.updated = true;
  return report;
}

/**
 * Process every issue selected by `config`.
 *
 * With `allIssues`, the issue list comes from `client.listIssues()`;
 * otherwise the positional issues are used in the order given.
 */
export async function runDetasklist(config: DetasklisterConfig, deps: RunDeps): Promise<RunSummary> {
  if (config.interactive && !deps.prompt) {
    throw new Error('Interactive mode requires a decision prompt');
  }

  const issues = config.allIssues ? await deps.client.listIssues(config.issueState) : config.issues;
  if (config.allIssues) {
    deps.reporter.verbose(`Found ${issues.length} ${config.issueState === 'all' ? '' : `${config.issueState} `}issues`);
  }

  const summary: RunSummary = { reports: [], updated: 0, unchanged: 0, skippedByDryRun: 0 };
  for (const issue of issues) {
    const report = await processIssue(issue, config, deps);
    summary.reports.push(report);
    if (!report.changed) summary.unchanged += 1;
    else if (report.updated) summary.updated += 1;
    else summary.skippedByDryRun += 1;
  }
  return summary;
}
