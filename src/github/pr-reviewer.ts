// src/github/pr-reviewer.ts

import { Finding, ReviewResult } from '../agents/review-engine-types';
import { errorMessage } from '../errors';
import { Logger } from '../logger';
import { formatReviewMarkdown } from '../report/markdown-report';
import { ReviewService } from '../service/review-service';

export const MAX_FILE_CHANGES = 800;
export const MAX_FILES = 15;

export interface PullRequestRef {
  owner: string;
  repo: string;
  number: number;
  headSha: string;
  author?: string;
  branch?: string;
}

export interface PullRequestFile {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
  changes: number;
  patch?: string;
}

export interface InlineComment {
  path: string;
  line: number;
  side: 'RIGHT';
  body: string;
}

export type ReviewEvent = 'COMMENT' | 'REQUEST_CHANGES';

/** The slice of the GitHub API the reviewer needs. */
export interface PullRequestClient {
  listFiles(pr: PullRequestRef): Promise<PullRequestFile[]>;
  createComment(pr: PullRequestRef, body: string): Promise<void>;
  createReview(pr: PullRequestRef, review: { body: string; event: ReviewEvent; comments: InlineComment[] }): Promise<void>;
}

export interface FilterStats {
  total: number;
  reviewed: number;
  ignored: number;
  tooLarge: number;
  noPatch: number;
}

export type PullRequestReviewStatus = 'reviewed' | 'skipped' | 'busy' | 'failed';

export function isLineInHunk(patch: string, line: number): boolean {
  const hunkRegex = /^@@ -\d+(?:,\d+)? \+(\d+)(?:,(\d+))? @@/gm;
  let match: RegExpExecArray | null;

  while ((match = hunkRegex.exec(patch)) !== null) {
    const startLine = parseInt(match[1], 10);
    const numLines = match[2] === undefined ? 1 : parseInt(match[2], 10);
    if (line >= startLine && line < startLine + numLines) {
      return true;
    }
  }
  return false;
}

export function buildUnifiedDiff(files: readonly PullRequestFile[]): string {
  return files
    .map(f => `diff --git a/${f.filename} b/${f.filename}\n--- a/${f.filename}\n+++ b/${f.filename}\n${f.patch ?? ''}`)
    .join('\n');
}

export function filterFiles(
  files: readonly PullRequestFile[],
  ignorePatterns: readonly RegExp[],
): { files: PullRequestFile[]; stats: FilterStats } {
  const stats: FilterStats = { total: files.length, reviewed: 0, ignored: 0, tooLarge: 0, noPatch: 0 };

  const filtered = files.filter(f => {
    if (ignorePatterns.some(pattern => pattern.test(f.filename))) {
      stats.ignored++;
      return false;
    }
    if (f.changes >= MAX_FILE_CHANGES) {
      stats.tooLarge++;
      return false;
    }
    if (!f.patch) {
      stats.noPatch++;
      return false;
    }
    return true;
  });

  const result = filtered.slice(0, MAX_FILES);
  stats.reviewed = result.length;
  return { files: result, stats };
}

function coverageLine(stats: FilterStats): string | undefined {
  const skipped: string[] = [];
  if (stats.ignored > 0) skipped.push(`${stats.ignored} ignored`);
  if (stats.tooLarge > 0) skipped.push(`${stats.tooLarge} too large`);
  if (stats.noPatch > 0) skipped.push(`${stats.noPatch} without diff`);
  if (stats.reviewed + stats.ignored + stats.tooLarge + stats.noPatch < stats.total) {
    skipped.push(`${stats.total - stats.reviewed - stats.ignored - stats.tooLarge - stats.noPatch} over the file limit`);
  }
  if (skipped.length === 0) return undefined;
  return `📊 **Coverage:** Reviewed ${stats.reviewed} of ${stats.total} files (${skipped.join(', ')})`;
}

function inlineCommentBody(finding: Finding): string {
  const suggestion = finding.suggestion ?? 'Review and address this issue.';
  return `**[${finding.severity.toUpperCase()} - ${finding.category.toUpperCase()}]** ${finding.message}\n\n💡 *Suggestion*: ${suggestion}`;
}

export function buildInlineComments(findings: readonly Finding[], files: readonly PullRequestFile[]): InlineComment[] {
  const patches = new Map(files.map(f => [f.filename, f.patch ?? '']));
  const comments: InlineComment[] = [];

  for (const finding of findings) {
    if (!finding.file || finding.line === undefined) continue;
    const patch = patches.get(finding.file);
    if (!patch || !isLineInHunk(patch, finding.line)) continue;
    comments.push({ path: finding.file, line: finding.line, side: 'RIGHT', body: inlineCommentBody(finding) });
  }
  return comments;
}

export function reviewEvent(result: ReviewResult): ReviewEvent {
  return result.findings.some(f => f.severity === 'high' || f.severity === 'critical') ? 'REQUEST_CHANGES' : 'COMMENT';
}

/**
 * Reviews a pull request through the review pipeline and posts the outcome
 * back, as a review with inline comments when any finding lands on a changed
 * line, otherwise as a plain comment.
 */
export class PullRequestReviewer {
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly service: Pick<ReviewService, 'execute'>,
    private readonly ignorePatterns: readonly RegExp[],
    private readonly logger: Logger,
  ) {}

  async review(client: PullRequestClient, pr: PullRequestRef): Promise<PullRequestReviewStatus> {
    const prKey = `${pr.owner}/${pr.repo}#${pr.number}`;
    if (this.inFlight.has(prKey)) {
      this.logger.info({ pr: prKey }, 'Review already in progress, ignoring duplicate event');
      return 'busy';
    }

    this.inFlight.add(prKey);
    try {
      return await this.reviewOnce(client, pr, prKey);
    } finally {
      this.inFlight.delete(prKey);
    }
  }

  private async reviewOnce(client: PullRequestClient, pr: PullRequestRef, prKey: string): Promise<PullRequestReviewStatus> {
    const log = this.logger.child({ pr: prKey });

    try {
      const { files, stats } = filterFiles(await client.listFiles(pr), this.ignorePatterns);
      log.info({ ...stats }, 'Filtered pull request files');
      if (files.length === 0) {
        log.info('No reviewable files found');
        return 'skipped';
      }

      const result = await this.service.execute({
        diff: buildUnifiedDiff(files),
        context: {
          repo: `${pr.owner}/${pr.repo}`,
          pr_number: pr.number,
          commit_sha: pr.headSha,
          author: pr.author ?? null,
          branch: pr.branch ?? null,
        },
      });

      const coverage = coverageLine(stats);
      const body = coverage ? `${coverage}\n\n${formatReviewMarkdown(result)}` : formatReviewMarkdown(result);
      const comments = buildInlineComments(result.findings, files);

      if (comments.length === 0) {
        log.info({ findings: result.findings.length }, 'Posting review as an issue comment');
        await client.createComment(pr, body);
      } else {
        const event = reviewEvent(result);
        log.info({ findings: result.findings.length, comments: comments.length, event }, 'Posting pull request review');
        await client.createReview(pr, { body, event, comments });
      }
      return 'reviewed';
    } catch (error) {
      log.error({ err: error }, 'Pull request review failed');
      try {
        await client.createComment(
          pr,
          `🤖 **AI Code Review Error**\n\n⚠️ Failed to review PR: **${errorMessage(error).substring(0, 500)}**\n\nPlease check the application logs for details.`,
        );
      } catch (commentError) {
        log.error({ err: commentError }, 'Failed to post error comment');
      }
      return 'failed';
    }
  }
}
