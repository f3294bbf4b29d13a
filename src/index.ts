// src/index.ts

import { ApplicationFunctionOptions, Context, Probot } from 'probot';
import { ReviewGateway, createReviewGateway } from './bootstrap';
import { errorMessage } from './errors';
import { PullRequestClient } from './github/pr-reviewer';

type GitHubClient = Context['octokit'];

// Global startup logic, runs once when Probot loads the app.
let gateway: ReviewGateway;

try {
  gateway = createReviewGateway();
} catch (e) {
  console.error(`🔴 Fatal Error: Could not load configuration: ${errorMessage(e)}`);
  process.exit(1);
}

export function toPullRequestClient(octokit: GitHubClient): PullRequestClient {
  return {
    async listFiles(pr) {
      const { data } = await octokit.pulls.listFiles({
        owner: pr.owner,
        repo: pr.repo,
        pull_number: pr.number,
        per_page: 100,
      });
      return data.map(f => ({
        filename: f.filename,
        status: f.status,
        additions: f.additions,
        deletions: f.deletions,
        changes: f.changes,
        patch: f.patch,
      }));
    },
    async createComment(pr, body) {
      await octokit.issues.createComment({ owner: pr.owner, repo: pr.repo, issue_number: pr.number, body });
    },
    async createReview(pr, review) {
      await octokit.pulls.createReview({
        owner: pr.owner,
        repo: pr.repo,
        pull_number: pr.number,
        commit_id: pr.headSha,
        body: review.body,
        event: review.event,
        comments: review.comments,
      });
    },
  };
}

// Probot application handler, runs on events.
export default (app: Probot, { getRouter }: ApplicationFunctionOptions) => {
  const { logger, reviewer } = gateway;

  if (getRouter) {
    getRouter('/').use(gateway.createRouter());
    logger.info('Review API mounted at POST /review and GET /health');
  } else {
    logger.warn('Probot did not provide a router, review API is not exposed');
  }

  app.on(['pull_request.opened', 'pull_request.reopened', 'pull_request.synchronize'], async context => {
    const pr = context.payload.pull_request;
    const repo = context.payload.repository;
    logger.info(
      { action: context.payload.action, repo: repo.full_name, pr: pr.number, title: pr.title },
      'Pull request event received',
    );

    const client = toPullRequestClient(context.octokit);
    const ref = {
      owner: repo.owner.login,
      repo: repo.name,
      number: pr.number,
      headSha: pr.head.sha,
      author: pr.user?.login,
      branch: pr.head.ref,
    };

    // Review in the background so GitHub gets its 200 OK immediately.
    setImmediate(() => {
      reviewer
        .review(client, ref)
        .then(status => logger.info({ repo: repo.full_name, pr: pr.number, status }, 'Pull request handled'))
        .catch(error => logger.error({ err: error }, 'Unexpected pull request review error'));
    });
  });
};
