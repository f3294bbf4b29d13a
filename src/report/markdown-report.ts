// src/report/markdown-report.ts

import { Finding, FindingCategory, FindingSeverity, ReviewResult } from '../agents/review-engine-types';

const CATEGORY_ICONS: Record<FindingCategory, string> = {
  security: '🔒',
  performance: '⚡',
  quality: '🧹',
  style: '💅',
  architecture: '🏛️',
  logic: '🧠',
  maintainability: '🔧',
  documentation: '📝',
};

const SEVERITY_HEADINGS: Record<FindingSeverity, string> = {
  critical: '🔴 Critical Issues',
  high: '🟠 High Severity Issues',
  medium: '🟡 Medium Severity Issues',
  low: '🟢 Low Severity Issues',
};

function titleCase(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export function scoreEmoji(score: number): string {
  if (score >= 8) return '🟢';
  if (score >= 6) return '🟡';
  if (score >= 4) return '🟠';
  return '🔴';
}

export function formatLocation(finding: Finding): string {
  const file = finding.file ?? 'unknown';
  return finding.line ? `\`${file}:${finding.line}\`` : `\`${file}\``;
}

function formatFindingDetails(finding: Finding): string[] {
  const lines = [
    `**${CATEGORY_ICONS[finding.category]} ${titleCase(finding.category)}** · ${formatLocation(finding)}`,
    '',
    `**Issue:** ${finding.message}`,
    '',
  ];
  if (finding.suggestion) {
    lines.push(`**💡 Suggestion:** ${finding.suggestion}`, '');
  }
  return lines;
}

function formatOpenGroup(severity: FindingSeverity, findings: Finding[]): string[] {
  const lines = ['---', '', `## ${SEVERITY_HEADINGS[severity]}`, ''];
  findings.forEach((finding, index) => {
    lines.push(
      '<details open>',
      `<summary><b>#${index + 1} · ${titleCase(finding.category)}</b> in <code>${finding.file ?? 'unknown'}</code></summary>`,
      '',
      ...formatFindingDetails(finding),
      '</details>',
      '',
    );
  });
  return lines;
}

function formatCollapsedGroup(severity: FindingSeverity, findings: Finding[]): string[] {
  const lines = ['---', '', '<details>', `<summary><h2>${SEVERITY_HEADINGS[severity]} (${findings.length})</h2></summary>`, ''];
  findings.forEach((finding, index) => {
    lines.push(`### #${index + 1} · ${titleCase(finding.category)}`, '', ...formatFindingDetails(finding));
    if (index < findings.length - 1) {
      lines.push('---', '');
    }
  });
  lines.push('</details>', '');
  return lines;
}

/**
 * Renders a review as a GitHub comment: critical and high findings are
 * expanded, medium and low collapsed.
 */
export function formatReviewMarkdown(result: ReviewResult): string {
  const bySeverity = (severity: FindingSeverity) => result.findings.filter(f => f.severity === severity);
  const critical = bySeverity('critical');
  const high = bySeverity('high');
  const medium = bySeverity('medium');
  const low = bySeverity('low');

  const md: string[] = ['# 🤖 AI Code Review Report', ''];

  if (critical.length > 0) {
    md.push(
      '> [!WARNING]',
      '> ### ⚠️ Critical Issues Detected',
      '>',
      `> Found **${critical.length} critical** issue(s) that require immediate attention!`,
      '> Please address these before merging.',
      '',
    );
  }

  md.push(
    '## 📊 Review Summary',
    '',
    '| Metric | Value |',
    '|--------|-------|',
    `| **Quality Score** | ${scoreEmoji(result.score)} **${result.score.toFixed(1)}/10** |`,
    `| **Total Issues** | ${result.findings.length} |`,
    `| 🔴 Critical | ${critical.length} |`,
    `| 🟠 High | ${high.length} |`,
    `| 🟡 Medium | ${medium.length} |`,
    `| 🟢 Low | ${low.length} |`,
    '',
  );

  if (result.findings.length === 0) {
    md.push('---', '', '## ✅ Excellent Work!', '', 'No issues found in this pull request. The code looks great! 🎉', '');
  } else {
    md.push('### 💭 Overall Assessment', '', `> ${result.summary}`, '');
    if (critical.length > 0) md.push(...formatOpenGroup('critical', critical));
    if (high.length > 0) md.push(...formatOpenGroup('high', high));
    if (medium.length > 0) md.push(...formatCollapsedGroup('medium', medium));
    if (low.length > 0) md.push(...formatCollapsedGroup('low', low));
  }

  if (result.metadata.failed_analyzers.length > 0) {
    const roles = result.metadata.failed_analyzers.map(f => f.role).join(', ');
    md.push(`> ℹ️ Partial review: ${roles} did not complete.`, '');
  }

  md.push(
    '---',
    '',
    "<div align='center'>",
    '',
    '🤖 *Powered by AI Code Review Agents*',
    '',
    `Model: \`${result.metadata.model}\` · Execution Time: \`${result.metadata.execution_time_ms}ms\``,
    '',
    '</div>',
  );

  return md.join('\n');
}
