import { CATEGORY_KEYS } from "@shared/audit-types";
import type {
  AuditResult,
  BatchResult,
  FailedAuditResult,
  FindingStatus,
  Grade,
  ScoredAuditResult,
  Tier,
} from "./audit/types";

const NEXT_STEPS: Record<Grade, string> = {
  D: `### High Priority
Your website would benefit significantly from addressing these foundational issues:

1. **Consider a website refresh** - Modernizing your site's design will improve first impressions and build trust with potential clients
2. **Add clear calls-to-action** - Make it easy for visitors to schedule a consultation or contact your firm
3. **Improve local SEO** - Ensure your business information is consistent and visible to help clients find you

### Why This Matters
In today's market, your website is often the first impression potential clients have of your firm. Addressing these issues can directly impact your ability to attract and convert new clients.
`,
  C: `### Recommended Actions
1. **Enhance conversion elements** - Adding contact forms and prominent CTAs can increase client inquiries
2. **Strengthen trust signals** - Showcase your team's credentials and expertise more prominently
3. **Optimize for local search** - Ensure your NAP (Name, Address, Phone) is consistent across your site

### Impact
These improvements can help convert more of your existing website visitors into actual client consultations.
`,
  B: `### Fine-Tuning Opportunities
1. **Polish the details** - Small improvements to design and content can enhance professionalism
2. **Optimize for conversions** - Test different CTAs and form placements to maximize inquiries
3. **Monitor performance** - Regular updates keep your site fresh and maintain search rankings

### Impact
Your site has a solid foundation. These refinements can help you stand out from competitors.
`,
  A: `### Maintenance Recommendations
1. **Keep content fresh** - Regular updates signal an active, engaged firm
2. **Monitor analytics** - Track which pages drive the most inquiries
3. **Stay current** - Web standards evolve; periodic reviews ensure continued excellence

### Well Done
Your website is performing well. Continue maintaining these high standards to stay ahead of competitors.
`,
};

const STATUS_LABELS: Record<FindingStatus, string> = {
  pass: "Pass",
  partial: "Partial",
  fail: "Missing",
  unavailable: "Not evaluated",
};

const CSV_COLUMNS = [
  "company_name",
  "url",
  "status",
  "tier",
  "total_score",
  "grade",
  ...CATEGORY_KEYS,
  "issues",
  "top_opportunity",
  "report_path",
  "error",
] as const;

export function formatAuditDate(timestamp: string): string {
  return new Date(timestamp).toLocaleDateString("en-US", {
    year: "numeric",
    month: "long",
    day: "numeric",
    timeZone: "UTC",
  });
}

/** "2026-10-18T09:05:03.000Z" -> "2026-10-18 09:05:03" */
function formatDateTime(timestamp: string): string {
  return timestamp.replace("T", " ").replace(/\.\d+Z$|Z$/, "");
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export function countIssues(result: ScoredAuditResult): number {
  return CATEGORY_KEYS.reduce(
    (sum, key) => sum + result.categories[key].findings.filter((finding) => finding.status !== "pass").length,
    0
  );
}

function renderFailedReport(result: FailedAuditResult): string {
  return `# Website Audit Report

**Website:** ${result.url}
**Audit Date:** ${formatAuditDate(result.timestamp)}

---

## Audit Failed

The site could not be audited (${result.failure.kind}).

${result.error}
`;
}

export function generateMarkdownReport(result: AuditResult): string {
  if (result.status === "failed") {
    return renderFailedReport(result);
  }

  const issues = CATEGORY_KEYS.flatMap((key) =>
    result.categories[key].findings.filter((finding) => finding.status !== "pass").map((finding) => finding.message)
  );

  let report = `# Website Audit Report

**Website:** ${result.url}
${result.company ? `**Company:** ${result.company}\n` : ""}**Audit Date:** ${formatAuditDate(result.timestamp)}

---

## Overall Grade: ${result.grade}

**Score:** ${result.totalScore}/100
**Outreach Recommendation:** ${result.tier}

${result.gradeSummary}

---

## Executive Summary

This audit evaluated your website across five key areas that impact how potential clients find and engage with your firm online:

- **Visual Design** - First impressions and professional appearance
- **Conversion Elements** - How easily visitors can contact you
- **Trust Signals** - Credentials and credibility indicators
- **SEO Fundamentals** - Search engine visibility
- **Technical Performance** - Speed and mobile experience

### Areas Needing Attention: ${issues.length}
`;

  if (issues.length > 0) {
    for (const issue of issues) {
      report += `- ${issue}\n`;
    }
  } else {
    report += "- No major issues found\n";
  }

  report += `\n### Recommended Improvements\n`;
  result.rankedOpportunities.forEach((opportunity, index) => {
    report += `${index + 1}. ${opportunity.message}\n`;
  });

  report += `\n---\n\n## Detailed Findings\n`;
  for (const key of CATEGORY_KEYS) {
    const category = result.categories[key];
    report += `\n### ${category.name} (${category.score}/${category.max})\n\n`;
    report += `| Check | Status | Points | Finding |\n`;
    report += `|-------|--------|--------|---------|\n`;
    for (const finding of category.findings) {
      report += `| ${finding.check} | ${STATUS_LABELS[finding.status]} | ${finding.points}/${finding.maxPoints} | ${escapeCell(finding.message)} |\n`;
    }
  }

  if (result.degraded.length > 0) {
    report += `\n### Checks Not Evaluated\n\n`;
    for (const check of result.degraded) {
      report += `- **${check.category} / ${check.check}** - ${check.reason}\n`;
    }
  }

  report += `
---

## Priority Action Items

Based on this audit, here are the recommended next steps to improve your website's effectiveness:

${NEXT_STEPS[result.grade]}
---

## About This Report

This audit was conducted using automated analysis tools that evaluate websites against industry best practices for professional service firms. The findings represent a point-in-time assessment and should be used as a starting point for discussion with your web development team or marketing partner.
`;

  return report;
}

function csvField(value: string | number | null): string {
  const text = value === null ? "" : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export interface BatchExportOptions {
  /** Report file per audited URL, linked from the summaries. */
  reportPaths?: Record<string, string>;
}

/** One row per site, in batch order. */
export function generateBatchCsv(batch: BatchResult, options: BatchExportOptions = {}): string {
  const rows = batch.items.map((item) => {
    const scored = item.status === "failed" ? null : item;
    const values: Record<(typeof CSV_COLUMNS)[number], string | number | null> = {
      company_name: item.company,
      url: item.url,
      status: item.status,
      tier: item.tier ?? "FAILED",
      total_score: item.totalScore,
      grade: item.grade,
      visual_design: scored ? scored.categories.visual_design.score : null,
      conversion: scored ? scored.categories.conversion.score : null,
      trust: scored ? scored.categories.trust.score : null,
      seo: scored ? scored.categories.seo.score : null,
      technical: scored ? scored.categories.technical.score : null,
      issues: scored ? countIssues(scored) : null,
      top_opportunity: item.rankedOpportunities[0]?.message ?? null,
      report_path: options.reportPaths?.[item.url] ?? null,
      error: item.error,
    };
    return CSV_COLUMNS.map((column) => csvField(values[column])).join(",");
  });

  return [CSV_COLUMNS.join(","), ...rows].join("\n") + "\n";
}

export interface BatchSummaryOptions extends BatchExportOptions {
  inputFile?: string;
  csvPath?: string;
}

function percentage(count: number, total: number): string {
  return total === 0 ? "0.0" : ((count / total) * 100).toFixed(1);
}

function byScore(items: AuditResult[], tiers: Tier[]): ScoredAuditResult[] {
  return items
    .filter((item): item is ScoredAuditResult => item.status !== "failed" && tiers.includes(item.tier))
    .sort((a, b) => a.totalScore - b.totalScore);
}

/** Markdown digest of a batch, best prospects (lowest scores) first. */
export function generateBatchSummaryMarkdown(batch: BatchResult, options: BatchSummaryOptions = {}): string {
  const total = batch.items.length;
  const counts = batch.countsByTier;
  const label = (item: AuditResult) => item.company || item.url;
  const reportLink = (item: AuditResult) => options.reportPaths?.[item.url];

  let md = `# Batch Audit Summary Report\n\n`;
  md += `**Date:** ${formatDateTime(batch.finishedAt)}\n`;
  if (options.inputFile) md += `**Input File:** ${options.inputFile}\n`;
  md += `**Total Sites Audited:** ${total}\n`;
  if (batch.skipped > 0) md += `**Skipped (already audited):** ${batch.skipped}\n`;
  if (batch.cancelled) md += `**Note:** the batch was cancelled before every site was audited\n`;

  md += `\n## Overview\n\n`;
  md += `| Category | Count | Percentage |\n`;
  md += `|----------|-------|------------|\n`;
  for (const tier of ["STRONG YES", "YES", "MAYBE", "NO"] as const) {
    md += `| ${tier} | ${counts[tier]} | ${percentage(counts[tier], total)}% |\n`;
  }
  if (counts.FAILED > 0) {
    md += `| ERRORS | ${counts.FAILED} | ${percentage(counts.FAILED, total)}% |\n`;
  }

  const top = byScore(batch.items, ["STRONG YES", "YES"]);
  if (top.length > 0) {
    md += `\n## Top Prospects (STRONG YES & YES)\n\n`;
    for (const item of top) {
      md += `### ${label(item)}\n\n`;
      md += `- **URL:** ${item.url}\n`;
      md += `- **Recommendation:** ${item.tier}\n`;
      md += `- **Score:** ${item.totalScore}/100 (grade ${item.grade})\n`;
      md += `- **Issues Found:** ${countIssues(item)}\n`;
      if (item.rankedOpportunities.length > 0) {
        md += `- **Top Opportunities:**\n`;
        for (const opportunity of item.rankedOpportunities.slice(0, 3)) {
          md += `  - ${opportunity.message}\n`;
        }
      }
      const link = reportLink(item);
      if (link) md += `- **Full Report:** [${link}](${link})\n`;
      md += `\n---\n\n`;
    }
  }

  const maybe = byScore(batch.items, ["MAYBE"]);
  if (maybe.length > 0) {
    md += `\n## Moderate Prospects (MAYBE)\n\n`;
    for (const item of maybe) {
      const link = reportLink(item);
      md += `- **${label(item)}** - Score: ${item.totalScore}/100${link ? ` - [Report](${link})` : ""}\n`;
    }
  }

  const no = byScore(batch.items, ["NO"]);
  if (no.length > 0) {
    md += `\n## Low Priority (NO)\n\n`;
    for (const item of no) {
      md += `- **${label(item)}** - Score: ${item.totalScore}/100 - Well optimized\n`;
    }
  }

  const failed = batch.items.filter((item): item is FailedAuditResult => item.status === "failed");
  if (failed.length > 0) {
    md += `\n## Failed Audits\n\n`;
    for (const item of failed) {
      md += `- **${label(item)}** - Error: ${item.error}\n`;
    }
  }

  if (options.csvPath) {
    md += `\n## Files Generated\n\n`;
    md += `- **CSV Summary:** ${options.csvPath}\n`;
    md += `- **Individual Reports:** See \`reports/\` directory\n`;
    md += `- **Screenshots:** See \`screenshots/\` directory\n`;
  }

  return md;
}
