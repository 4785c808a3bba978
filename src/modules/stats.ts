/**
 * Stats Module
 * Displays the download tally and issues
 */

import chalk from "chalk";
import type { Tracker, DownloadStats, Issue } from "../utils/tracker";
import type { Job } from "../utils/job-store";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(current: number, total: number, width = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

export interface StatsOptions {
  verbose?: boolean;
  jobs?: Job[];
}

/**
 * Display the download tally. Returns the stats that were shown.
 */
export function stats(tracker: Tracker, options: StatsOptions = {}): DownloadStats {
  const result = tracker.getStats();
  const hasErrors = result.failedItems > 0;
  const hasWarnings =
    result.failedModules > 0 || result.failedUnits > 0 || result.failedImages > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Download Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(result.duration))}`,
  );

  displayItemsSection(result);
  displayUnitsSection(result);
  displayImagesSection(result);
  displayJobsSection(options.jobs ?? []);
  displayIssuesSection(result.issues, options.verbose);

  console.log("");
  return result;
}

// ============================================================================
// Section Displays
// ============================================================================

function displayItemsSection(stats: DownloadStats): void {
  console.log(sectionHeader("Items"));
  console.log(`   ${progressBar(stats.downloadedItems, stats.requestedItems)}`);
  console.log(
    statRow(
      chalk.green("◉"),
      "Downloaded",
      `${stats.downloadedItems}/${stats.requestedItems}`,
      chalk.green,
    ),
  );
  if (stats.failedItems > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", stats.failedItems, chalk.red));
  }
  for (const file of stats.writtenFiles) {
    console.log(`      ${chalk.dim("·")} ${file}`);
  }
}

function displayUnitsSection(stats: DownloadStats): void {
  const totalUnits = stats.resolvedUnits + stats.failedUnits;
  if (totalUnits === 0) return;

  console.log(sectionHeader("Units"));
  console.log(`   ${progressBar(stats.resolvedUnits, totalUnits)}`);
  console.log(statRow(chalk.cyan("◉"), "Modules", stats.modules, chalk.cyan));
  if (stats.failedModules > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Modules missing", stats.failedModules, chalk.yellow),
    );
  }
  console.log(
    statRow(chalk.green("◉"), "Resolved", stats.resolvedUnits, chalk.green),
  );
  if (stats.failedUnits > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Skipped", stats.failedUnits, chalk.yellow),
    );
  }
}

function displayImagesSection(stats: DownloadStats): void {
  const totalImages =
    stats.downloadedImages + stats.cachedImages + stats.failedImages;
  if (totalImages === 0) return;

  console.log(sectionHeader("Images"));
  console.log(
    `   ${progressBar(stats.downloadedImages + stats.cachedImages, totalImages)}`,
  );

  if (stats.downloadedImages > 0) {
    console.log(
      statRow(chalk.green("◉"), "Downloaded", stats.downloadedImages, chalk.green),
    );
  }
  if (stats.cachedImages > 0) {
    console.log(statRow(chalk.cyan("◉"), "Cached", stats.cachedImages, chalk.cyan));
  }
  if (stats.failedImages > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", stats.failedImages, chalk.red));
  }
}

function displayJobsSection(jobs: Job[]): void {
  if (jobs.length === 0) return;

  console.log(sectionHeader("Jobs"));
  for (const job of jobs) {
    const icon = job.state === "completed" ? chalk.green("✔") : chalk.red("✖");
    console.log(`   ${icon} ${chalk.dim(job.id)} ${job.target}`);
    if (job.error) {
      console.log(`        ${chalk.dim(job.error)}`);
    }
  }
}

function displayIssuesSection(issues: Issue[], verbose?: boolean): void {
  if (issues.length === 0) return;

  const counts = new Map<Issue["type"], Issue[]>();
  for (const issue of issues) {
    counts.set(issue.type, [...(counts.get(issue.type) ?? []), issue]);
  }

  console.log(sectionHeader(chalk.red("Issues")));
  for (const [type, list] of counts) {
    console.log(statRow(chalk.yellow("✖"), `${type} issues`, list.length, chalk.yellow));
    if (!verbose) continue;

    for (const issue of list.slice(0, 10)) {
      console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
      if (issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
    if (list.length > 10) {
      console.log(`      ${chalk.dim(`  +${list.length - 10} more`)}`);
    }
  }
}
