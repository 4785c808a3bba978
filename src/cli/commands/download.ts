/**
 * Download command - Resolves targets and runs the download pipeline
 */

import chalk from "chalk";
import { z } from "zod";
import {
  Downloader,
  targetFromUrl,
  stats,
  type DownloadTarget,
} from "../../modules";
import { JobStore } from "../../utils/job-store";
import { createContext, parseFormats } from "../create-context";
import { printResults, runSearch } from "./search";

const DownloadOptionsSchema = z.object({
  uid: z.string().optional(),
  url: z.string().optional(),
  module: z.string().optional(),
  course: z.string().optional(),
  search: z.string().optional(),
  downloadAll: z.boolean().optional(),
  format: z.string().default("all"),
  output: z.string().optional(),
  config: z.string().optional(),
  images: z.boolean().default(true),
  deleteImages: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof DownloadOptionsSchema>;

function collectTargets(options: z.infer<typeof DownloadOptionsSchema>): DownloadTarget[] {
  const targets: DownloadTarget[] = [];
  if (options.uid) targets.push({ kind: "path", uid: options.uid });
  if (options.url) targets.push(targetFromUrl(options.url));
  if (options.module) targets.push({ kind: "module", uid: options.module });
  if (options.course) {
    targets.push(
      /^https?:\/\//.test(options.course)
        ? { kind: "course-url", url: options.course }
        : { kind: "course", uid: options.course },
    );
  }
  return targets;
}

export async function downloadCommand(opts: Options): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  try {
    const options = DownloadOptionsSchema.parse(opts);

    if (!options.uid && !options.url && !options.module && !options.course && !options.search) {
      console.error(chalk.red("Error: Please provide --uid, --url, --module, --course or --search"));
      console.error("Use --help for usage information");
      process.exitCode = 1;
      return;
    }

    const ctx = await createContext({
      config: options.config,
      verbose: options.verbose,
      formats: parseFormats(options.format),
      signal: controller.signal,
      overrides: (config) => {
        if (!options.images) config.download.images = false;
        if (options.deleteImages) config.cleanup.deleteImages = true;
        if (options.output) config.storage.outputDir = options.output;
      },
    });
    ctx.onProgress = (event) => {
      if (event.item) {
        ctx.logger.debug(`[${event.stage}] ${event.current}/${event.total} ${event.item}`);
      }
    };

    const downloader = new Downloader(ctx);
    const jobs = new JobStore();
    const targets = collectTargets(options);

    if (options.search) {
      const results = await runSearch(ctx, options.search);
      printResults(results);

      if (!options.downloadAll) {
        if (results.length > 0) {
          console.log(chalk.dim("\nRun with --download-all to download every result, or pass --uid."));
        }
        return;
      }

      for (const item of results) {
        targets.push(
          item.type === "courses"
            ? { kind: "course", uid: item.uid }
            : { kind: "path", uid: item.uid },
        );
      }
    }

    if (targets.length === 0) {
      console.error(chalk.yellow("Nothing to download"));
      process.exitCode = 1;
      return;
    }

    const batch = await downloader.downloadBatch(targets, ctx.config.storage.outputDir, jobs);
    stats(ctx.tracker, { verbose: options.verbose, jobs: jobs.list() });

    if (batch.succeeded === 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    if (controller.signal.aborted) {
      console.error(chalk.red("\nInterrupted"));
      process.exitCode = 130;
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Download failed: ${message}`));
    process.exitCode = 1;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}
