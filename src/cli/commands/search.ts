/**
 * Search command - List catalog items matching a query
 */

import chalk from "chalk";
import ora from "ora";
import { z } from "zod";
import { ENTITY_TYPES } from "../../types";
import type { CatalogEntity, DownloadContext } from "../../types";
import { createContext } from "../create-context";

const TYPE_LABELS: Record<CatalogEntity["type"], string> = {
  learningPaths: "path",
  courses: "course",
  modules: "module",
  units: "unit",
};

const SearchOptionsSchema = z.object({
  types: z.array(z.enum(ENTITY_TYPES)).optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof SearchOptionsSchema>;

/**
 * Search with a spinner; returns the hits in catalog order
 */
export async function runSearch(
  ctx: DownloadContext,
  query: string,
  types?: Options["types"],
): Promise<CatalogEntity[]> {
  const spinner = ora({ text: `Searching catalog for '${query}'...`, indent: 2 }).start();
  try {
    const results = await ctx.catalog.searchCatalog(query, types);
    spinner.succeed(`Found ${results.length} results for '${query}'`);
    return results;
  } catch (error) {
    spinner.fail("Search failed");
    throw error;
  }
}

export function printResults(results: readonly CatalogEntity[]): void {
  for (const [index, item] of results.entries()) {
    const number = chalk.dim(`${String(index + 1).padStart(3)}.`);
    const kind = chalk.cyan(TYPE_LABELS[item.type]);
    const courseNumber = item.courseNumber ? chalk.yellow(` [${item.courseNumber}]`) : "";
    console.log(`${number} ${kind}${courseNumber} ${chalk.bold(item.title)}`);
    console.log(`      ${chalk.dim(item.uid)}`);
  }
}

export async function searchCommand(query: string, opts: Options): Promise<void> {
  try {
    const options = SearchOptionsSchema.parse(opts);
    const ctx = await createContext({
      config: options.config,
      verbose: options.verbose,
    });

    const results = await runSearch(ctx, query, options.types);
    printResults(results);
  } catch (error) {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exitCode = 1;
  }
}
