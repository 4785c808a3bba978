#!/usr/bin/env -S npx tsx

/**
 * CLI entry point for the learning catalog downloader
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { ENTITY_TYPES } from "../types";
import { downloadCommand } from "./commands/download";
import { searchCommand } from "./commands/search";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("learn-dl")
  .description(
    "Download learning paths, modules and courses as local HTML and Markdown",
  )
  .version("0.1.0");

// Main download command (default action)
program
  .option("-u, --url <url>", "Learning path or course URL")
  .option("--uid <uid>", "Learning path UID (e.g. learn.some-learning-path)")
  .option("-m, --module <uid>", "Module UID")
  .option("--course <uidOrUrl>", "Course UID or course page URL")
  .option("-s, --search <query>", "Search learning paths and courses")
  .option("--download-all", "Download every search result (use with --search)")
  .option("-f, --format <format>", "Output format: html, markdown, md or all", "all")
  .option("-o, --output <path>", "Output directory")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--no-images", "Skip downloading images")
  .option("--delete-images", "Delete the images folder once documents are written")
  .option("-v, --verbose", "Verbose output")
  .action(downloadCommand);

program
  .command("search <query>")
  .description("Search the catalog without downloading")
  .option(
    "-t, --types <types...>",
    `Entity types to search (${ENTITY_TYPES.join(", ")})`,
  )
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(searchCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
