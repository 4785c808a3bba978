/**
 * Turndown Configuration
 * Sets up Turndown with custom rules for unit content
 */

import TurndownService from "turndown";
import type { MarkdownConfig } from "../types";
import { plainHeadings, imageRules } from "./rules";

export function createTurndownService(config: MarkdownConfig): TurndownService {
  const turndownService = new TurndownService({
    headingStyle: config.headingStyle,
    codeBlockStyle: config.codeBlockStyle,
    emDelimiter: config.emphasis,
    strongDelimiter: config.strong,
    bulletListMarker: config.bulletMarker,
    hr: config.horizontalRule,
    fence: config.codeFence,
  });

  // Tables are passed through as HTML
  turndownService.keep(["table"]);

  turndownService.use(plainHeadings(config));
  turndownService.use(imageRules());

  return turndownService;
}

/**
 * Convert HTML to Markdown, collapsing runs of blank lines
 */
export function htmlToMarkdown(
  service: TurndownService,
  html: string,
): string {
  if (!html) return "";
  return service.turndown(html).replace(/\n{3,}/g, "\n\n");
}
