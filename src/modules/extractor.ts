/**
 * Content Extractor
 * Locates the main content region of a unit page, flattens quizzes,
 * strips page chrome and collects the image inventory
 */

import { load } from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type { ImageRef } from "../types";
import { OrderedSet } from "../utils/ordered-set";

// Most specific first; the first selector that matches wins
export const CONTENT_SELECTORS = [
  "main .content",
  "main article",
  'main [data-bi-name="content"], main [role="main"]',
  "article",
  "main",
];

export const REMOVE_SELECTORS = [
  "nav",
  "header",
  "footer",
  ".nav",
  ".navigation",
  ".feedback",
  ".page-metadata",
  ".contributors",
  ".alert-banner",
  '[data-bi-name="feedback"]',
  ".margin-note",
  ".is-invisible",
  "script",
  "style",
];

export const LAZY_SRC_ATTRIBUTES = ["data-src", "data-original"];

// Path markers of non-content images
const BADGE_MARKERS = ["/achievements/", "/badges/"];

export interface MainContent {
  $: CheerioAPI;
  region: Cheerio<Element>;
}

/**
 * Find, normalize and clean the main content region of a page.
 * Returns null when no content selector matches.
 */
export function extractMainContent(html: string): MainContent | null {
  const $ = load(html);

  for (const selector of CONTENT_SELECTORS) {
    const region = $<Element, string>(selector).first();
    if (region.length > 0) {
      formatQuiz($, region);
      cleanContent(region);
      return { $, region };
    }
  }

  return null;
}

/**
 * Rewrite the interactive quiz form into static markup:
 * a heading per question, a list of its choices, then a separator
 */
export function formatQuiz($: CheerioAPI, region: Cheerio<Element>): void {
  const form = region.find("#question-container").first();
  if (form.length === 0) return;

  const quiz = $('<div class="formatted-quiz"></div>');

  form.find(".quiz-question").each((_index, element) => {
    const question = $(element);
    const title = question.find(".quiz-question-title").first();
    if (title.length === 0) return;

    // Prefer the paragraph so the question number is left out
    const paragraph = title.find("p").first();
    const text = (paragraph.length > 0 ? paragraph : title).text().trim();
    quiz.append($("<h3></h3>").text(`Question: ${text}`));

    const choices = $("<ul></ul>");
    question.find(".quiz-choice").each((_choiceIndex, choice) => {
      const label = $(choice).find(".radio-label-text").first();
      if (label.length > 0) {
        choices.append($("<li></li>").text(label.text().trim()));
      }
    });

    quiz.append(choices);
    quiz.append("<hr>");
  });

  form.replaceWith(quiz);
}

/**
 * Remove navigation, chrome and invisible elements
 */
export function cleanContent(region: Cheerio<Element>): void {
  for (const selector of REMOVE_SELECTORS) {
    region.find(selector).remove();
  }
}

/**
 * Source of an image element, falling back to lazy-load attributes
 */
export function imageSource($: CheerioAPI, element: Element): string {
  const img = $(element);
  return (
    img.attr("src") ||
    LAZY_SRC_ATTRIBUTES.map((name) => img.attr(name)).find(Boolean) ||
    ""
  );
}

function parseDimension(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Collect content images, resolved against the page URL.
 * Decorative images and badges are skipped.
 */
export function extractImages(
  $: CheerioAPI,
  region: Cheerio<Element>,
  baseUrl: string,
): ImageRef[] {
  const images: ImageRef[] = [];

  region.find("img").each((_index, element) => {
    const src = imageSource($, element);
    if (!src) return;

    let absolute: URL;
    try {
      absolute = new URL(src, baseUrl);
    } catch {
      return;
    }

    const img = $(element);
    const role = img.attr("role") ?? "";
    const alt = img.attr("alt") ?? "";

    if (role === "presentation" && !alt) return;
    if (BADGE_MARKERS.some((marker) => absolute.pathname.includes(marker))) {
      return;
    }

    if (alt || !role) {
      images.push({
        url: absolute.href,
        alt,
        width: parseDimension(img.attr("width")),
        height: parseDimension(img.attr("height")),
        originalSrc: src,
        referer: baseUrl,
      });
    }
  });

  return images;
}

/**
 * Learning path UIDs listed on a course page, de-duplicated, in page order
 */
export function extractLearningPathUids(html: string): string[] {
  const $ = load(html);
  const uids = new OrderedSet();

  $("article[data-learn-uid]").each((_index, element) => {
    uids.add($(element).attr("data-learn-uid"));
  });

  return uids.toArray();
}
