import { describe, it, expect } from "vitest";
import {
  extractImages,
  extractLearningPathUids,
  extractMainContent,
} from "./extractor";
import { unitPage } from "../testing/fixtures";

const PAGE_URL = "https://learn.example.com/training/modules/m/1-intro";

function mainContent(html: string) {
  const main = extractMainContent(html);
  if (!main) throw new Error("expected a content region");
  return main;
}

describe("extractMainContent", () => {
  it("prefers the dedicated content container", () => {
    const { region } = mainContent(
      `<main><article><p>Article</p></article><div class="content"><p>Content</p></div></main>`,
    );
    expect(region.text()).toBe("Content");
  });

  it("falls back to a bare article", () => {
    const { region } = mainContent(
      `<body><div>Sidebar</div><article><p>Only article</p></article></body>`,
    );
    expect(region.text()).toBe("Only article");
  });

  it("returns null when no selector matches", () => {
    expect(extractMainContent("<body><div>Nothing here</div></body>")).toBe(
      null,
    );
  });

  it("strips chrome from the region", () => {
    const { region } = mainContent(
      unitPage(
        "Intro",
        `<nav>Jump to</nav><p>Keep me</p><div class="feedback">Rate this</div>` +
          `<p class="is-invisible">Hidden</p><script>track()</script><style>p{}</style>`,
      ),
    );

    expect(
      region.find("nav, .feedback, .is-invisible, script, style"),
    ).toHaveLength(0);
    expect(region.text()).toBe("IntroKeep me");
  });

  it("rewrites quizzes into static markup", () => {
    const { $, region } = mainContent(`<main><div class="content">
      <form id="question-container">
        <div class="quiz-question">
          <div class="quiz-question-title"><span>1.</span><p>What is a flow?</p></div>
          <label class="quiz-choice"><span class="radio-label-text"> An automation </span></label>
          <label class="quiz-choice"><span class="radio-label-text">A table</span></label>
        </div>
        <div class="quiz-question">
          <div class="quiz-question-title">Pick one</div>
          <label class="quiz-choice"><span class="radio-label-text">Yes</span></label>
        </div>
      </form>
    </div></main>`);

    expect(region.find("#question-container")).toHaveLength(0);
    const quiz = region.find("div.formatted-quiz");
    expect(quiz.find("h3").map((_i, el) => $(el).text()).get()).toEqual([
      "Question: What is a flow?",
      "Question: Pick one",
    ]);
    const choices = quiz.find("ul").first().find("li");
    expect(choices.map((_i, el) => $(el).text()).get()).toEqual([
      "An automation",
      "A table",
    ]);
    expect(quiz.find("hr")).toHaveLength(2);
  });
});

describe("extractImages", () => {
  it("keeps content images and skips decorative ones", () => {
    const { $, region } = mainContent(`<main><div class="content">
      <img src="media/diagram.png" alt="Diagram" width="640" height="tall">
      <img src="/media/spacer.gif" role="presentation">
      <img src="/media/icon.svg" role="presentation" alt="Warning">
      <img src="/achievements/badge.svg" alt="Badge">
      <img data-src="https://cdn.example.com/lazy.png">
      <img src="/media/role.png" role="img">
      <img alt="No source">
    </div></main>`);

    expect(extractImages($, region, PAGE_URL)).toEqual([
      {
        url: "https://learn.example.com/training/modules/m/media/diagram.png",
        alt: "Diagram",
        width: 640,
        height: undefined,
        originalSrc: "media/diagram.png",
        referer: PAGE_URL,
      },
      {
        url: "https://learn.example.com/media/icon.svg",
        alt: "Warning",
        width: undefined,
        height: undefined,
        originalSrc: "/media/icon.svg",
        referer: PAGE_URL,
      },
      {
        url: "https://cdn.example.com/lazy.png",
        alt: "",
        width: undefined,
        height: undefined,
        originalSrc: "https://cdn.example.com/lazy.png",
        referer: PAGE_URL,
      },
    ]);
  });
});

describe("extractLearningPathUids", () => {
  it("returns distinct UIDs in page order", () => {
    const html = `<section>
      <article data-learn-uid="learn.b"></article>
      <article data-learn-uid="learn.a"></article>
      <article data-learn-uid="learn.b"></article>
      <article>No UID</article>
    </section>`;
    expect(extractLearningPathUids(html)).toEqual(["learn.b", "learn.a"]);
  });
});
