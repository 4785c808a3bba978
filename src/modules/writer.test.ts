import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildTemplateContext, documentName, writeDocuments } from "./writer";
import type { ContentRecord, ModuleContent } from "../types";
import { entity, testConfig } from "../testing/fixtures";

const path = entity("learn.sample-path", {
  type: "learningPaths",
  title: "Tools & Practices",
  summary: "Learn the basics.",
  url: "https://learn.example.com/training/paths/sample-path/",
});

function record(uid: string, title: string, body: string): ContentRecord {
  return {
    unit: entity(uid, { title }),
    url: `https://learn.example.com/training/modules/m/${uid}`,
    html: `<p>${body}</p>`,
    markdown: body,
    text: body,
    images: [],
  };
}

const modules: ModuleContent[] = [
  {
    module: entity("learn.m1", { type: "modules", title: "Getting started" }),
    records: [
      record("learn.m1.intro", "Introduction", "First unit body"),
      record("learn.m1.untitled", "", "Second unit body"),
    ],
    images: [],
  },
  {
    module: entity("learn.m2", { type: "modules", title: "Getting started" }),
    records: [record("learn.m2.intro", "Introduction", "Third unit body")],
    images: [],
  },
];

describe("documentName", () => {
  it("slugifies the title, falling back to the UID", () => {
    expect(documentName(path)).toBe("tools-practices");
    expect(documentName(entity("learn.only-uid"))).toBe("learn-only-uid");
  });
});

describe("buildTemplateContext", () => {
  it("assigns unique anchors across modules and units", () => {
    const context = buildTemplateContext(
      path,
      modules,
      new Date("2026-01-15T10:00:00Z"),
    );

    expect(context.date).toBe("2026-01-15");
    expect(context.modules.map((module) => module.anchor)).toEqual([
      "getting-started",
      "getting-started-2",
    ]);
    expect(
      context.modules.flatMap((module) => module.units.map((unit) => unit.anchor)),
    ).toEqual(["introduction", "learn-m1-untitled", "introduction-2"]);
    expect(context.modules[0].units[1].title).toBe("learn.m1.untitled");
  });
});

describe("writeDocuments", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), "learn-dl-writer-"));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it("writes one file per distinct format", async () => {
    const files = await writeDocuments(path, modules, outputDir, {
      formats: ["markdown", "html", "markdown"],
      markdown: testConfig().markdown,
    });

    expect(files).toEqual([
      join(outputDir, "tools-practices.md"),
      join(outputDir, "tools-practices.html"),
    ]);
  });

  it("renders units in order into Markdown", async () => {
    const [file] = await writeDocuments(path, modules, outputDir, {
      formats: ["markdown"],
      markdown: testConfig().markdown,
    });
    const markdown = await readFile(file, "utf-8");
    const lines = markdown.split("\n");

    expect(lines).toContain("# Tools & Practices");
    expect(lines).toContain("- [Getting started](#getting-started-2)");
    expect(markdown.indexOf("First unit body")).toBeLessThan(
      markdown.indexOf("Second unit body"),
    );
    expect(markdown.indexOf("Second unit body")).toBeLessThan(
      markdown.indexOf("Third unit body"),
    );
  });

  it("quotes front matter values", async () => {
    const quoted = { ...path, title: 'Say "hi" \\ wave' };
    const [file] = await writeDocuments(quoted, modules, outputDir, {
      formats: ["markdown"],
      markdown: testConfig().markdown,
    });
    const lines = (await readFile(file, "utf-8")).split("\n");

    expect(lines.slice(0, 5)).toEqual([
      "---",
      'title: "Say \\"hi\\" \\\\ wave"',
      expect.stringMatching(/^date: \d{4}-\d{2}-\d{2}$/),
      'source: "https://learn.example.com/training/paths/sample-path/"',
      "---",
    ]);
  });

  it("escapes titles but not unit markup in HTML", async () => {
    const [file] = await writeDocuments(path, modules, outputDir, {
      formats: ["html"],
      markdown: testConfig().markdown,
    });
    const html = await readFile(file, "utf-8");

    expect(html).toContain("<h1>Tools &amp; Practices</h1>");
    expect(html).toContain("<p>First unit body</p>");
    expect(html).toContain('<article class="unit" id="introduction-2">');
  });
});
