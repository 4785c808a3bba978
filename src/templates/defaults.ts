/**
 * Built-in default templates
 */

import type { MarkdownConfig } from "../types";

/**
 * Markdown document: front matter, table of contents, then every unit
 */
export function getDefaultMarkdownTemplate(config: MarkdownConfig): string {
  const em = config.emphasis;
  const bullet = config.bulletMarker;
  const hr = config.horizontalRule;

  return `---
title: {{{yamlString title}}}
date: {{date}}
source: {{{yamlString url}}}
---

# {{{title}}}
{{#if summary}}

${em}{{{summary}}}${em}
{{/if}}

## Contents

{{#each modules}}
${bullet} [{{{this.title}}}](#{{this.anchor}})
{{/each}}

{{#each modules}}
${hr}

## {{{this.title}}}
{{#if this.summary}}

> {{{this.summary}}}
{{/if}}
{{#each this.units}}

### {{{this.title}}}

{{{this.markdown}}}
{{/each}}

{{/each}}
`;
}

/**
 * Standalone HTML document that loads images from the sibling images/ folder
 */
export function getDefaultHtmlTemplate(): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>{{title}}</title>
<style>
  body { font-family: system-ui, sans-serif; max-width: 960px; margin: 2rem auto; padding: 0 1rem; line-height: 1.6; }
  img { max-width: 100%; height: auto; }
  pre { background: #f5f5f5; padding: 1rem; overflow-x: auto; }
  .module { border-top: 2px solid #ddd; margin-top: 3rem; }
  .unit-source { font-size: 0.85rem; color: #666; }
</style>
</head>
<body>
<h1>{{title}}</h1>
{{#if summary}}<p><em>{{summary}}</em></p>{{/if}}
<nav>
<h2>Contents</h2>
<ol>
{{#each modules}}
<li><a href="#{{this.anchor}}">{{this.title}}</a></li>
{{/each}}
</ol>
</nav>
{{#each modules}}
<section class="module" id="{{this.anchor}}">
<h2>{{this.title}}</h2>
{{#each this.units}}
<article class="unit" id="{{this.anchor}}">
<h3>{{this.title}}</h3>
<p class="unit-source"><a href="{{this.url}}">{{this.url}}</a></p>
{{{this.html}}}
</article>
{{/each}}
</section>
{{/each}}
</body>
</html>
`;
}
