/**
 * Template utilities for Handlebars template rendering
 */

import Handlebars from "handlebars";
import { getDefaultMarkdownTemplate, getDefaultHtmlTemplate } from "./defaults";
import type { MarkdownConfig } from "../types";

export { getDefaultMarkdownTemplate, getDefaultHtmlTemplate };

export interface UnitTemplateContext {
  title: string;
  url: string;
  anchor: string;
  html: string;
  markdown: string;
}

export interface ModuleTemplateContext {
  title: string;
  summary: string;
  url: string;
  anchor: string;
  units: UnitTemplateContext[];
}

export interface DocumentTemplateContext {
  title: string;
  summary: string;
  url: string;
  date: string;
  modules: ModuleTemplateContext[];
}

const handlebars = Handlebars.create();

// Double-quoted YAML scalar; JSON string escaping is valid YAML
handlebars.registerHelper("yamlString", (value: unknown) =>
  JSON.stringify(typeof value === "string" ? value : ""),
);

export type DocumentTemplate = HandlebarsTemplateDelegate<DocumentTemplateContext>;

export function compileMarkdownTemplate(config: MarkdownConfig): DocumentTemplate {
  return handlebars.compile<DocumentTemplateContext>(
    getDefaultMarkdownTemplate(config),
  );
}

export function compileHtmlTemplate(): DocumentTemplate {
  return handlebars.compile<DocumentTemplateContext>(getDefaultHtmlTemplate());
}
