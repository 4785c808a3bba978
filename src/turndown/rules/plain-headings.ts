import type TurndownService from "turndown";
import type { MarkdownConfig } from "../../types";

/**
 * Headings carry permalink anchors on unit pages; render their text only
 */
export function plainHeadings(config: MarkdownConfig) {
  return (service: TurndownService): void => {
    service.addRule("plainHeadings", {
      filter: ["h1", "h2", "h3", "h4", "h5", "h6"],
      replacement: (_content, node) => {
        const text = (node.textContent ?? "").replace(/\s+/g, " ").trim();
        if (!text) return "";

        const level = Number(node.nodeName.charAt(1));
        if (config.headingStyle === "setext" && level <= 2) {
          const underline = (level === 1 ? "=" : "-").repeat(text.length);
          return `\n\n${text}\n${underline}\n\n`;
        }
        return `\n\n${"#".repeat(level)} ${text}\n\n`;
      },
    });
  };
}
