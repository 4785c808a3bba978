/**
 * Image rules
 *
 * Screenshots on unit pages are often wrapped in a link to the full-size
 * file; only the image is kept. Every image gets alt text, falling back to
 * its file name.
 */

import type TurndownService from "turndown";
import { imageMarkdown, isElement } from "./image-utils";

function linkedImage(node: Node): Element | undefined {
  if (node.nodeName !== "A") return undefined;

  const images = Array.from(node.childNodes).filter(
    (child) => child.nodeName === "IMG",
  );
  const [img] = images;
  return images.length === 1 && isElement(img) ? img : undefined;
}

export function imageRules() {
  return (service: TurndownService): void => {
    service.addRule("linkedImage", {
      filter: (node) => linkedImage(node) !== undefined,
      replacement: (_content, node) => {
        const img = linkedImage(node);
        return img ? imageMarkdown(img) : "";
      },
    });

    service.addRule("image", {
      filter: "img",
      replacement: (_content, node) => imageMarkdown(node),
    });
  };
}
