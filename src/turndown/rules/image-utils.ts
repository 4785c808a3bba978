/**
 * Shared helpers for image rules
 */

export function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

/**
 * Alt text of an image, or its filename when the alt attribute is empty
 */
export function getAltText(img: Element): string {
  const alt = img.getAttribute("alt") || "";
  if (alt.trim() !== "") {
    return alt;
  }

  const src = img.getAttribute("src") || "";
  const name = src.split(/[?#]/)[0].split("/").pop();
  return name || "image";
}

export function imageMarkdown(img: Element): string {
  const src =
    img.getAttribute("src") ||
    img.getAttribute("data-src") ||
    img.getAttribute("data-original") ||
    "";
  return `![${getAltText(img)}](${src})`;
}
