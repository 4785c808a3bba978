export { plainHeadings } from "./plain-headings";
export { imageRules } from "./images";
