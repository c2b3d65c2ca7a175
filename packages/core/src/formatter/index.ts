export { segmentsToAnsi, segmentsToText } from "./output.js";
export { parseTemplate } from "./parser.js";
export { bindMeta, formatTemplate, renderTemplate } from "./renderer.js";
export type {
  ParsedTemplate,
  Resolution,
  Segment,
  StyleWord,
  TemplateResolvers,
  TemplateToken,
} from "./types.js";
