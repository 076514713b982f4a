export { formatText, formatJson, relativePath, plural } from "./format.js";
export type { TextFormatOptions } from "./format.js";
