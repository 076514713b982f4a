export { run } from "./cli/index.js";
