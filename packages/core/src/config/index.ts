export { defineConfig } from "./define.js";
export {
  loadConfig,
  findConfigFile,
  validateConfig,
  resolveConfig,
  CONFIG_FILENAMES,
  ConfigNotFoundError,
  ConfigValidationError,
} from "./loader.js";
