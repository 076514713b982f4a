export { detectLayout, loadMarketplace } from "./marketplace.js";
export { loadPlugin, loadPluginDirectory, resolvePluginSource, discoverSkills } from "./plugin.js";
export { loadSkill } from "./skill.js";
export type { LoadSkillOptions } from "./skill.js";
export { MarketplaceNotFoundError, SkillNotFoundError } from "./errors.js";
export { listFiles, toPosix } from "./fs.js";
export {
  MANIFEST_DIR,
  MARKETPLACE_FILENAME,
  PLUGIN_FILENAME,
  MARKETPLACE_PATH,
  PLUGIN_MANIFEST_PATH,
  SKILLS_DIR,
  SKILL_FILENAME,
  REFERENCES_DIR,
} from "./paths.js";
