export const MANIFEST_DIR = ".claude-plugin";
export const MARKETPLACE_FILENAME = "marketplace.json";
export const PLUGIN_FILENAME = "plugin.json";
export const MARKETPLACE_PATH = `${MANIFEST_DIR}/${MARKETPLACE_FILENAME}`;
export const PLUGIN_MANIFEST_PATH = `${MANIFEST_DIR}/${PLUGIN_FILENAME}`;
export const SKILLS_DIR = "skills";
export const SKILL_FILENAME = "SKILL.md";
export const REFERENCES_DIR = "references";
