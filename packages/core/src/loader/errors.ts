import { MARKETPLACE_PATH, PLUGIN_MANIFEST_PATH, SKILLS_DIR, SKILL_FILENAME } from "./paths.js";

export class MarketplaceNotFoundError extends Error {
  constructor(public readonly root: string) {
    super(
      `No skills found in ${root}\n` +
        `Expected ${MARKETPLACE_PATH}, ${PLUGIN_MANIFEST_PATH} or a ${SKILLS_DIR}/ directory.`,
    );
    this.name = "MarketplaceNotFoundError";
  }
}

export class SkillNotFoundError extends Error {
  constructor(public readonly dir: string) {
    super(`No ${SKILL_FILENAME} in ${dir}`);
    this.name = "SkillNotFoundError";
  }
}
