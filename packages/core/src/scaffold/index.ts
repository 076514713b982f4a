export { scaffoldSkill, writeFiles, titleCase, ScaffoldError } from "./skill.js";
export type { ScaffoldSkillOptions, WriteFilesOptions } from "./skill.js";
