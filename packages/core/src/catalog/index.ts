export { buildCatalog, findSkills } from "./catalog.js";
export type { Catalog, CatalogPlugin, CatalogSkill } from "./catalog.js";
