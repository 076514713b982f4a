import "./marketplace-manifest.js";
import "./unique-plugin-names.js";
import "./plugin-source.js";
import "./plugin-manifest.js";
import "./skill-declared-path.js";
import "./skill-frontmatter.js";
import "./skill-name-matches-directory.js";
import "./unique-skill-names.js";
import "./reference-links.js";
import "./orphan-references.js";
import "./markdown-structure.js";
