import { z } from "zod";

const KEBAB_CASE = /^[a-z0-9]+(-[a-z0-9]+)*$/;
const KEBAB_MESSAGE = "must be kebab-case (lowercase letters, digits and single hyphens)";

export const SKILL_NAME_MAX = 64;
export const SKILL_DESCRIPTION_MAX = 1024;

const kebabName = z
  .string({ required_error: "is required" })
  .min(1, "must not be empty")
  .regex(KEBAB_CASE, KEBAB_MESSAGE);

const personSchema = z
  .object({
    name: z.string({ required_error: "is required" }).min(1, "must not be empty"),
    email: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

const githubSourceSchema = z
  .object({
    source: z.literal("github"),
    repo: z.string().regex(/^[\w.-]+\/[\w.-]+$/, "must look like owner/repo"),
    ref: z.string().optional(),
  })
  .passthrough();

const urlSourceSchema = z
  .object({
    source: z.literal("url"),
    url: z.string().url("must be a valid URL"),
    ref: z.string().optional(),
  })
  .passthrough();

export const pluginSourceSchema = z.union([
  z.string().min(1, "must not be empty"),
  githubSourceSchema,
  urlSourceSchema,
]);

export const marketplacePluginEntrySchema = z
  .object({
    name: kebabName,
    source: pluginSourceSchema,
    description: z.string().optional(),
    version: z.string().optional(),
    author: personSchema.optional(),
    homepage: z.string().optional(),
    repository: z.string().optional(),
    license: z.string().optional(),
    keywords: z.array(z.string()).optional(),
    category: z.string().optional(),
    tags: z.array(z.string()).optional(),
    strict: z.boolean().optional(),
    skills: z.array(z.string().min(1, "must not be empty")).optional(),
  })
  .passthrough();

export const marketplaceManifestSchema = z
  .object({
    name: kebabName,
    owner: personSchema,
    metadata: z
      .object({
        description: z.string().optional(),
        version: z.string().optional(),
        pluginRoot: z.string().optional(),
      })
      .passthrough()
      .optional(),
    plugins: z.array(marketplacePluginEntrySchema, { required_error: "is required" }),
  })
  .passthrough();

export const pluginManifestSchema = z
  .object({
    name: kebabName,
    version: z.string().optional(),
    description: z.string().optional(),
    author: personSchema.optional(),
    homepage: z.string().optional(),
    repository: z.string().optional(),
    license: z.string().optional(),
    keywords: z.array(z.string()).optional(),
  })
  .passthrough();

export const skillFrontmatterSchema = z
  .object({
    name: kebabName.max(SKILL_NAME_MAX, `must be at most ${SKILL_NAME_MAX} characters`),
    description: z
      .string({ required_error: "is required" })
      .trim()
      .min(1, "must not be empty")
      .max(SKILL_DESCRIPTION_MAX, `must be at most ${SKILL_DESCRIPTION_MAX} characters`),
    license: z.string().optional(),
    version: z.union([z.string(), z.number()]).optional(),
    "allowed-tools": z.union([z.string(), z.array(z.string())]).optional(),
    metadata: z.record(z.string()).optional(),
  })
  .passthrough();

export type PluginSource = z.infer<typeof pluginSourceSchema>;
export type MarketplacePluginEntry = z.infer<typeof marketplacePluginEntrySchema>;
export type MarketplaceManifest = z.infer<typeof marketplaceManifestSchema>;
export type PluginManifest = z.infer<typeof pluginManifestSchema>;
export type SkillFrontmatter = z.infer<typeof skillFrontmatterSchema>;

export type SchemaResult<T> = { ok: true; value: T } | { ok: false; issues: string[] };

/**
 * Render zod issues as `path.to.key: message`, root-level issues without a prefix.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): SchemaResult<T> {
  const result = schema.safeParse(data);
  if (result.success) return { ok: true, value: result.data };
  return { ok: false, issues: formatIssues(result.error) };
}

export function parseMarketplaceManifest(data: unknown): SchemaResult<MarketplaceManifest> {
  return parseWith(marketplaceManifestSchema, data);
}

export function parsePluginManifest(data: unknown): SchemaResult<PluginManifest> {
  return parseWith(pluginManifestSchema, data);
}

export function parseSkillFrontmatter(data: unknown): SchemaResult<SkillFrontmatter> {
  return parseWith(skillFrontmatterSchema, data);
}

export function isKebabCase(value: string): boolean {
  return KEBAB_CASE.test(value);
}
