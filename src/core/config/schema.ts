import { z } from 'zod';

/**
 * Make a nested object optional and fill its inner defaults when missing.
 * Zod 4 does not re-parse `.default({})`, so inner defaults would be skipped.
 * Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Which markdown files make up the documentation tree. */
export const DocsSchema = z.object({
  include: z.array(z.string()).default(['**/*.md']),
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/dist/**',
    '**/.git/**',
  ]),
});

/** The two hand-maintained index documents the scaffolder reminds about. */
export const IndexFilesSchema = z.object({
  root_guide: z.string().min(1).default('CLAUDE.md'),
  readme: z.string().min(1).default('README.md'),
});

function toolSchema(command: string, config: string | null) {
  return z.object({
    command: z.string().min(1).default(command),
    /** Configuration file passed with --config; null lets the tool discover its own */
    config: z.string().min(1).nullable().default(config),
  });
}

export const ToolsSchema = z.object({
  formatter: withDefaults(toolSchema('prettier', null)),
  structural_linter: withDefaults(toolSchema('markdownlint', '.markdownlint.json')),
  prose_linter: withDefaults(toolSchema('vale', '.vale.ini')),
});

/**
 * Prose linting runs over a curated subset only. `exclude` is the explicit
 * list of directories not yet migrated to the current ruleset.
 */
export const ProseSchema = z.object({
  include: z.array(z.string()).default(['*.md']),
  exclude: z.array(z.string()).default([]),
  /** Report prose failures without failing the run */
  advisory: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  docs: withDefaults(DocsSchema),
  index: withDefaults(IndexFilesSchema),
  tools: withDefaults(ToolsSchema),
  prose: withDefaults(ProseSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ToolConfig = Config['tools']['formatter'];
