import { z } from "zod";

const PackageJsonVersionSourceSchema = z
  .object({
    type: z.literal("package-json"),
    path: z.string().min(1).default("package.json"),
  })
  .strict();

const FileVersionSourceSchema = z
  .object({
    type: z.literal("file"),
    path: z.string().min(1),
    // Optional regex; the first capture group (or the whole match) is the version.
    pattern: z.string().min(1).optional(),
  })
  .strict();

const CommandVersionSourceSchema = z
  .object({
    type: z.literal("command"),
    command: z.string().min(1),
  })
  .strict();

export const VersionSourceSchema = z.discriminatedUnion("type", [
  PackageJsonVersionSourceSchema,
  FileVersionSourceSchema,
  CommandVersionSourceSchema,
]);

export type VersionSource = z.infer<typeof VersionSourceSchema>;

export const ReleaseConfigSchema = z
  .object({
    project_name: z.string().min(1).optional(),
    release_branch: z.string().min(1).default("master"),

    tag_prefix: z.string().default(""),
    tag_message: z.string().min(1).default("Release {tag}"),

    version_source: VersionSourceSchema.default({ type: "package-json" }),

    // External tag helper. When unset the built-in git tagger is used.
    tag_command: z.string().min(1).optional(),
    push_tag: z.boolean().default(false),
    remote: z.string().min(1).default("origin"),

    log_file: z.string().min(1).optional(),
  })
  .strict();

export type ReleaseConfig = z.infer<typeof ReleaseConfigSchema>;

export function defaultReleaseConfig(): ReleaseConfig {
  return ReleaseConfigSchema.parse({});
}
