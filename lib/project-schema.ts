import { z } from 'zod';

const StringListSchema = z.array(z.string());

const TargetNameSchema = z.string().min(1, 'must be a non-empty string');

export const StaticLibrarySchema = z.object({
  type: z.literal('static-library'),
  /** File name of the library, for example `libfoo.a` */
  name: TargetNameSchema,
  /** Names of the objects to archive, for example `foo.o` */
  objects: StringListSchema,
});

export const SharedLibrarySchema = z.object({
  type: z.literal('shared-library'),
  name: TargetNameSchema,
  objects: StringListSchema,
});

export const ExecutableSchema = z.object({
  type: z.literal('executable'),
  name: TargetNameSchema,
  /** Sources (`main.c`) and objects (`foo.o`) to link */
  dependencies: StringListSchema,
});

/**
 * A single build target
 */
export const TargetSchema = z.discriminatedUnion('type', [StaticLibrarySchema, SharedLibrarySchema, ExecutableSchema]);

/** Where things live, relative to the project file */
export const LayoutSchema = z.object({
  sourceDir: z.string().optional(),
  testDir: z.string().optional(),
  objectDir: z.string().optional(),
  binDir: z.string().optional(),
  testBinDir: z.string().optional(),
});

export const ToolchainSchema = z.object({
  cc: z.string().optional(),
  ar: z.string().optional(),
  cflags: StringListSchema.optional(),
  ldflags: StringListSchema.optional(),
});

/**
 * Contents of cbuild.json
 */
export const ProjectSchema = z.object({
  layout: LayoutSchema.optional(),
  toolchain: ToolchainSchema.optional(),
  /** Build targets, built in this order */
  targets: z.array(TargetSchema),
});

export type ProjectJson = z.infer<typeof ProjectSchema>;
export type TargetDefinition = z.infer<typeof TargetSchema>;
export type ToolchainJson = z.infer<typeof ToolchainSchema>;

export function targetRepr(target: TargetDefinition): string {
  return `${target.type}:${target.name}`;
}
