import { z } from 'zod';

export const FILE_TYPES = ['source', 'test', 'config', 'documentation', 'script', 'data'] as const;

export type FileType = (typeof FILE_TYPES)[number];

/** Relative, forward-slash project path with no parent-directory segment */
export const ProjectPathSchema = z
  .string()
  .min(1)
  .refine((p) => !p.startsWith('/') && !/^[A-Za-z]:/.test(p), { message: 'path must be relative to the project root' })
  .refine((p) => !p.includes('\\'), { message: 'path must use "/" separators' })
  .refine((p) => !p.split('/').includes('..'), { message: 'path must not contain ".." segments' });

export const RequirementsOutputSchema = z.object({
  requirements: z.array(z.string().min(1)).min(1),
  dependencies: z.array(z.string()).default([]),
});

export const DesignOutputSchema = z.object({
  architecture: z.string().min(1),
  components: z.array(z.string()),
  dataModels: z.array(z.string()),
  apiEndpoints: z.array(z.string()).default([]),
  dependencies: z.array(z.string()),
});

export const ManifestEntrySchema = z.object({
  path: ProjectPathSchema,
  purpose: z.string().min(1),
  type: z.enum(FILE_TYPES),
});

export const StructureOutputSchema = z.object({
  description: z.string(),
  files: z
    .array(ManifestEntrySchema)
    .min(1)
    .superRefine((files, ctx) => {
      const seen = new Set<string>();
      files.forEach((file, index) => {
        if (seen.has(file.path)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'path'], message: `duplicate path "${file.path}"` });
        }
        seen.add(file.path);
      });
    }),
});

export const GeneratedFileSchema = z.object({
  path: ProjectPathSchema,
  content: z.string(),
});

export const MissingElementSchema = z.object({
  file: z.string().optional(),
  description: z.string().min(1),
});

export const CompletenessCheckSchema = z.object({
  complete: z.boolean(),
  missingElements: z.array(MissingElementSchema).default([]),
});

export const RegenerationOutputSchema = z.object({
  files: z.array(GeneratedFileSchema).min(1),
});

export const DocumentationOutputSchema = z.object({
  overview: z.string().min(1),
  installation: z.string(),
  usage: z.string(),
  fileDescriptions: z.record(z.string()).default({}),
});

export type RequirementsOutput = z.infer<typeof RequirementsOutputSchema>;
export type DesignOutput = z.infer<typeof DesignOutputSchema>;
export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;
export type StructureOutput = z.infer<typeof StructureOutputSchema>;
export type GeneratedFile = z.infer<typeof GeneratedFileSchema>;
export type MissingElement = z.infer<typeof MissingElementSchema>;
export type CompletenessCheck = z.infer<typeof CompletenessCheckSchema>;
export type RegenerationOutput = z.infer<typeof RegenerationOutputSchema>;
export type DocumentationOutput = z.infer<typeof DocumentationOutputSchema>;

// ── Stage inputs ────────────────────────────────────────────────────────

export interface ConversationTurn {
  role: 'user' | 'agent';
  content: string;
}

export interface RequirementsInput {
  task: string;
  conversation: ConversationTurn[];
}

export interface DesignInput {
  task: string;
  requirements: RequirementsOutput;
}

export interface StructureInput {
  task: string;
  requirements: RequirementsOutput;
  design: DesignOutput;
  existingFiles: string[];
}

export interface GenerateFileInput {
  task: string;
  requirements: RequirementsOutput;
  design: DesignOutput;
  manifest: ManifestEntry[];
  target: ManifestEntry;
  previousContent?: string;
}

export interface CompletenessCheckInput {
  requirements: RequirementsOutput;
  manifest: ManifestEntry[];
  files: Record<string, string>;
  executionLog?: string;
}

export type RegenerationReason = 'execution_failure' | 'missing_elements';

export interface RegenerationTarget {
  path: string;
  reason: RegenerationReason;
  details: string[];
  currentContent?: string;
}

export interface RegenerateInput {
  requirements: RequirementsOutput;
  design: DesignOutput;
  manifest: ManifestEntry[];
  targets: RegenerationTarget[];
  executionLog?: string;
}

export interface DocumentationInput {
  task: string;
  requirements: RequirementsOutput;
  design: DesignOutput;
  manifest: ManifestEntry[];
}

// ── Stage registry types ────────────────────────────────────────────────

export interface StageOutputs {
  requirements: RequirementsOutput;
  design: DesignOutput;
  structure: StructureOutput;
  generate_file: GeneratedFile;
  completeness_check: CompletenessCheck;
  regenerate: RegenerationOutput;
  documentation: DocumentationOutput;
}

export interface StageInputs {
  requirements: RequirementsInput;
  design: DesignInput;
  structure: StructureInput;
  generate_file: GenerateFileInput;
  completeness_check: CompletenessCheckInput;
  regenerate: RegenerateInput;
  documentation: DocumentationInput;
}

export type StageId = keyof StageOutputs;

export const STAGE_IDS: StageId[] = ['requirements', 'design', 'structure', 'generate_file', 'completeness_check', 'regenerate', 'documentation'];
