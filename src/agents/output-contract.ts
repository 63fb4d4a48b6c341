import { z } from 'zod';
import { OutputValidationError } from '../orchestrator/errors';
import type { OutputIssue } from '../orchestrator/errors';
import {
  CompletenessCheckSchema,
  DesignOutputSchema,
  DocumentationOutputSchema,
  GeneratedFileSchema,
  RegenerationOutputSchema,
  RequirementsOutputSchema,
  StructureOutputSchema,
} from './schemas';
import type { StageId, StageInputs, StageOutputs } from './schemas';
import { buildDesignPrompt, buildRequirementsPrompt, buildStructurePrompt, DESIGN_SCHEMA_HINT, REQUIREMENTS_SCHEMA_HINT, STRUCTURE_SCHEMA_HINT } from './prompts/planning';
import { getFileGenerationPrompt, getRegenerationPrompt, GENERATE_FILE_SCHEMA_HINT, REGENERATE_SCHEMA_HINT } from './prompts/code-generation';
import { buildCompletenessPrompt, COMPLETENESS_SCHEMA_HINT } from './prompts/verification';
import { buildDocumentationPrompt, DOCUMENTATION_SCHEMA_HINT } from './prompts/documentation';

/** Everything the executor needs to run one stage against the LLM */
export interface StageContract<S extends StageId> {
  stage: S;
  schema: z.ZodType<StageOutputs[S], z.ZodTypeDef, unknown>;
  schemaHint: string;
  buildPrompt(input: StageInputs[S]): string;
  /** Constraints on the value alone, checked whenever the schema passes */
  invariant?(value: StageOutputs[S]): OutputIssue[];
  /** Constraints that depend on the request, checked when the input is known */
  check?(value: StageOutputs[S], input: StageInputs[S]): OutputIssue[];
}

export type ValidationOutcome<T> = { kind: 'valid'; value: T } | { kind: 'invalid'; error: OutputValidationError };

export const STAGE_CONTRACTS: { [S in StageId]: StageContract<S> } = {
  requirements: {
    stage: 'requirements',
    schema: RequirementsOutputSchema,
    schemaHint: REQUIREMENTS_SCHEMA_HINT,
    buildPrompt: buildRequirementsPrompt,
  },
  design: {
    stage: 'design',
    schema: DesignOutputSchema,
    schemaHint: DESIGN_SCHEMA_HINT,
    buildPrompt: buildDesignPrompt,
  },
  structure: {
    stage: 'structure',
    schema: StructureOutputSchema,
    schemaHint: STRUCTURE_SCHEMA_HINT,
    buildPrompt: buildStructurePrompt,
  },
  generate_file: {
    stage: 'generate_file',
    schema: GeneratedFileSchema,
    schemaHint: GENERATE_FILE_SCHEMA_HINT,
    buildPrompt: getFileGenerationPrompt,
    check: (value, input) => (value.path === input.target.path ? [] : [{ path: 'path', kind: 'constraint', message: `expected "${input.target.path}" but got "${value.path}"` }]),
  },
  completeness_check: {
    stage: 'completeness_check',
    schema: CompletenessCheckSchema,
    schemaHint: COMPLETENESS_SCHEMA_HINT,
    buildPrompt: buildCompletenessPrompt,
    invariant: (value) => (value.complete && value.missingElements.length > 0 ? [{ path: 'complete', kind: 'constraint', message: 'is true but missingElements is not empty' }] : []),
  },
  regenerate: {
    stage: 'regenerate',
    schema: RegenerationOutputSchema,
    schemaHint: REGENERATE_SCHEMA_HINT,
    buildPrompt: getRegenerationPrompt,
    check: (value, input) => {
      const allowed = input.targets.map((t) => t.path);
      const issues: OutputIssue[] = [];
      value.files.forEach((file, index) => {
        if (!allowed.includes(file.path)) {
          issues.push({ path: `files[${index}].path`, kind: 'constraint', message: `"${file.path}" is not one of the files to fix (${allowed.join(', ')})` });
        }
      });
      return issues;
    },
  },
  documentation: {
    stage: 'documentation',
    schema: DocumentationOutputSchema,
    schemaHint: DOCUMENTATION_SCHEMA_HINT,
    buildPrompt: buildDocumentationPrompt,
  },
};

/**
 * Validates a raw model response against the contract of `stage`.
 * Pure: the same input always yields the same outcome.
 */
export function validateStageOutput<S extends StageId>(stage: S, raw: string, input?: StageInputs[S]): ValidationOutcome<StageOutputs[S]> {
  const contract: StageContract<S> = STAGE_CONTRACTS[stage];

  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonObject(raw));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { kind: 'invalid', error: new OutputValidationError(stage, [{ path: '(root)', kind: 'malformed_json', message: `response is not valid JSON (${reason})` }]) };
  }

  const result = contract.schema.safeParse(parsed);
  if (!result.success) {
    return { kind: 'invalid', error: new OutputValidationError(stage, result.error.issues.map(toOutputIssue)) };
  }

  const extra = [...(contract.invariant?.(result.data) ?? []), ...(input !== undefined && contract.check ? contract.check(result.data, input) : [])];
  if (extra.length > 0) {
    return { kind: 'invalid', error: new OutputValidationError(stage, extra) };
  }

  return { kind: 'valid', value: result.data };
}

/** Strips markdown fences and surrounding prose, keeping the outermost JSON object */
export function extractJsonObject(text: string): string {
  const trimmed = text.trim();

  const fenceMatch = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  const unfenced = fenceMatch?.[1] ? fenceMatch[1].trim() : trimmed;

  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');

  if (start === -1 || end === -1 || end <= start) {
    return unfenced;
  }

  return unfenced.slice(start, end + 1);
}

export function formatIssuePath(path: (string | number)[]): string {
  if (path.length === 0) return '(root)';
  return path.reduce<string>((acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : acc ? `${acc}.${segment}` : segment), '');
}

function toOutputIssue(issue: z.ZodIssue): OutputIssue {
  const path = formatIssuePath(issue.path);
  if (issue.code === z.ZodIssueCode.invalid_type) {
    return issue.received === 'undefined' ? { path, kind: 'missing', message: `required ${issue.expected} is absent` } : { path, kind: 'wrong_type', message: `expected ${issue.expected}, received ${issue.received}` };
  }
  return { path, kind: 'constraint', message: issue.message };
}
