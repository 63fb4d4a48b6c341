import type { ConversationTurn, DesignOutput, DocumentationOutput, GeneratedFile, ManifestEntry, MissingElement, RequirementsOutput } from '../agents/schemas';
import type { State } from './states';
import { WorkflowError } from './errors';

export type VerificationStatus = 'pass' | 'incomplete' | 'execution_error';

export interface VerificationReport {
  readonly iteration: number;
  readonly status: VerificationStatus;
  readonly missingElements: readonly Readonly<MissingElement>[];
  /** Files the report holds responsible; empty on `pass` */
  readonly failingFiles: readonly string[];
  /** Absent when execution was not attempted */
  readonly executionLog?: string;
  readonly timestamp: string;
}

export function createVerificationReport(fields: Omit<VerificationReport, 'timestamp'> & { timestamp?: string }): VerificationReport {
  const report: VerificationReport = {
    iteration: fields.iteration,
    status: fields.status,
    missingElements: Object.freeze(fields.missingElements.map((m) => Object.freeze({ ...m }))),
    failingFiles: Object.freeze([...fields.failingFiles]),
    ...(fields.executionLog !== undefined ? { executionLog: fields.executionLog } : {}),
    timestamp: fields.timestamp ?? new Date().toISOString(),
  };
  return Object.freeze(report);
}

export interface RenderedDocumentation {
  output: DocumentationOutput;
  readme: string;
}

export interface WorkflowStateSnapshot {
  taskQuery: string;
  maxIterations: number;
  requirements?: RequirementsOutput;
  design?: DesignOutput;
  fileManifest: ManifestEntry[];
  generatedFiles: Record<string, string>;
  priorFiles: Record<string, string>;
  verificationHistory: VerificationReport[];
  stage: State;
  iterationCount: number;
  documentation?: RenderedDocumentation;
  conversation: ConversationTurn[];
  version: number;
}

export interface WorkflowStateInit {
  maxIterations: number;
  conversation?: ConversationTurn[];
  /** Files confirmed in an earlier interactive turn; context only, never merged */
  priorFiles?: Record<string, string>;
}

/**
 * Context threaded through every stage of one run. Fields change only
 * through the named operations below; each one bumps `version`.
 */
export class WorkflowState {
  readonly taskQuery: string;
  readonly maxIterations: number;

  private _requirements?: RequirementsOutput;
  private _design?: DesignOutput;
  private _manifest: ManifestEntry[] = [];
  private _files: Record<string, string> = {};
  private _priorFiles: Record<string, string>;
  private _history: VerificationReport[] = [];
  private _stage: State = 'Start';
  private _iterationCount = 0;
  private _documentation?: RenderedDocumentation;
  private _conversation: ConversationTurn[];
  private _version = 0;

  constructor(taskQuery: string, init: WorkflowStateInit) {
    if (!Number.isInteger(init.maxIterations) || init.maxIterations < 1) {
      throw new WorkflowError(`maxIterations must be a positive integer, got ${init.maxIterations}`);
    }
    this.taskQuery = taskQuery;
    this.maxIterations = init.maxIterations;
    this._conversation = (init.conversation ?? []).map((turn) => ({ ...turn }));
    this._priorFiles = { ...(init.priorFiles ?? {}) };
  }

  // ── Reads ───────────────────────────────────────────────────────────

  get requirements(): RequirementsOutput | undefined {
    return this._requirements;
  }

  get design(): DesignOutput | undefined {
    return this._design;
  }

  get fileManifest(): readonly ManifestEntry[] {
    return this._manifest;
  }

  get manifestPaths(): string[] {
    return this._manifest.map((entry) => entry.path);
  }

  get generatedFiles(): Readonly<Record<string, string>> {
    return this._files;
  }

  get priorFiles(): Readonly<Record<string, string>> {
    return this._priorFiles;
  }

  get verificationHistory(): readonly VerificationReport[] {
    return this._history;
  }

  get stage(): State {
    return this._stage;
  }

  get iterationCount(): number {
    return this._iterationCount;
  }

  get documentation(): RenderedDocumentation | undefined {
    return this._documentation;
  }

  get conversation(): readonly ConversationTurn[] {
    return this._conversation;
  }

  get version(): number {
    return this._version;
  }

  // ── Named mutations ─────────────────────────────────────────────────

  setRequirements(requirements: RequirementsOutput): void {
    if (this._requirements) throw new WorkflowError('Requirements are already set for this run');
    this._requirements = structuredClone(requirements);
    this.bump();
  }

  setDesign(design: DesignOutput): void {
    if (this._design) throw new WorkflowError('Design is already set; use reviseDesign to replace it');
    this._design = structuredClone(design);
    this.bump();
  }

  reviseDesign(design: DesignOutput): void {
    if (!this._design) throw new WorkflowError('No design to revise');
    this._design = structuredClone(design);
    this.bump();
  }

  setManifest(entries: ManifestEntry[]): void {
    const paths = new Set(entries.map((e) => e.path));
    const orphaned = Object.keys(this._files).filter((p) => !paths.has(p));
    if (orphaned.length > 0) {
      throw new WorkflowError(`Manifest would orphan generated files: ${orphaned.join(', ')}`);
    }
    this._manifest = entries.map((e) => ({ ...e }));
    this.bump();
  }

  /**
   * Replaces the named files in one swap. Files not named are untouched;
   * a set containing any path outside the manifest is rejected whole.
   */
  mergeFiles(files: GeneratedFile[] | Record<string, string>): void {
    const incoming = Array.isArray(files) ? files : Object.entries(files).map(([path, content]) => ({ path, content }));
    const known = new Set(this.manifestPaths);
    const unknown = incoming.filter((f) => !known.has(f.path)).map((f) => f.path);
    if (unknown.length > 0) {
      throw new WorkflowError(`Cannot merge files outside the manifest: ${unknown.join(', ')}`);
    }

    const next = { ...this._files };
    for (const file of incoming) {
      next[file.path] = file.content;
    }
    this._files = next;
    this.bump();
  }

  appendReport(report: VerificationReport): void {
    if (this._history.length >= this.maxIterations) {
      throw new WorkflowError(`Verification history is full (${this.maxIterations} report(s))`);
    }
    this._history = [...this._history, report];
    this.bump();
  }

  resetIterations(): void {
    this._iterationCount = 0;
    this.bump();
  }

  incrementIteration(): void {
    this._iterationCount += 1;
    this.bump();
  }

  setDocumentation(documentation: RenderedDocumentation): void {
    this._documentation = structuredClone(documentation);
    this.bump();
  }

  setStage(stage: State): void {
    this._stage = stage;
    this.bump();
  }

  // ── Serialization ───────────────────────────────────────────────────

  snapshot(): WorkflowStateSnapshot {
    return structuredClone({
      taskQuery: this.taskQuery,
      maxIterations: this.maxIterations,
      requirements: this._requirements,
      design: this._design,
      fileManifest: this._manifest,
      generatedFiles: this._files,
      priorFiles: this._priorFiles,
      verificationHistory: this._history,
      stage: this._stage,
      iterationCount: this._iterationCount,
      documentation: this._documentation,
      conversation: this._conversation,
      version: this._version,
    });
  }

  static fromSnapshot(snapshot: WorkflowStateSnapshot): WorkflowState {
    const copy = structuredClone(snapshot);
    const state = new WorkflowState(copy.taskQuery, { maxIterations: copy.maxIterations, conversation: copy.conversation, priorFiles: copy.priorFiles });
    state._requirements = copy.requirements;
    state._design = copy.design;
    state._manifest = copy.fileManifest;
    state._files = copy.generatedFiles;
    state._history = copy.verificationHistory.map((r) => createVerificationReport(r));
    state._stage = copy.stage;
    state._iterationCount = copy.iterationCount;
    state._documentation = copy.documentation;
    state._version = copy.version;
    return state;
  }

  private bump(): void {
    this._version += 1;
  }
}
