import type { Config } from '../config/validator';
import { assertCredentials } from '../config/validator';
import type { LlmCollaborator } from '../agents/llm-collaborator';
import { GeminiCollaborator } from '../agents/gemini-collaborator';
import { StageExecutor } from '../agents/stage-executor';
import { CompletenessVerificationLoop } from '../agents/verification-loop';
import type { SandboxExecutionClient } from '../testing/types';
import { SandboxedExecutionClient } from '../testing/execution-client';
import { E2BSandboxProvider } from '../testing/sandbox';
import type { WorkflowLogger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import { createStageCoordinator } from './register-handlers';
import { WorkflowOrchestrator } from './workflow';
import type { WorkflowResult } from './workflow';
import { InteractiveSession } from './interactive';
import { ArtifactStore } from './artifact-store';
import type { WrittenArtifacts } from './artifact-store';
import { compileWorkflow } from './graph';
import type { StateChangeEvent } from './events';
import type { CompiledWorkflow } from './graph';

export interface EngineSettings {
  maxIterations: number;
  maxRepairAttempts?: number;
  stageTimeoutMs?: number;
  executionTimeoutMs?: number;
  commandHint?: string;
  /** Per-run state files go here; off when omitted */
  stateDir?: string;
}

export interface EngineDependencies {
  llm: LlmCollaborator;
  sandbox: SandboxExecutionClient;
  logger?: WorkflowLogger;
  artifacts?: ArtifactStore;
  onTransition?: (event: StateChangeEvent) => void;
}

export interface WorkflowRunResult extends WorkflowResult {
  artifacts?: WrittenArtifacts;
}

/** The three run modes over one set of collaborators */
export class AutobuildEngine {
  private orchestrator: WorkflowOrchestrator;
  private artifacts: ArtifactStore;

  constructor(deps: EngineDependencies, settings: EngineSettings) {
    const logger = deps.logger ?? silentLogger;
    const executor = new StageExecutor(deps.llm, {
      maxRepairAttempts: settings.maxRepairAttempts,
      timeoutMs: settings.stageTimeoutMs,
      logger,
    });
    const verification = new CompletenessVerificationLoop(executor, deps.sandbox, {
      maxIterations: settings.maxIterations,
      executionTimeoutMs: settings.executionTimeoutMs,
      commandHint: settings.commandHint,
      logger,
    });

    this.orchestrator = new WorkflowOrchestrator({
      coordinator: createStageCoordinator({ executor, verification, logger }),
      maxIterations: settings.maxIterations,
      stateDir: settings.stateDir,
      logger,
      onTransition: deps.onTransition,
    });
    this.artifacts = deps.artifacts ?? new ArtifactStore();
  }

  static fromConfig(config: Config, options: { logger?: WorkflowLogger; onTransition?: (event: StateChangeEvent) => void } = {}): AutobuildEngine {
    const { logger, onTransition } = options;
    assertCredentials(config);
    const llm = new GeminiCollaborator({
      apiKey: config.llm.api_key,
      model: config.llm.model,
      temperature: config.llm.temperature,
      maxOutputTokens: config.llm.max_output_tokens,
      timeoutMs: config.llm.request_timeout_ms,
    });
    const sandbox = new SandboxedExecutionClient(new E2BSandboxProvider({ apiKey: config.sandbox.api_key, defaultTemplate: config.sandbox.template }), {
      template: config.sandbox.template,
      workdir: config.sandbox.workdir,
      logger,
    });
    return new AutobuildEngine(
      { llm, sandbox, logger, onTransition },
      {
        maxIterations: config.workflow.max_iterations,
        maxRepairAttempts: config.workflow.max_repair_attempts,
        stageTimeoutMs: config.workflow.stage_timeout_ms,
        executionTimeoutMs: config.sandbox.execution_timeout_ms,
        stateDir: config.output.state_dir,
      },
    );
  }

  /** Unattended run to `Done` or `Failed`; writes the output when `outputDir` is set */
  async runWorkflow(task: string, options: { outputDir?: string; signal?: AbortSignal } = {}): Promise<WorkflowRunResult> {
    const result = await this.orchestrator.run(task, { signal: options.signal });
    if (!options.outputDir) return result;

    const artifacts = await this.artifacts.write(options.outputDir, result);
    return { ...result, artifacts };
  }

  startSession(): InteractiveSession {
    return new InteractiveSession((task, runOptions) => this.orchestrator.run(task, runOptions));
  }

  compile(task: string): CompiledWorkflow {
    return compileWorkflow(task);
  }
}
