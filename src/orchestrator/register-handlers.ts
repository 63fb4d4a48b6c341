import { AgentCoordinator } from './agent-coordinator';
import { WorkflowError } from './errors';
import type { StageExecutor } from '../agents/stage-executor';
import type { CompletenessVerificationLoop } from '../agents/verification-loop';
import { renderReadme } from '../agents/prompts/documentation';
import type { WorkflowLogger } from '../utils/logger';
import { silentLogger } from '../utils/logger';

export interface StageHandlerDependencies {
  executor: StageExecutor;
  verification: CompletenessVerificationLoop;
  logger?: WorkflowLogger;
}

function required<T>(value: T | undefined, what: string): T {
  if (value === undefined) {
    throw new WorkflowError(`Missing ${what}`);
  }
  return value;
}

/** Wires every stage of the build pipeline to the stage executor and the verification loop */
export function createStageCoordinator(deps: StageHandlerDependencies): AgentCoordinator {
  const { executor, verification } = deps;
  const logger = deps.logger ?? silentLogger;
  const coordinator = new AgentCoordinator();

  // ── RequirementsAnalysis ──────────────────────────────────────────────

  coordinator.registerHandler('RequirementsAnalysis', async (state, { signal }) => {
    const result = await executor.run('requirements', { task: state.taskQuery, conversation: [...state.conversation] }, { signal });
    state.setRequirements(result.parsed);
    logger.info(`Extracted ${result.parsed.requirements.length} requirement(s)`, { attempts: result.validationAttempts });
  });

  // ── Design ────────────────────────────────────────────────────────────

  coordinator.registerHandler('Design', async (state, { signal }) => {
    const requirements = required(state.requirements, 'requirements');
    const result = await executor.run('design', { task: state.taskQuery, requirements }, { signal });
    state.setDesign(result.parsed);
    logger.info(`Design has ${result.parsed.components.length} component(s)`, { attempts: result.validationAttempts });
  });

  // ── StructureProposal ─────────────────────────────────────────────────

  coordinator.registerHandler('StructureProposal', async (state, { signal }) => {
    const result = await executor.run(
      'structure',
      {
        task: state.taskQuery,
        requirements: required(state.requirements, 'requirements'),
        design: required(state.design, 'design'),
        existingFiles: Object.keys(state.priorFiles),
      },
      { signal },
    );
    state.setManifest(result.parsed.files);
    logger.info(`Planned ${result.parsed.files.length} file(s)`, { files: result.parsed.files.map((f) => f.path) });
  });

  // ── CodeGeneration ────────────────────────────────────────────────────

  coordinator.registerHandler('CodeGeneration', async (state, { signal }) => {
    const requirements = required(state.requirements, 'requirements');
    const design = required(state.design, 'design');
    const manifest = [...state.fileManifest];

    // Generated aside and merged once, so a failure part-way leaves no partial file set
    const generated: Record<string, string> = {};
    for (const target of manifest) {
      const result = await executor.run('generate_file', { task: state.taskQuery, requirements, design, manifest, target, previousContent: state.priorFiles[target.path] }, { signal });
      generated[target.path] = result.parsed.content;
      logger.debug(`Generated ${target.path}`, { attempts: result.validationAttempts });
    }

    state.mergeFiles(generated);
    logger.info(`Generated ${manifest.length} file(s)`);
  });

  // ── CompletenessVerification ──────────────────────────────────────────

  coordinator.registerHandler('CompletenessVerification', async (state, { signal, loopBack }) => {
    const outcome = await verification.run(state, { signal, onRegenerate: () => loopBack() });
    logger.info(`Verification ${outcome.outcome === 'passed' ? 'passed' : 'budget exhausted'} after ${outcome.iterations} iteration(s)`);
  });

  // ── Documentation ─────────────────────────────────────────────────────

  coordinator.registerHandler('Documentation', async (state, { signal }) => {
    const result = await executor.run(
      'documentation',
      {
        task: state.taskQuery,
        requirements: required(state.requirements, 'requirements'),
        design: required(state.design, 'design'),
        manifest: [...state.fileManifest],
      },
      { signal },
    );
    state.setDocumentation({ output: result.parsed, readme: renderReadme(result.parsed) });
  });

  return coordinator;
}
