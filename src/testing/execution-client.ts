import { detectProject } from './project-detector';
import type { ExecutionOutcome, ExecutionRequest, ProjectType, SandboxExecutionClient, SandboxProvider, SandboxSession } from './types';
import { throwIfAborted, WorkflowCancelledError } from '../orchestrator/errors';
import { abortPromise } from '../utils/timeout';
import type { WorkflowLogger } from '../utils/logger';
import { silentLogger } from '../utils/logger';

export interface ExecutionClientOptions {
  template?: string;
  /** Directory inside the sandbox that receives the project */
  workdir?: string;
  logger?: WorkflowLogger;
}

/**
 * Runs a generated project in a fresh sandbox: upload, install, run.
 * The sandbox is created per call and always killed before returning.
 */
export class SandboxedExecutionClient implements SandboxExecutionClient {
  private workdir: string;
  private logger: WorkflowLogger;
  private killed = new WeakSet<SandboxSession>();

  constructor(
    private provider: SandboxProvider,
    private options: ExecutionClientOptions = {},
  ) {
    this.workdir = (options.workdir ?? '/home/user/project').replace(/\/+$/, '');
    this.logger = options.logger ?? silentLogger;
  }

  async execute(request: ExecutionRequest): Promise<ExecutionOutcome> {
    const profile = detectProject(request.files);
    const run = request.commandHint ?? profile.run;

    if (!run) {
      this.logger.debug('No runnable command for project', { projectType: profile.type });
      return notRun(profile.type);
    }

    throwIfAborted(request.signal);

    const sessions: SandboxSession[] = [];
    const abort = abortPromise(request.signal, () => new WorkflowCancelledError());
    const work = this.runInSandbox(request, profile.type, profile.install, run, (session) => sessions.push(session));

    try {
      return await Promise.race([work, abort.promise]);
    } catch (err) {
      if (request.signal?.aborted) {
        // The abandoned run settles after teardown; its outcome is no longer wanted
        work.catch((late: unknown) => this.logger.debug('Cancelled sandbox run settled', { error: String(late) }));
        throw new WorkflowCancelledError();
      }
      throw err;
    } finally {
      abort.dispose();
      await Promise.all(sessions.map((session) => this.teardown(session)));
    }
  }

  private async runInSandbox(request: ExecutionRequest, projectType: ProjectType, install: string[], run: string, track: (session: SandboxSession) => void): Promise<ExecutionOutcome> {
    const deadline = Date.now() + request.timeoutMs;
    const session = await this.provider.create({ template: this.options.template, timeoutMs: request.timeoutMs + 60_000 });
    track(session);

    if (request.signal?.aborted) {
      // Cancelled while the sandbox was starting; execute() has already torn down what it knew of
      await this.teardown(session);
      throw new WorkflowCancelledError();
    }

    for (const [path, content] of Object.entries(request.files)) {
      await session.writeFile(`${this.workdir}/${path}`, content);
    }

    for (const command of [...install, run]) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return { exitStatus: -1, stdout: '', stderr: `Execution budget of ${request.timeoutMs}ms spent before: ${command}`, timedOut: true, command, projectType };
      }

      this.logger.debug('Running sandbox command', { command });
      const result = await session.run(command, { timeoutMs: remaining, cwd: this.workdir });
      const outcome: ExecutionOutcome = {
        exitStatus: result.timedOut ? -1 : result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
        timedOut: result.timedOut,
        command,
        projectType,
      };

      if (command === run || outcome.timedOut || outcome.exitStatus !== 0) {
        return outcome;
      }
    }

    return notRun(projectType);
  }

  private async teardown(session: SandboxSession): Promise<void> {
    if (this.killed.has(session)) return;
    this.killed.add(session);
    try {
      await session.kill();
    } catch (err) {
      this.logger.warn('Failed to kill sandbox', { error: err instanceof Error ? err.message : String(err) });
    }
  }
}

function notRun(projectType: ProjectType): ExecutionOutcome {
  return { exitStatus: 0, stdout: '', stderr: '', timedOut: false, command: '', projectType };
}

export function wasExecuted(outcome: ExecutionOutcome): boolean {
  return outcome.command !== '';
}
