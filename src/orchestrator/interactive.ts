import { diffLines } from 'diff';
import type { ConversationTurn } from '../agents/schemas';
import type { RunOptions, WorkflowResult } from './workflow';
import type { WorkflowState } from './workflow-state';
import { WorkflowError } from './errors';

export type RunTurn = (task: string, options: RunOptions) => Promise<WorkflowResult>;

export interface FileChange {
  path: string;
  kind: 'added' | 'modified' | 'removed' | 'unchanged';
  added: number;
  removed: number;
}

export interface TurnResult {
  reply: string;
  state: WorkflowState;
  result: WorkflowResult;
  changes: FileChange[];
}

interface ConfirmedBase {
  conversation: ConversationTurn[];
  files: Record<string, string>;
}

/** Line-level change counts between the confirmed files and a turn's files */
export function summarizeChanges(before: Readonly<Record<string, string>>, after: Readonly<Record<string, string>>): FileChange[] {
  const paths = [...new Set([...Object.keys(before), ...Object.keys(after)])].sort();
  return paths.map((path): FileChange => {
    const previous = before[path];
    const next = after[path];
    if (previous === undefined) {
      return { path, kind: 'added', added: countLines(next), removed: 0 };
    }
    if (next === undefined) {
      return { path, kind: 'removed', added: 0, removed: countLines(previous) };
    }
    let added = 0;
    let removed = 0;
    for (const part of diffLines(previous, next)) {
      if (part.added) added += part.count ?? countLines(part.value);
      else if (part.removed) removed += part.count ?? countLines(part.value);
    }
    return { path, kind: added + removed > 0 ? 'modified' : 'unchanged', added, removed };
  });
}

function countLines(text: string): number {
  if (text.length === 0) return 0;
  return text.split('\n').length - (text.endsWith('\n') ? 1 : 0);
}

export function composeReply(result: WorkflowResult, changes: FileChange[]): string {
  if (result.status === 'failed') {
    const failure = result.failure;
    return failure ? `I could not finish: ${failure.stage} failed (${failure.kind}). ${failure.message}` : 'I could not finish this request.';
  }

  const touched = changes.filter((c) => c.kind !== 'unchanged');
  const lines = [touched.length > 0 ? `I updated ${touched.length} file(s): ${touched.map((c) => c.path).join(', ')}.` : 'No files changed.'];

  const verification = result.verification;
  if (verification?.passed) {
    lines.push(`Verification passed after ${verification.iterations} iteration(s).`);
  } else if (verification?.exhausted) {
    lines.push(`Verification did not pass within ${verification.iterations} iteration(s); the latest files are unverified.`);
  }
  return lines.join(' ');
}

/**
 * Turn-based front end over the workflow. Every turn starts a fresh run
 * from `Start`, seeded with the last confirmed conversation and files; a
 * turn's outcome becomes the next base only once confirmed.
 */
export class InteractiveSession {
  private base: ConfirmedBase = { conversation: [], files: {} };
  private pending?: { message: string; turn: TurnResult };

  constructor(private runTurn: RunTurn) {}

  get conversation(): readonly ConversationTurn[] {
    return this.base.conversation;
  }

  get confirmedFiles(): Readonly<Record<string, string>> {
    return this.base.files;
  }

  hasPendingTurn(): boolean {
    return this.pending !== undefined;
  }

  async handleTurn(message: string, options: { signal?: AbortSignal } = {}): Promise<TurnResult> {
    if (this.pending) {
      throw new WorkflowError('Confirm or discard the previous turn first');
    }

    const result = await this.runTurn(message, {
      signal: options.signal,
      conversation: this.base.conversation.map((t) => ({ ...t })),
      priorFiles: { ...this.base.files },
    });

    const changes = summarizeChanges(this.base.files, result.files);
    const turn: TurnResult = { reply: composeReply(result, changes), state: result.state, result, changes };
    this.pending = { message, turn };
    return turn;
  }

  /** Makes the pending turn the base for the next one */
  confirm(): void {
    const pending = this.requirePending();
    if (pending.turn.result.status !== 'done') {
      throw new WorkflowError('Only a completed turn can be confirmed');
    }
    this.base = {
      conversation: [...this.base.conversation, { role: 'user', content: pending.message }, { role: 'agent', content: pending.turn.reply }],
      // The turn's file set replaces the base, so files reported as removed are dropped
      files: { ...pending.turn.result.files },
    };
    this.pending = undefined;
  }

  discard(): void {
    this.requirePending();
    this.pending = undefined;
  }

  private requirePending(): { message: string; turn: TurnResult } {
    if (!this.pending) {
      throw new WorkflowError('No turn is waiting for confirmation');
    }
    return this.pending;
  }
}
