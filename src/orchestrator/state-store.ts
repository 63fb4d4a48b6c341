import fs from 'fs/promises';
import path from 'path';
import type { FailureReport, State } from './states';
import type { WorkflowStateSnapshot } from './workflow-state';

export interface PersistedState {
  runId: string;
  currentState: State;
  updatedAt: string;
  history: State[];
  state: WorkflowStateSnapshot;
  error?: FailureReport;
}

/** Writes the latest machine state of one run to `<dir>/<runId>/state.json` */
export class StateStore {
  readonly storagePath: string;

  constructor(stateDir: string, runId: string) {
    this.storagePath = path.join(stateDir, runId, 'state.json');
  }

  async save(state: PersistedState): Promise<void> {
    await fs.mkdir(path.dirname(this.storagePath), { recursive: true });
    await fs.writeFile(this.storagePath, JSON.stringify(state, null, 2), 'utf-8');
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.storagePath);
      return true;
    } catch {
      return false;
    }
  }
}
