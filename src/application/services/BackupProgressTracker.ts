// =============================================================================
// RUTA: src/application/services/BackupProgressTracker.ts
// =============================================================================

import { InvalidProgressStateError } from '@/shared/errors/domain.errors';

export interface ProgressState {
  readonly completed: number;
  readonly total: number;
  readonly messages: number;
  readonly status: string;
}

export interface ProgressField {
  readonly name: string;
  readonly value: string;
}

export interface ProgressView {
  readonly state: ProgressState;
  readonly fields: readonly [ProgressField, ProgressField, ProgressField];
}

export const PROGRESS_LABELS = Object.freeze({
  channels: 'Channels',
  messages: 'Messages',
  status: 'Status',
});

export const INITIAL_PROGRESS: ProgressState = Object.freeze({
  completed: 0,
  total: 0,
  messages: 0,
  status: 'preparing',
});

export const renderProgress = (state: ProgressState): ProgressView => ({
  state,
  fields: [
    { name: PROGRESS_LABELS.channels, value: `${state.completed}/${state.total}` },
    { name: PROGRESS_LABELS.messages, value: String(state.messages) },
    { name: PROGRESS_LABELS.status, value: state.status },
  ],
});

const isCount = (value: number): boolean => Number.isInteger(value) && value >= 0;

/**
 * Holds the state of one backup job. It only computes what to display;
 * sending or editing the status message is up to the caller.
 */
export class BackupProgressTracker {
  private state: ProgressState = INITIAL_PROGRESS;

  public get current(): ProgressState {
    return this.state;
  }

  public view(): ProgressView {
    return renderProgress(this.state);
  }

  public advance(completed: number, total: number, messages: number, status: string): ProgressView {
    if (!isCount(completed) || !isCount(total) || !isCount(messages) || completed > total) {
      throw new InvalidProgressStateError({ completed, total, messages });
    }

    if (messages < this.state.messages) {
      throw new InvalidProgressStateError({ messages, previousMessages: this.state.messages });
    }

    this.state = { completed, total, messages, status };
    return renderProgress(this.state);
  }
}
