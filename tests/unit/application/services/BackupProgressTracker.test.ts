import { describe, expect, it } from 'vitest';

import { BackupProgressTracker, INITIAL_PROGRESS } from '@/application/services/BackupProgressTracker';
import { InvalidProgressStateError } from '@/shared/errors/domain.errors';

describe('BackupProgressTracker', () => {
  it('starts from an empty, preparing state', () => {
    const tracker = new BackupProgressTracker();

    expect(tracker.current).toEqual(INITIAL_PROGRESS);
    expect(tracker.view().fields).toEqual([
      { name: 'Channels', value: '0/0' },
      { name: 'Messages', value: '0' },
      { name: 'Status', value: 'preparing' },
    ]);
  });

  it('renders the three labelled fields of the latest state', () => {
    const tracker = new BackupProgressTracker();

    const view = tracker.advance(1, 3, 42, 'archived #general');

    expect(view.state).toEqual({ completed: 1, total: 3, messages: 42, status: 'archived #general' });
    expect(view.fields).toEqual([
      { name: 'Channels', value: '1/3' },
      { name: 'Messages', value: '42' },
      { name: 'Status', value: 'archived #general' },
    ]);
  });

  it('rejects a completed count above the total', () => {
    const tracker = new BackupProgressTracker();

    expect(() => tracker.advance(4, 3, 0, 'oops')).toThrow(InvalidProgressStateError);
  });

  it('rejects negative or fractional counters', () => {
    const tracker = new BackupProgressTracker();

    expect(() => tracker.advance(-1, 3, 0, 'oops')).toThrow(InvalidProgressStateError);
    expect(() => tracker.advance(1, 3, 1.5, 'oops')).toThrow(InvalidProgressStateError);
  });

  it('rejects a message count that goes down', () => {
    const tracker = new BackupProgressTracker();
    tracker.advance(1, 2, 10, 'archived #a');

    expect(() => tracker.advance(2, 2, 9, 'archived #b')).toThrow(InvalidProgressStateError);
    expect(tracker.current.messages).toBe(10);
  });
});
