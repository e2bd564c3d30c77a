export type UndoAction = () => void;
export type CommitEffect = () => void;

interface JournalFrame {
  undo: UndoAction[];
  effects: CommitEffect[];
}

/**
 * Undo log standing in for a transactional host. Every mutation of
 * journaled state records how to reverse itself; `atomic` replays those
 * records in reverse when the operation throws. Effects queued with
 * `afterCommit` (event emission) run only once the outermost frame commits.
 */
export class StateJournal {
  private readonly frames: JournalFrame[] = [];

  get inTransaction(): boolean {
    return this.frames.length > 0;
  }

  atomic<T>(operation: () => T): T {
    const frame: JournalFrame = { undo: [], effects: [] };
    this.frames.push(frame);

    let result: T;
    try {
      result = operation();
    } catch (error) {
      this.frames.pop();
      for (let index = frame.undo.length - 1; index >= 0; index--) {
        frame.undo[index]();
      }
      throw error;
    }

    this.frames.pop();
    const parent = this.currentFrame();
    if (parent) {
      parent.undo.push(...frame.undo);
      parent.effects.push(...frame.effects);
    } else {
      frame.effects.forEach((effect) => effect());
    }
    return result;
  }

  /** Outside a transaction there is nothing to roll back to. */
  record(undo: UndoAction): void {
    this.currentFrame()?.undo.push(undo);
  }

  afterCommit(effect: CommitEffect): void {
    const frame = this.currentFrame();
    if (frame) {
      frame.effects.push(effect);
    } else {
      effect();
    }
  }

  private currentFrame(): JournalFrame | undefined {
    return this.frames[this.frames.length - 1];
  }
}
