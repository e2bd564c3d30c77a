import { JournaledMap } from '../../src/state/journaled-map';
import { StateJournal } from '../../src/state/state-journal';

describe('StateJournal', () => {
  let journal: StateJournal;
  let balances: JournaledMap<string, bigint>;

  beforeEach(() => {
    journal = new StateJournal();
    balances = new JournaledMap(journal);
    balances.set('alice', 10n);
  });

  it('should keep writes of a committed operation', () => {
    const result = journal.atomic(() => {
      balances.set('alice', 4n);
      balances.set('bob', 6n);
      return 'done';
    });

    expect(result).toBe('done');
    expect(balances.get('alice')).toBe(4n);
    expect(balances.get('bob')).toBe(6n);
  });

  it('should restore every write when the operation throws', () => {
    expect(() => journal.atomic(() => {
      balances.set('alice', 4n);
      balances.set('bob', 6n);
      balances.delete('alice');
      throw new Error('boom');
    })).toThrow('boom');

    expect(balances.get('alice')).toBe(10n);
    expect(balances.has('bob')).toBe(false);
    expect(journal.inTransaction).toBe(false);
  });

  it('should unwind a committed inner frame when the outer frame fails', () => {
    expect(() => journal.atomic(() => {
      journal.atomic(() => balances.set('bob', 1n));
      throw new Error('outer');
    })).toThrow('outer');

    expect(balances.has('bob')).toBe(false);
  });

  it('should let the outer frame continue after an inner failure it handles', () => {
    journal.atomic(() => {
      balances.set('bob', 1n);
      try {
        journal.atomic(() => {
          balances.set('bob', 2n);
          throw new Error('inner');
        });
      } catch (error) {
        expect(error).toEqual(new Error('inner'));
      }
    });

    expect(balances.get('bob')).toBe(1n);
  });

  it('should run commit effects only after the outermost frame commits', () => {
    const effects: string[] = [];

    journal.atomic(() => {
      journal.atomic(() => journal.afterCommit(() => effects.push('inner')));
      journal.afterCommit(() => effects.push('outer'));
      expect(effects).toEqual([]);
    });

    expect(effects).toEqual(['inner', 'outer']);
  });

  it('should drop commit effects of a failed frame', () => {
    const effects: string[] = [];

    expect(() => journal.atomic(() => {
      journal.afterCommit(() => effects.push('event'));
      throw new Error('boom');
    })).toThrow('boom');

    expect(effects).toEqual([]);
  });

  it('should run effects immediately outside a transaction', () => {
    const effects: string[] = [];
    journal.afterCommit(() => effects.push('now'));
    expect(effects).toEqual(['now']);
  });
});
