import { describe, expect, test } from 'vitest';

import {
  StateComparator,
  compareStates,
  comparisonOptionsSchema,
  defaultMessages
} from '..';
import type { MessageCatalog, TraceEntry } from '..';
import { InvalidOptionsError } from '../../errors';
import { validateWithSchema } from '../../validator';
import { Credential, SecureValue } from '../../values';

describe('compareStates', () => {
  test('[Entries] one entry per compared key, values rendered as literals', () => {
    const report = compareStates({ Name: 'svc', Retries: 3 }, { Name: 'svc', Retries: 5 });

    expect(report).toStrictEqual({
      inDesiredState: false,
      entries: [
        {
          outcome: 'match',
          path: ['Name'],
          message: "Property 'Name' is in the desired state: current 'svc', desired 'svc'.",
          current: 'svc',
          desired: 'svc'
        },
        {
          outcome: 'no-match',
          path: ['Retries'],
          message: "Property 'Retries' is not in the desired state: current 3, desired 5.",
          current: 3,
          desired: 5
        }
      ]
    });
  });

  test('[Type Mismatch] the types are named', () => {
    const { entries } = compareStates({ Port: '80' }, { Port: 80 });

    expect(entries.map(entry => entry.message)).toStrictEqual([
      "Property 'Port' has type string, expected number."
    ]);
  });

  test('[Credential] only user names are reported', () => {
    const { inDesiredState, entries } = compareStates(
      { Account: 'bob' },
      { Account: new Credential('alice', 'test-secret') }
    );

    expect(inDesiredState).toBe(false);
    expect(entries).toStrictEqual([
      {
        outcome: 'no-match',
        path: ['Account'],
        message: "Property 'Account' has user name 'bob', expected 'alice'.",
        current: 'bob',
        desired: 'alice'
      }
    ]);
  });

  test('[Secure Values] plain text never reaches a message', () => {
    const { entries } = compareStates(
      { Token: new SecureValue('first-secret') },
      { Token: new SecureValue('second-secret') }
    );

    expect(entries.map(entry => entry.message)).toStrictEqual([
      "Property 'Token' is not in the desired state: current Secure('***'), desired Secure('***')."
    ]);
  });

  test('[Array Length] lengths are reported', () => {
    const { entries } = compareStates({ Tags: ['a'] }, { Tags: ['a', 'b'] });

    expect(entries.map(entry => entry.message)).toStrictEqual([
      "Property 'Tags' has 1 element(s), expected 2."
    ]);
  });

  test('[Array Elements] elements first, then the whole array', () => {
    const { entries } = compareStates({ Tags: ['a', 'c'] }, { Tags: ['a', 'b'] });

    expect(entries.map(({ outcome, path, message }) => ({ outcome, path, message }))).toStrictEqual([
      {
        outcome: 'match',
        path: ['Tags', '0'],
        message: "Property 'Tags.0' is in the desired state: current 'a', desired 'a'."
      },
      {
        outcome: 'no-match',
        path: ['Tags', '1'],
        message: "Property 'Tags' differs at index 1: current 'c', desired 'b'."
      },
      {
        outcome: 'no-match',
        path: ['Tags'],
        message: "Property 'Tags' is not in the desired state: current @('a','c'), desired @('a','b')."
      }
    ]);
  });

  test('[Absent Key] keys missing from the desired state are informational', () => {
    const { inDesiredState, entries } = compareStates(
      { a: 1, b: 2 },
      { a: 1 },
      { restrictToProperties: ['a', 'b'] }
    );

    expect(inDesiredState).toBe(true);
    expect(entries.at(-1)).toStrictEqual({
      outcome: 'info',
      path: ['b'],
      message: "Property 'b' is not part of the desired state and is not compared."
    });
  });

  test('[Reverse Pass] the second pass is announced', () => {
    const { entries } = compareStates({ a: 1 }, { a: 1 }, { alsoCheckReverse: true });

    expect(entries.map(entry => [entry.outcome, entry.message])).toStrictEqual([
      ['match', "Property 'a' is in the desired state: current 1, desired 1."],
      ['info', 'Comparing again with current and desired state swapped.'],
      ['match', "Property 'a' is in the desired state: current 1, desired 1."]
    ]);
  });

  test('[Keep Going] a mismatch does not stop the remaining keys', () => {
    const { inDesiredState, entries } = compareStates(
      { a: 1, b: { c: 1 }, d: 2 },
      { a: 0, b: { c: 2 }, d: 2 }
    );

    expect(inDesiredState).toBe(false);
    expect(entries.map(({ outcome, path }) => ({ outcome, path }))).toStrictEqual([
      { outcome: 'no-match', path: ['a'] },
      { outcome: 'no-match', path: ['b', 'c'] },
      { outcome: 'match', path: ['d'] }
    ]);
  });

  test('[Message Catalog] an injected catalog replaces the text', () => {
    const messages: MessageCatalog = {
      ...defaultMessages,
      valueMatch: property => `ok ${property}`,
      valueNoMatch: property => `changed ${property}`
    };

    const { entries } = compareStates({ a: 1, b: 2 }, { a: 1, b: 3 }, {}, messages);

    expect(entries.map(entry => entry.message)).toStrictEqual(['ok a', 'changed b']);
  });
});

describe('StateComparator', () => {
  test('[Sink] entries go to the injected sink', () => {
    const seen: TraceEntry[] = [];
    const comparator = new StateComparator({ sink: entry => seen.push(entry) });

    expect(comparator.compare({ a: 1 }, { a: 1 })).toBe(true);
    expect(seen.map(entry => entry.path)).toStrictEqual([['a']]);
  });

  test('[Reuse] one comparator serves several comparisons', () => {
    const comparator = new StateComparator();

    expect(comparator.compare({ a: 1 }, { a: 1 })).toBe(true);
    expect(comparator.compare({ a: 1 }, { a: 2 })).toBe(false);
  });
});

describe('comparison options', () => {
  test('[Schema] a non-boolean flag is rejected with its path', () => {
    const input: unknown = {
      skipTypeChecking: 'yes',
      sortArraysBeforeCompare: false,
      alsoCheckReverse: false
    };

    try {
      validateWithSchema(comparisonOptionsSchema, input, 'comparison options');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidOptionsError);
      if (error instanceof InvalidOptionsError) {
        expect(error.issues.map(issue => issue.path)).toStrictEqual(['skipTypeChecking']);
      }
    }
  });
});
