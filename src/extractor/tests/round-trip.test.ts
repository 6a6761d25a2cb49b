import { describe, expect, test } from 'vitest';

import { extractArguments } from '..';
import { statesEqual } from '../../comparator';
import { serialize } from '../../serializer';
import type { SerializeOptions } from '../../serializer';
import { CodeBlock } from '../../values';

type Sample = { id: string; value: unknown };

const samples: Sample[] = [
  { id: 'Flat Map', value: { Name: 'svc', Retries: 3, Enabled: true, Owner: null } },
  { id: 'Arrays In Map', value: { Tags: ['web', 'api'], Ports: [80, 443], Single: ['only'] } },
  { id: 'Nested Maps', value: { Outer: { Inner: { Value: 'x', Count: -1.5 } } } },
  { id: 'Nested Arrays', value: [[1], [2, 3]] },
  { id: 'Nested Singleton', value: [[1]] },
  { id: 'Quoted Text', value: "it's" },
  { id: 'Multi-line Text', value: 'first\nsecond' },
  { id: 'Ordered Map', value: new Map<string, unknown>([['b', 1], ['a', [true, false]]]) },
  { id: 'Date', value: new Date('2024-01-02T03:04:05.000Z') },
  { id: 'Empty Containers', value: { Map: {}, List: [] } },
  { id: 'Big Integers', value: { Big: 12345678901234567890n, Small: -5n } },
  { id: 'Negative Zero', value: { Zero: -0 } },
  { id: 'Code Block', value: { Run: CodeBlock.fromSource("return 'svc'") } },
  { id: 'Commented Code Block', value: { Run: CodeBlock.fromSource('return 1 // one') } },
  { id: 'Regex Code Block', value: { Run: CodeBlock.fromSource("() => /'/.test('a')") } },
  { id: 'Template Code Block', value: { Run: CodeBlock.fromSource('() => `${ `}` }`') } },
  {
    id: 'Nested Code Block',
    value: { Outer: { Run: CodeBlock.fromSource('return 1 // one'), Name: 'svc' } }
  }
];

const modes: Array<{ mode: string; options: Partial<SerializeOptions> }> = [
  { mode: 'weak', options: {} },
  { mode: 'strong', options: { strong: true } },
  { mode: 'compact', options: { expand: -1 } },
  { mode: 'inline', options: { expand: 1, strong: true } }
];

describe('serialize -> extractArguments', () => {
  for (const { mode, options } of modes) {
    test.for(samples)(`[${mode}] $id reads back unchanged`, ({ value }) => {
      expect(extractArguments(serialize(value, options))).toStrictEqual([value]);
    });
  }

  for (const { mode, options } of modes) {
    test.for(samples)(`[${mode}] $id is written the same way on every cycle`, ({ value }) => {
      const first = serialize(value, options);
      let text = first;
      for (let cycle = 0; cycle < 3; cycle += 1) {
        text = serialize(extractArguments(text)[0], options);
        expect(text).toBe(first);
      }
    });
  }

  test('[Desired State] a commented code block read back is in its own desired state', () => {
    const desired = { Run: CodeBlock.fromSource('return 1 // one') };
    const current = extractArguments(serialize(desired))[0];

    expect(statesEqual(current, desired)).toBe(true);
  });
});
