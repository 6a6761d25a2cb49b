import { describe, expect, test } from 'vitest';
import { Document } from 'yaml';

import { createSerializer, serialize } from '..';
import type { SerializeOptions } from '..';
import { InvalidOptionsError } from '../../errors';
import type { TestScenario } from '../../tests/types';
import { CodeBlock, Credential, Enumeration, SecureValue } from '../../values';

type SerializeInput = {
  value: unknown;
  options?: Partial<SerializeOptions>;
};

class Service {}

class Settings {
  name = 'svc';
  retries = 3;
}

class Timer {
  [Symbol.toPrimitive](): number {
    return 7;
  }
}

class Broken {
  get value(): number {
    throw new Error('unreadable');
  }
}

enum Mode {
  Slow = 0,
  Fast = 1
}

enum Access {
  Read = 1,
  Write = 2
}

const ISO = '2024-01-02T03:04:05.000Z';

function runScenarios(scenarios: Array<TestScenario<SerializeInput, string>>): void {
  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(serialize(input.value, input.options)).toBe(expected);
  });
}

describe('serialize', () => {
  describe('Layout', () => {
    runScenarios([
      {
        id: 'Concrete Map',
        description: 'one tab-indented pair per line inside braces',
        input: {
          value: { Name: 'svc', Retries: 3 },
          options: { expand: 2, indentChar: '\t', indentSize: 1 }
        },
        expected: "@{\n\t'Name' = 'svc'\n\t'Retries' = 3\n}"
      },
      {
        id: 'Defaults',
        description: 'the defaults expand the top level with tabs',
        input: { value: { Name: 'svc', Retries: 3 } },
        expected: "@{\n\t'Name' = 'svc'\n\t'Retries' = 3\n}"
      },
      {
        id: 'Nested Expansion',
        description: 'children indent one level deeper and close at their own level',
        input: {
          value: { a: { b: 1, c: 2 }, d: 3 },
          options: { indentChar: ' ', indentSize: 2 }
        },
        expected: "@{\n  'a' = @{\n    'b' = 1\n    'c' = 2\n  }\n  'd' = 3\n}"
      },
      {
        id: 'Threshold Reached',
        description: 'expand 1 renders the top level inline',
        input: { value: { Name: 'svc', Retries: 3 }, options: { expand: 1 } },
        expected: "@{'Name' = 'svc'; 'Retries' = 3}"
      },
      {
        id: 'Compact',
        description: 'a negative threshold drops optional spaces',
        input: { value: { a: 1, b: [1, 2] }, options: { expand: -1 } },
        expected: "@{'a'=1;'b'=@(1,2)}"
      },
      {
        id: 'Single Pair',
        description: 'one pair renders inline',
        input: { value: { a: 1 } },
        expected: "@{'a' = 1}"
      },
      {
        id: 'Empty Map',
        description: 'no pairs',
        input: { value: {} },
        expected: '@{}'
      },
      {
        id: 'Empty Sequence',
        description: 'no items',
        input: { value: [] },
        expected: '@()'
      },
      {
        id: 'Expanded Sequence',
        description: 'one item per line',
        input: { value: ['a', 'b'] },
        expected: "@(\n\t'a'\n\t'b'\n)"
      },
      {
        id: 'Inline Sequence',
        description: 'items joined with a comma and a space',
        input: { value: [1, 2], options: { expand: 1 } },
        expected: '@(1, 2)'
      },
      {
        id: 'CRLF',
        description: 'the configured newline separates lines',
        input: { value: { a: 1, b: 2 }, options: { newline: '\r\n' } },
        expected: "@{\r\n\t'a' = 1\r\n\t'b' = 2\r\n}"
      }
    ]);
  });

  describe('Singletons', () => {
    runScenarios([
      {
        id: 'Top Level',
        description: 'a unary comma outside a list',
        input: { value: [1] },
        expected: ',1'
      },
      {
        id: 'Nested',
        description: 'a singleton inside a singleton is grouped',
        input: { value: [[1]] },
        expected: ',(,1)'
      },
      {
        id: 'Map Value',
        description: 'map values are not list items',
        input: { value: { Tags: ['x'] } },
        expected: "@{'Tags' = ,'x'}"
      },
      {
        id: 'List Item',
        description: 'inside a sequence the singleton is grouped',
        input: { value: [[1], 2], options: { expand: 1 } },
        expected: '@((,1), 2)'
      }
    ]);
  });

  describe('Depth', () => {
    runScenarios([
      {
        id: 'Truncated Child',
        description: 'a container reached at maxDepth is the placeholder',
        input: { value: { a: { b: 1 } }, options: { maxDepth: 1 } },
        expected: "@{'a' = '...'}"
      },
      {
        id: 'Truncated Root',
        description: 'maxDepth 0 truncates the root container',
        input: { value: { a: 1 }, options: { maxDepth: 0 } },
        expected: "'...'"
      },
      {
        id: 'Scalars',
        description: 'scalars are never truncated',
        input: { value: 'x', options: { maxDepth: 0 } },
        expected: "'x'"
      },
      {
        id: 'Exact Depth',
        description: 'the placeholder sits at exactly maxDepth',
        input: { value: [[[1]]], options: { maxDepth: 2 } },
        expected: ",(,'...')"
      }
    ]);
  });

  describe('Scalars', () => {
    runScenarios([
      { id: 'Null', description: 'null', input: { value: null }, expected: '$null' },
      { id: 'Boolean', description: 'true', input: { value: true }, expected: '$true' },
      { id: 'Quote', description: 'quotes are doubled', input: { value: "it's" }, expected: "'it''s'" },
      {
        id: 'Multi-line',
        description: 'line breaks use the here-string form',
        input: { value: 'a\nb' },
        expected: "@'\na\nb\n'@"
      },
      {
        id: 'Terminator in Text',
        description: 'text that would end a here-string is single-quoted',
        input: { value: "x\n'@" },
        expected: "'x\n''@'"
      },
      {
        id: 'Secure',
        description: 'secure values are wrapped',
        input: { value: new SecureValue('test-secret') },
        expected: "Secure('test-secret')"
      },
      {
        id: 'Credential',
        description: 'credentials carry user name and secure secret',
        input: { value: new Credential('alice', 'test-secret') },
        expected: "Credential('alice', Secure('test-secret'))"
      },
      {
        id: 'Named Enum',
        description: 'named members are quoted and tagged',
        input: { value: Enumeration.of(Mode, Mode.Fast, 'Mode') },
        expected: "[Mode]'Fast'"
      },
      {
        id: 'Flag Enum',
        description: 'flag combinations are numbers',
        input: { value: Enumeration.of(Access, 3, 'Access') },
        expected: '3'
      },
      {
        id: 'Code Block',
        description: 'source between braces',
        input: { value: CodeBlock.fromSource("return 'svc'") },
        expected: "{return 'svc'}"
      },
      {
        id: 'Commented Code Block',
        description: 'a newline keeps a trailing comment off the closing brace',
        input: { value: CodeBlock.fromSource('return 1 // one') },
        expected: '{return 1 // one\n}'
      },
      {
        id: 'Commented Code Block With Break',
        description: 'a source already ending in a line break gets no second one',
        input: { value: CodeBlock.fromSource('return 1 // one\n') },
        expected: '{return 1 // one\n}'
      },
      {
        id: 'Handle',
        description: 'handles are their number',
        input: { value: new Timer() },
        expected: '7'
      },
      {
        id: 'Document',
        description: 'documents are written by yaml as multi-line text',
        input: { value: new Document({ a: 1 }) },
        expected: "@'\na: 1\n\n'@"
      },
      {
        id: 'Unreadable',
        description: 'unreadable objects are empty maps',
        input: { value: new Broken() },
        expected: '[Broken]@{}'
      }
    ]);
  });

  describe('Typing modes', () => {
    runScenarios([
      {
        id: 'Strong Map',
        description: 'strong typing tags every value',
        input: { value: { Name: 'svc', Retries: 3 }, options: { strong: true, expand: 1 } },
        expected: "[Object]@{'Name' = [string]'svc'; 'Retries' = [number]3}"
      },
      {
        id: 'Strong Singleton',
        description: 'a tagged singleton is grouped',
        input: { value: [1], options: { strong: true } },
        expected: '[Array](,[number]1)'
      },
      {
        id: 'Strong Boolean',
        description: 'constants take tags too',
        input: { value: true, options: { strong: true } },
        expected: '[boolean]$true'
      },
      {
        id: 'Strong Null',
        description: 'null never takes a tag',
        input: { value: null, options: { strong: true } },
        expected: '$null'
      },
      {
        id: 'Strong Type Reference',
        description: 'class constructors are type references',
        input: { value: Service, options: { strong: true } },
        expected: "[type]'Service'"
      },
      {
        id: 'Strong Flag Enum',
        description: 'numeric enums show the type under strong typing',
        input: { value: Enumeration.of(Access, 3, 'Access'), options: { strong: true } },
        expected: '[Access]3'
      },
      {
        id: 'Weak RegExp',
        description: 'tagged strings drop the tag under weak typing',
        input: { value: /a+/g },
        expected: "'/a+/g'"
      },
      {
        id: 'Weak Map',
        description: 'Map keeps the ordered tag under weak typing',
        input: { value: new Map([['a', 1]]) },
        expected: "[ordered]@{'a' = 1}"
      },
      {
        id: 'Weak Set',
        description: 'non-array sequences keep their tag',
        input: { value: new Set(['a']) },
        expected: "[Set](,'a')"
      },
      {
        id: 'Weak Typed Array',
        description: 'primitive arrays stay inline and tagged',
        input: { value: Uint8Array.from([1, 2]) },
        expected: '[Uint8Array]@(1, 2)'
      },
      {
        id: 'Weak Date',
        description: 'dates keep the datetime tag',
        input: { value: new Date(ISO) },
        expected: `[datetime]'${ISO}'`
      },
      {
        id: 'Weak NaN',
        description: 'non-finite numbers keep the number tag',
        input: { value: Number.NaN },
        expected: "[number]'NaN'"
      },
      {
        id: 'Weak Class Instance',
        description: 'class instances keep their type name',
        input: { value: new Settings(), options: { expand: 1 } },
        expected: "[Settings]@{'name' = 'svc'; 'retries' = 3}"
      },
      {
        id: 'Explore',
        description: 'explore mode drops every tag',
        input: { value: new Map([['a', 1]]), options: { explore: true } },
        expected: "@{'a' = 1}"
      },
      {
        id: 'Explore Date',
        description: 'explore mode drops required tags too',
        input: { value: new Date(ISO), options: { explore: true } },
        expected: `'${ISO}'`
      },
      {
        id: 'Explore Strong',
        description: 'strong typing brings the tags back in explore mode',
        input: { value: new Map([['a', 1]]), options: { explore: true, strong: true } },
        expected: "[ordered]@{'a' = [number]1}"
      }
    ]);
  });

  describe('Purity', () => {
    test('[Idempotence] the same input yields the same text', () => {
      const value = { a: [1, { b: 'x' }], c: new Date(ISO) };
      expect(serialize(value)).toBe(serialize(value));
    });

    test('[Bound Serializer] a bound serializer matches serialize', () => {
      const write = createSerializer({ expand: 1 });
      expect(write({ a: 1, b: 2 })).toBe(serialize({ a: 1, b: 2 }, { expand: 1 }));
      expect(write({ a: 1, b: 2 })).toBe("@{'a' = 1; 'b' = 2}");
    });
  });

  describe('Options', () => {
    test('[Indent Char] more than one character is rejected', () => {
      expect(() => serialize(1, { indentChar: 'ab' })).toThrow(InvalidOptionsError);
    });

    test('[Issues] every invalid option is listed', () => {
      try {
        serialize(1, { indentChar: 'ab', maxDepth: -1 });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidOptionsError);
        if (error instanceof InvalidOptionsError) {
          expect(error.issues.map(issue => issue.path)).toStrictEqual(['maxDepth', 'indentChar']);
        }
      }
    });
  });
});
