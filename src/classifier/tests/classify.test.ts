import { describe, expect, test } from 'vitest';
import { Document } from 'yaml';

import { QUOTED_TAG, classify, typeName } from '..';
import type { TestScenario } from '../../tests/types';
import { CodeBlock, Credential, Enumeration, SecureValue } from '../../values';

class Service {}

class Version {
  constructor(
    readonly major: number,
    readonly minor: number
  ) {}

  [QUOTED_TAG](): string {
    return `${this.major}.${this.minor}`;
  }
}

class Timer {
  [Symbol.toPrimitive](): number {
    return 7;
  }
}

class Table {
  readonly columns = ['Name'];
  readonly rows = [{ Name: 'svc' }];
}

class Point {
  #x = 1;

  get x(): number {
    return this.#x;
  }
}

class Broken {
  get value(): number {
    throw new Error('unreadable');
  }
}

class Registry {
  keys(): Iterator<string> & Iterable<string> {
    return ['a', 'b'][Symbol.iterator]();
  }

  get(key: string): string {
    return key.toUpperCase();
  }
}

class Settings {
  name = 'svc';
  retries = 3;
}

enum Mode {
  Slow = 0,
  Fast = 1
}

enum Access {
  Read = 1,
  Write = 2
}

describe('classify', () => {
  /**
   * One scenario per rule, in rule order.
   * `expected` lists the category fields that matter for the rule.
   */
  describe('Rules', () => {
    const scenarios: Array<TestScenario<unknown, Record<string, unknown>>> = [
      {
        id: 'Null',
        description: 'null is the null category',
        input: null,
        expected: { kind: 'null', typeName: 'null', tag: null }
      },
      {
        id: 'Undefined',
        description: 'undefined is the null category too',
        input: undefined,
        expected: { kind: 'null', typeName: 'undefined' }
      },
      {
        id: 'Boolean',
        description: 'booleans keep their value',
        input: false,
        expected: { kind: 'boolean', value: false, tag: 'boolean' }
      },
      {
        id: 'RegExp',
        description: 'regular expressions are tagged strings',
        input: /ab+c/gi,
        expected: { kind: 'taggedString', text: '/ab+c/gi', tag: 'RegExp', tagRequired: false }
      },
      {
        id: 'URL',
        description: 'URLs are tagged strings holding the href',
        input: new URL('https://example.com/a'),
        expected: { kind: 'taggedString', text: 'https://example.com/a', tag: 'URL' }
      },
      {
        id: 'Type Reference',
        description: 'class constructors are tagged with "type"',
        input: Service,
        expected: { kind: 'taggedString', text: 'Service', tag: 'type' }
      },
      {
        id: 'Quoted Marker',
        description: 'custom types with the quoted marker write their own text',
        input: new Version(1, 2),
        expected: { kind: 'taggedString', text: '1.2', typeName: 'Version', tag: 'Version' }
      },
      {
        id: 'Number',
        description: 'finite numbers are numerals',
        input: -1.5,
        expected: { kind: 'number', text: '-1.5', tag: 'number', tagRequired: false }
      },
      {
        id: 'NaN',
        description: 'non-finite numbers become tagged scalars',
        input: Number.NaN,
        expected: { kind: 'scalar', text: 'NaN', tag: 'number', tagRequired: true }
      },
      {
        id: 'BigInt',
        description: 'bigints are numerals without the suffix and always carry their cast',
        input: 10n,
        expected: { kind: 'number', text: '10', typeName: 'bigint', tag: 'bigint', tagRequired: true }
      },
      {
        id: 'Negative Zero',
        description: 'the sign of zero is kept in the text',
        input: -0,
        expected: { kind: 'number', text: '-0', tag: 'number', tagRequired: false }
      },
      {
        id: 'String',
        description: 'single-line strings',
        input: 'svc',
        expected: { kind: 'string', value: 'svc', multiline: false }
      },
      {
        id: 'Multi-line String',
        description: 'strings with a line break are marked multiline',
        input: 'a\nb',
        expected: { kind: 'string', value: 'a\nb', multiline: true }
      },
      {
        id: 'Secure Value',
        description: 'secure values expose their plain text to the category only',
        input: new SecureValue('test-secret'),
        expected: { kind: 'secure', plainText: 'test-secret', tag: null }
      },
      {
        id: 'Credential',
        description: 'credentials carry user name and secret',
        input: new Credential('alice', 'test-secret'),
        expected: { kind: 'credential', userName: 'alice', secret: 'test-secret' }
      },
      {
        id: 'Date',
        description: 'dates are ISO text tagged "datetime"',
        input: new Date('2024-01-02T03:04:05.000Z'),
        expected: { kind: 'date', text: '2024-01-02T03:04:05.000Z', tag: 'datetime', tagRequired: true }
      },
      {
        id: 'Invalid Date',
        description: 'invalid dates keep the date category',
        input: new Date('not a date'),
        expected: { kind: 'date', text: 'Invalid Date' }
      },
      {
        id: 'Named Enum',
        description: 'named members keep their name and require the tag',
        input: Enumeration.of(Mode, Mode.Fast, 'Mode'),
        expected: { kind: 'enum', value: 1, name: 'Fast', tag: 'Mode', tagRequired: true }
      },
      {
        id: 'Flag Enum',
        description: 'flag combinations are numeric',
        input: Enumeration.of(Access, Access.Read | Access.Write, 'Access'),
        expected: { kind: 'enum', value: 3, name: undefined, tagRequired: false }
      },
      {
        id: 'Namespaced Enum',
        description: 'namespaced type names are numeric even when named',
        input: Enumeration.of(Mode, Mode.Fast, 'Net.Mode'),
        expected: { kind: 'enum', value: 1, name: undefined }
      },
      {
        id: 'Code Block',
        description: 'code blocks keep their source',
        input: CodeBlock.fromSource("return 'svc'"),
        expected: { kind: 'codeBlock', source: "return 'svc'", commented: false }
      },
      {
        id: 'Commented Code Block',
        description: 'a comment in the source is detected',
        input: CodeBlock.fromSource("return 'svc' // name"),
        expected: { kind: 'codeBlock', commented: true }
      },
      {
        id: 'Handle',
        description: 'objects converting to a number are handles',
        input: new Timer(),
        expected: { kind: 'handle', value: 7, typeName: 'Timer' }
      },
      {
        id: 'Tabular',
        description: 'tabular containers are classified as their rows',
        input: new Table(),
        expected: { kind: 'sequence', items: [{ Name: 'svc' }], typeName: 'Array' }
      },
      {
        id: 'Map',
        description: 'maps are ordered maps',
        input: new Map<string, number>([['b', 1], ['a', 2]]),
        expected: {
          kind: 'map',
          entries: [['b', 1], ['a', 2]],
          typeName: 'Map',
          tag: 'ordered',
          tagRequired: true
        }
      },
      {
        id: 'Boxed Number',
        description: 'boxed primitives are tagged scalars',
        input: new Number(5),
        expected: { kind: 'scalar', text: '5', typeName: 'Number', tagRequired: true }
      },
      {
        id: 'Symbol',
        description: 'symbols are tagged scalars',
        input: Symbol('x'),
        expected: { kind: 'scalar', text: 'Symbol(x)', tag: 'symbol' }
      },
      {
        id: 'Array',
        description: 'arrays are untagged sequences',
        input: [1, 'a'],
        expected: { kind: 'sequence', items: [1, 'a'], tag: 'Array', tagRequired: false, primitive: false }
      },
      {
        id: 'Typed Array',
        description: 'typed arrays are primitive sequences',
        input: Uint8Array.from([1, 2]),
        expected: { kind: 'sequence', items: [1, 2], typeName: 'Uint8Array', tagRequired: true, primitive: true }
      },
      {
        id: 'Set',
        description: 'other iterables are tagged sequences',
        input: new Set(['a']),
        expected: { kind: 'sequence', items: ['a'], typeName: 'Set', tagRequired: true }
      },
      {
        id: 'Plain Object',
        description: 'plain objects are untagged maps',
        input: { Name: 'svc', Retries: 3 },
        expected: { kind: 'map', entries: [['Name', 'svc'], ['Retries', 3]], tag: 'Object', tagRequired: false }
      },
      {
        id: 'Null Prototype',
        description: 'null-prototype objects are plain maps',
        input: Object.assign(Object.create(null), { a: 1 }),
        expected: { kind: 'map', entries: [['a', 1]], typeName: 'Object', tagRequired: false }
      },
      {
        id: 'Keyed Collection',
        description: 'collections with keys() and get() are maps',
        input: new Registry(),
        expected: { kind: 'map', entries: [['a', 'A'], ['b', 'B']], typeName: 'Registry' }
      },
      {
        id: 'Class Instance',
        description: 'class instances are tagged maps of their own properties',
        input: new Settings(),
        expected: { kind: 'map', entries: [['name', 'svc'], ['retries', 3]], tag: 'Settings', tagRequired: true }
      },
      {
        id: 'Accessor Properties',
        description: 'instances without own properties expose their getters',
        input: new Point(),
        expected: { kind: 'map', entries: [['x', 1]], typeName: 'Point' }
      },
      {
        id: 'Unreadable Object',
        description: 'a throwing getter degrades to an empty map',
        input: new Broken(),
        expected: { kind: 'map', entries: [], typeName: 'Broken' }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(classify(input)).toMatchObject(expected);
    });
  });

  describe('Special objects', () => {
    test('[Function] plain functions are code blocks', () => {
      expect(classify(() => 1)).toMatchObject({ kind: 'codeBlock', typeName: 'Function' });
    });

    test('[Document] YAML documents keep the document', () => {
      const document = new Document({ a: 1 });
      const category = classify(document);
      expect(category.kind).toBe('document');
      expect(category).toHaveProperty('document', document);
    });

    test('[Date Before Handle] dates are not handles although they convert to numbers', () => {
      expect(classify(new Date(0)).kind).toBe('date');
    });
  });
});

describe('typeName', () => {
  const scenarios: Array<TestScenario<unknown, string>> = [
    { id: 'string', description: 'primitives use typeof', input: 'a', expected: 'string' },
    { id: 'bigint', description: 'bigint uses typeof', input: 1n, expected: 'bigint' },
    { id: 'null', description: 'null has its own name', input: null, expected: 'null' },
    { id: 'Date', description: 'objects use the constructor name', input: new Date(0), expected: 'Date' },
    { id: 'Settings', description: 'class instances use the class name', input: new Settings(), expected: 'Settings' },
    { id: 'Function', description: 'functions are Function', input: () => 1, expected: 'Function' }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(typeName(input)).toBe(expected);
  });
});
