import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { diffMappings } from '../tree';
import type { DiffInput } from './helpers';
import { mapping, runDiff, sequence } from './helpers';
import { at, resolveScenarioInput, texts } from './test-utils';

const SAMPLE = `# service description
name: api
replicas: 3
labels: {tier: backend, team: core}
containers:
  - image: api:1.2
    ports: [80, 443]
    env:
      - {name: MODE, value: prod}
      - {name: DEBUG, value: null}
---
- plain
- 1.5
- true
- ~
`;

/**
 * Whole-comparison properties.
 * Focus: identity, symmetry, key coverage, inputs left untouched.
 */
describe('Properties: identity, symmetry, key coverage, inputs left untouched.', () => {
  test('a source compared with itself has no differences', () => {
    expect(runDiff({ left: SAMPLE, right: SAMPLE })).toStrictEqual([]);
  });

  test('formatting and comments are not differences', () => {
    const reformatted = `name: "api"
replicas: 0x3
labels:
  team: core
  tier: backend
containers: [{image: "api:1.2", ports: [80, 443], env: [{name: MODE, value: prod}, {name: DEBUG, value: ~}]}]
--- [plain, 1.5, True, null]
`;
    expect(runDiff({ left: SAMPLE, right: reformatted })).toStrictEqual([]);
  });

  describe('Symmetry of detection', () => {
    const pairs: Array<TestScenario<DiffInput, number>> = [
      {
        id: 'Changed Scalar',
        description: 'One changed value is seen from both sides.',
        input: { left: 'a: 1\n', right: 'a: 2\n' },
        expected: 1
      },
      {
        id: 'Extra Key',
        description: 'One extra key is seen from both sides.',
        input: { left: 'a: 1\n', right: 'a: 1\nb: 2\n' },
        expected: 1
      },
      {
        id: 'Extra Document',
        description: 'One extra document is seen from both sides.',
        input: { left: 'a: 1\n', right: 'a: 1\n--- b\n' },
        expected: 1
      },
      {
        id: 'Kind Change',
        description: 'A kind change is seen from both sides.',
        input: { left: 'a: [1]\n', right: 'a: 1\n' },
        expected: 1
      }
    ];

    test.for(pairs)('[$id] $description', ({ input, expected }) => {
      const { left, right } = resolveScenarioInput(input);
      const forward = runDiff({ left, right });
      const backward = runDiff({ left: right, right: left });

      expect(forward).toHaveLength(expected);
      expect(backward).toHaveLength(expected);
      expect(texts(backward)).toStrictEqual(
        texts(forward).map(([l, r]) => [r, l])
      );
    });
  });

  test('a kind mismatch yields exactly one record and no recursion', () => {
    const records = runDiff({
      left: 'spec:\n  a: 1\n  b: 2\n',
      right: 'spec:\n  - a\n  - b\n'
    });

    expect(records).toStrictEqual([
      {
        left: '<node of type mapping> spec',
        right: '<node of type sequence> spec',
        leftPosition: at(2, 3),
        rightPosition: at(2, 3)
      }
    ]);
  });

  test('missing-key records cover the symmetric difference of the key sets', () => {
    const shared = (line: number) => mapping([['x', 1]], at(line, 3));
    const left = mapping([
      ['a', 1],
      ['b', shared(2)],
      ['c', sequence([1])]
    ]);
    const right = mapping([
      ['b', shared(1)],
      ['c', sequence([1])],
      ['d', 1],
      ['e', null]
    ]);

    const records = diffMappings(left, right);
    const missing = records.filter(
      record =>
        record.left === '<missing key>' || record.right === '<missing key>'
    );

    expect(missing).toHaveLength(3);
    expect(records).toHaveLength(3);
  });

  test('inputs are left untouched', () => {
    const left = mapping([['list', sequence([1, 2])]]);
    const right = mapping([['list', sequence([1])]]);
    const leftBefore = [...left.entries];
    const rightBefore = [...right.entries];

    diffMappings(left, right);

    expect([...left.entries]).toStrictEqual(leftBefore);
    expect([...right.entries]).toStrictEqual(rightBefore);
  });

  test('each call returns a fresh list', () => {
    const input = { left: 'a: 1\n', right: 'a: 2\n' };
    const first = runDiff(input);
    const second = runDiff(input);

    expect(first).not.toBe(second);
    expect(first).toStrictEqual(second);
    expect(Object.isFrozen(first[0])).toBe(true);
  });
});
