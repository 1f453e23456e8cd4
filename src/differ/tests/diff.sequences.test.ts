import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import type { DiffRecord } from '../types';
import { diffSequences } from '../tree';
import type { DiffInput } from './helpers';
import { mapping, runDiff, sequence } from './helpers';
import { at, resolveScenarioInput, texts } from './test-utils';

/**
 * Sequence comparison.
 * Focus: strict index alignment, missing items, container descriptions.
 */
describe('Sequences: index alignment, missing items, container descriptions.', () => {
  describe('Loaded from YAML', () => {
    const scenarios: Array<TestScenario<DiffInput, DiffRecord[]>> = [
      {
        id: 'Trailing Item Removed',
        description:
          'Only the extra left item is reported; shared indices stay silent.',
        input: { left: '- 1\n- 2\n- 3\n', right: '- 1\n- 2\n' },
        expected: [
          {
            left: '3',
            right: '<missing item>',
            leftPosition: at(3, 3),
            rightPosition: at(1, 1)
          }
        ]
      },
      {
        id: 'Trailing Item Added',
        description: 'An extra right item points at the left sequence.',
        input: { left: '- 1\n', right: '- 1\n- 2\n' },
        expected: [
          {
            left: '<missing item>',
            right: '2',
            leftPosition: at(1, 1),
            rightPosition: at(2, 3)
          }
        ]
      },
      {
        id: 'Reorder by Index',
        description: 'Swapped items are per-index changes, not moves.',
        input: { left: '- a\n- b\n', right: '- b\n- a\n' },
        expected: [
          { left: 'a', right: 'b', leftPosition: at(1, 3), rightPosition: at(1, 3) },
          { left: 'b', right: 'a', leftPosition: at(2, 3), rightPosition: at(2, 3) }
        ]
      },
      {
        id: 'Shift on Removal',
        description: 'Removing a middle item shifts every later index.',
        input: { left: '[1, 2, 3]\n', right: '[1, 3]\n' },
        expected: [
          { left: '2', right: '3', leftPosition: at(1, 5), rightPosition: at(1, 5) },
          {
            left: '3',
            right: '<missing item>',
            leftPosition: at(1, 8),
            rightPosition: at(1, 1)
          }
        ]
      },
      {
        id: 'Missing Mapping Item',
        description: 'A missing container item is described in flow style.',
        input: { left: '- a: 1\n', right: '- a: 1\n- b: 2\n  c: [3]\n' },
        expected: [
          {
            left: '<missing item>',
            right: '{b: 2, c: [3]}',
            leftPosition: at(1, 1),
            rightPosition: at(2, 3)
          }
        ]
      },
      {
        id: 'Item Type Mismatch',
        description: 'Mismatched item kinds yield one record without a key.',
        input: { left: '- [1]\n', right: '- x\n' },
        expected: [
          {
            left: '<node of type sequence>',
            right: '<node of type scalar>',
            leftPosition: at(1, 3),
            rightPosition: at(1, 3)
          }
        ]
      },
      {
        id: 'Nested Mapping Items',
        description: 'Mapping items are compared key by key.',
        input: {
          left: '- name: a\n  size: 1\n',
          right: '- name: a\n  size: 2\n'
        },
        expected: [
          { left: '1', right: '2', leftPosition: at(2, 9), rightPosition: at(2, 9) }
        ]
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(runDiff(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('Built trees', () => {
    test('null items are present items, not missing ones', () => {
      const left = sequence([null, 1]);
      const right = sequence([null]);

      expect(diffSequences(left, right)).toStrictEqual([
        {
          left: '1',
          right: '<missing item>',
          leftPosition: at(2, 3),
          rightPosition: at(1, 1)
        }
      ]);
    });

    test('describes missing null and nested sequence items', () => {
      const left = sequence([]);
      const right = sequence([null, sequence([1, sequence([])], at(2, 3))]);

      expect(texts(diffSequences(left, right))).toStrictEqual([
        ['<missing item>', 'null'],
        ['<missing item>', '[1, []]']
      ]);
    });

    test('recurses into mapping items', () => {
      const left = sequence([mapping([['k', 'v']], at(1, 3))]);
      const right = sequence([mapping([['k', 'w']], at(1, 3))]);

      expect(diffSequences(left, right)).toStrictEqual([
        { left: 'v', right: 'w', leftPosition: at(1, 6), rightPosition: at(1, 6) }
      ]);
    });
  });
});
