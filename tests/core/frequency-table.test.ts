/**
 * FrequencyTable 单元测试
 */

import { describe, expect, test } from 'vitest';
import { FrequencyTable } from '../../core/frequency-table';

describe('FrequencyTable', () => {
  test('should group case-insensitively', () => {
    const table = new FrequencyTable().addAll(['AI', 'ai']);

    expect(table.size).toBe(1);
    expect(table.entries()).toEqual([{ value: 'AI', count: 2 }]);
  });

  test('should display the most frequent casing', () => {
    const table = new FrequencyTable().addAll(['ai', 'AI', 'AI']);
    expect(table.entries()).toEqual([{ value: 'AI', count: 3 }]);
  });

  test('should sort by count then first appearance', () => {
    const table = new FrequencyTable().addAll(['b', 'a', 'c', 'a', 'c']);

    expect(table.entries()).toEqual([
      { value: 'a', count: 2 },
      { value: 'c', count: 2 },
      { value: 'b', count: 1 },
    ]);
    expect(table.entries(1)).toEqual([{ value: 'a', count: 2 }]);
  });

  test('should ignore empty strings', () => {
    expect(new FrequencyTable().addAll(['', '']).size).toBe(0);
  });
});
