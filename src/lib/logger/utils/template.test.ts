import { describe, expect, test } from 'vitest';
import { formatTemplate } from './template';

describe('formatTemplate', () => {
  test('should return templates without placeholders untouched', () => {
    expect(formatTemplate('Unit is ready', { unused: 1 })).toBe(
      'Unit is ready',
    );
  });

  test('should replace flat and nested placeholders', () => {
    expect(
      formatTemplate('{{ count }} services on {{unit.name}}', {
        count: 2,
        unit: { name: 'keystone-0' },
      }),
    ).toBe('2 services on keystone-0');
  });

  test('should join arrays and stringify objects', () => {
    expect(
      formatTemplate('{{list}} / {{obj}}', {
        list: ['a', 'b'],
        obj: { x: 1 },
      }),
    ).toBe('a, b / {"x":1}');
  });

  test('should use the fallback for missing values', () => {
    expect(formatTemplate('key={{missing}}', {})).toBe('key=(null)');
    expect(formatTemplate('key={{missing}}', {}, '-')).toBe('key=-');
  });
});
