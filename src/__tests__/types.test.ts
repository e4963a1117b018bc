/**
 * Tests for unit helpers
 */

import {
  TranslatableUnit,
  comparePriority,
  isPriority,
  meetsPriority,
  unitSpan,
  withContent,
} from '../core/types';

describe('Unit helpers', () => {
  const unit: TranslatableUnit = {
    content: 'original text',
    unitType: 'docstring',
    position: { line: 3, column: 5 },
    priority: 'high',
    metadata: { span: 4, endLine: 6 },
  };

  it('should order priorities from high to ignore', () => {
    expect(comparePriority('high', 'medium')).toBeGreaterThan(0);
    expect(comparePriority('low', 'medium')).toBeLessThan(0);
    expect(comparePriority('low', 'low')).toBe(0);
  });

  it('should keep units at or above the minimum priority', () => {
    expect(meetsPriority({ priority: 'medium' }, 'low')).toBe(true);
    expect(meetsPriority({ priority: 'medium' }, 'medium')).toBe(true);
    expect(meetsPriority({ priority: 'medium' }, 'high')).toBe(false);
  });

  it('should never keep ignore-priority units', () => {
    expect(meetsPriority({ priority: 'ignore' }, 'ignore')).toBe(false);
  });

  it('should recognise priority names', () => {
    expect(isPriority('medium')).toBe(true);
    expect(isPriority('urgent')).toBe(false);
    expect(isPriority(3)).toBe(false);
  });

  it('should treat a missing span as one line', () => {
    expect(unitSpan(unit)).toBe(4);
    expect(unitSpan({ ...unit, metadata: undefined })).toBe(1);
  });

  it('should copy a unit with new content without sharing nested objects', () => {
    const copy = withContent(unit, 'translated text');
    copy.position.line = 10;

    expect(copy.content).toBe('translated text');
    expect(copy.metadata).toEqual({ span: 4, endLine: 6 });
    expect(unit.position.line).toBe(3);
    expect(unit.content).toBe('original text');
  });
});
