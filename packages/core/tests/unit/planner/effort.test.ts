import { describe, expect, it } from 'vitest';
import { estimateEffort } from '../../../src/planner/effort.js';

describe('estimateEffort', () => {
  it('is minimal with no issues', () => {
    expect(estimateEffort(0, 0)).toBe('minimal');
  });

  it('is low for few issues that are mostly high confidence', () => {
    expect(estimateEffort(5, 4)).toBe('low');
    expect(estimateEffort(10, 7)).toBe('low');
  });

  it('is medium when the high-confidence share is below 0.7', () => {
    expect(estimateEffort(10, 6)).toBe('medium');
    expect(estimateEffort(2, 1)).toBe('medium');
  });

  it('is medium above ten issues whatever the mix', () => {
    expect(estimateEffort(11, 11)).toBe('medium');
    expect(estimateEffort(30, 0)).toBe('medium');
    expect(estimateEffort(50, 50)).toBe('medium');
  });

  it('is high above fifty issues', () => {
    expect(estimateEffort(51, 51)).toBe('high');
  });
});
