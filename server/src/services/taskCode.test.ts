import { describe, expect, it } from 'vitest';
import { formatTaskCode, taskCodePrefix } from './taskCode';

describe('task codes', () => {
  it('upper-cases the first three characters of the project name', () => {
    expect(taskCodePrefix('Teams in Space')).toBe('TEA');
    expect(formatTaskCode('Orbit', 4)).toBe('ORB-4');
  });

  it('counts characters outside the basic plane as one', () => {
    expect(taskCodePrefix('🚀 launch')).toBe('🚀 L');
  });

  it('uses the whole name when it is shorter than three characters', () => {
    expect(formatTaskCode('ux', 12)).toBe('UX-12');
  });
});
