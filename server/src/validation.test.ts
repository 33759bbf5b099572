import { describe, expect, it } from 'vitest';
import { ValidationError } from './errors';
import { TASK_STATUSES } from './types';
import { BodyReader } from './validation';

function errorsOf(fn: () => void): unknown {
  try {
    fn();
  } catch (e) {
    if (e instanceof ValidationError) return e.fields;
    throw e;
  }
  return undefined;
}

describe('BodyReader', () => {
  it('rejects a body that is not an object', () => {
    expect(() => BodyReader.from([1, 2])).toThrow('Request body must be a JSON object');
  });

  it('collects one message list per field', () => {
    const fields = errorsOf(() => {
      const body = BodyReader.from({ title: '   ', status: 'archived', estimated_hours: -1 });
      body.string('title', { required: true });
      body.string('project', { required: true });
      body.choice('status', TASK_STATUSES);
      body.count('estimated_hours');
      body.done();
    });
    expect(fields).toEqual({
      title: ['This field may not be blank.'],
      project: ['This field is required.'],
      status: ['"archived" is not a valid choice.'],
      estimated_hours: ['Ensure this value is a non-negative integer.']
    });
  });

  it('returns trimmed and typed values', () => {
    const body = BodyReader.from({
      title: '  Dock  ',
      status: 'done',
      due_date: '',
      assigned_to_id: null,
      label_ids: [' a ', 'b']
    });
    expect(body.string('title', { required: true })).toBe('Dock');
    expect(body.choice('status', TASK_STATUSES, { required: true })).toBe('done');
    expect(body.date('due_date')).toBeNull();
    expect(body.id('assigned_to_id', { nullable: true })).toBeNull();
    expect(body.idList('label_ids')).toEqual(['a', 'b']);
    expect(body.boolean('is_active')).toBeUndefined();
    expect(() => body.done()).not.toThrow();
  });

  it('enforces a maximum length', () => {
    const fields = errorsOf(() => {
      const body = BodyReader.from({ name: 'abcdef' });
      body.string('name', { maxLength: 3 });
      body.done();
    });
    expect(fields).toEqual({ name: ['Ensure this field has no more than 3 characters.'] });
  });
});
