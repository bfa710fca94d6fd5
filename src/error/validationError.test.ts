import { describe, expect, it } from 'vitest';
import { SerializationError } from './serializationError.js';
import { getValidationError, isValidationError, ValidationError } from './validationError.js';

describe('ValidationError', () => {
  it('appends the issues to the message', () => {
    const err = new ValidationError('error validating data', [{ message: 'Required', path: ['items'] }]);

    expect(err.name).toBe('ValidationError');
    expect(err.message).toBe('error validating data; issues: [{"message":"Required","path":["items"]}]');
    expect(err.issues).toEqual([{ message: 'Required', path: ['items'] }]);
  });

  it('is found behind a SerializationError', () => {
    const validation = new ValidationError('error validating data', []);
    const err = new SerializationError('error validating response data', 200, { cause: validation });

    expect(isValidationError(err)).toBe(true);
    expect(getValidationError(err)).toBe(validation);
    expect(getValidationError(new Error('unrelated'))).toBeNull();
  });
});
