import { ValidationError, type FieldErrors } from './errors';

type Body = Record<string, unknown>;

interface StringOptions {
  required?: boolean;
  maxLength?: number;
  allowBlank?: boolean;
}

function isPlainObject(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads typed fields off an untrusted JSON body, collecting one message list
 * per field. Call `done()` once all fields are read.
 */
export class BodyReader {
  private readonly errors: FieldErrors = {};

  private constructor(private readonly body: Body) {}

  static from(raw: unknown): BodyReader {
    if (!isPlainObject(raw)) throw new ValidationError('Request body must be a JSON object');
    return new BodyReader(raw);
  }

  has(field: string): boolean {
    return this.body[field] !== undefined;
  }

  fail(field: string, message: string): void {
    (this.errors[field] ??= []).push(message);
  }

  /**
   * Trimmed string. Required fields read as `''` when invalid; the error is
   * already recorded, so `done()` throws before the value is used.
   */
  string(field: string, opts: StringOptions & { required: true }): string;
  string(field: string, opts?: StringOptions): string | undefined;
  string(field: string, opts: StringOptions = {}): string | undefined {
    const value = this.readString(field, opts);
    return value === undefined && opts.required ? '' : value;
  }

  private readString(field: string, opts: StringOptions): string | undefined {
    const value = this.body[field];
    if (value === undefined || value === null) {
      if (opts.required) this.fail(field, 'This field is required.');
      return undefined;
    }
    if (typeof value !== 'string') {
      this.fail(field, 'Not a valid string.');
      return undefined;
    }
    const trimmed = value.trim();
    if (!trimmed && !opts.allowBlank) {
      this.fail(field, 'This field may not be blank.');
      return undefined;
    }
    if (opts.maxLength !== undefined && trimmed.length > opts.maxLength) {
      this.fail(field, `Ensure this field has no more than ${opts.maxLength} characters.`);
      return undefined;
    }
    return trimmed;
  }

  choice<T extends string>(field: string, choices: readonly [T, ...T[]], opts: { required: true }): T;
  choice<T extends string>(field: string, choices: readonly T[], opts?: { required?: boolean }): T | undefined;
  choice<T extends string>(field: string, choices: readonly T[], opts: { required?: boolean } = {}): T | undefined {
    const value = this.readChoice(field, choices, opts);
    return value === undefined && opts.required ? choices[0] : value;
  }

  private readChoice<T extends string>(field: string, choices: readonly T[], opts: { required?: boolean }): T | undefined {
    const value = this.body[field];
    if (value === undefined || value === null) {
      if (opts.required) this.fail(field, 'This field is required.');
      return undefined;
    }
    const match = choices.find(c => c === value);
    if (match === undefined) {
      this.fail(field, `"${String(value)}" is not a valid choice.`);
    }
    return match;
  }

  /** Non-negative integer; `null` only when `nullable` is set. */
  count(field: string, opts: { nullable?: boolean } = {}): number | null | undefined {
    const value = this.body[field];
    if (value === undefined) return undefined;
    if (value === null) {
      if (opts.nullable) return null;
      this.fail(field, 'This field may not be null.');
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      this.fail(field, 'Ensure this value is a non-negative integer.');
      return undefined;
    }
    return value;
  }

  date(field: string): Date | null | undefined {
    const value = this.body[field];
    if (value === undefined) return undefined;
    if (value === null || value === '') return null;
    if (typeof value !== 'string' || Number.isNaN(Date.parse(value))) {
      this.fail(field, 'Datetime has wrong format. Use an ISO 8601 date.');
      return undefined;
    }
    return new Date(value);
  }

  id(field: string, opts: { required: true }): string;
  id(field: string, opts?: { required?: boolean; nullable?: boolean }): string | null | undefined;
  id(field: string, opts: { required?: boolean; nullable?: boolean } = {}): string | null | undefined {
    const value = this.readId(field, opts);
    return value === undefined && opts.required ? '' : value;
  }

  private readId(field: string, opts: { required?: boolean; nullable?: boolean }): string | null | undefined {
    const value = this.body[field];
    if (value === undefined) {
      if (opts.required) this.fail(field, 'This field is required.');
      return undefined;
    }
    if (value === null) {
      if (opts.nullable) return null;
      this.fail(field, 'This field may not be null.');
      return undefined;
    }
    if (typeof value !== 'string' || !value.trim()) {
      this.fail(field, 'A valid id is required.');
      return undefined;
    }
    return value.trim();
  }

  idList(field: string): string[] | undefined {
    const value = this.body[field];
    if (value === undefined) return undefined;
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string' && v.trim() !== '')) {
      this.fail(field, 'Expected a list of ids.');
      return undefined;
    }
    return value.map(v => v.trim());
  }

  boolean(field: string): boolean | undefined {
    const value = this.body[field];
    if (value === undefined) return undefined;
    if (typeof value !== 'boolean') {
      this.fail(field, 'Must be a valid boolean.');
      return undefined;
    }
    return value;
  }

  object(field: string): Record<string, unknown> | undefined {
    const value = this.body[field];
    if (value === undefined || value === null) return undefined;
    if (!isPlainObject(value)) {
      this.fail(field, 'Expected a JSON object.');
      return undefined;
    }
    return value;
  }

  done(): void {
    if (Object.keys(this.errors).length) {
      throw new ValidationError('Invalid input', this.errors);
    }
  }
}
