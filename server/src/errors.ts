export type FieldErrors = Record<string, string[]>;

export class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): { error: string; fields?: FieldErrors } {
    return { error: this.message };
  }
}

export class ValidationError extends HttpError {
  constructor(message: string, readonly fields?: FieldErrors) {
    super(400, message);
  }

  static field(name: string, message: string): ValidationError {
    return new ValidationError(message, { [name]: [message] });
  }

  override toJSON(): { error: string; fields?: FieldErrors } {
    return this.fields ? { error: this.message, fields: this.fields } : { error: this.message };
  }
}

export class AuthenticationError extends HttpError {
  constructor(message = 'Unauthorized') {
    super(401, message);
  }
}

export class PermissionDeniedError extends HttpError {
  constructor(message = 'Access denied') {
    super(403, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(entity: string) {
    super(404, `${entity} not found`);
  }
}
