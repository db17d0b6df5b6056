export type ValidationCode =
  | 'InvalidId'
  | 'InvalidContent'
  | 'InvalidText'
  | 'InvalidAction'
  | 'InvalidType'
  | 'InvalidRole'
  | 'DuplicateId'
  | 'DuplicateButtonText'
  | 'UserNotFound'
  | 'AlreadyAdmin';

export type EntityKind = 'page' | 'button' | 'action' | 'user';

export abstract class EngineError extends Error {
  abstract readonly code: string;
}

/**
 * User-correctable input problem. The editor flow stays open so the user can retry.
 */
export class ValidationError extends EngineError {
  public readonly code: ValidationCode;

  constructor(code: ValidationCode, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.code = code;
  }
}

const ENTITY_LABELS: Record<EntityKind, string> = {
  page: 'Page',
  button: 'Button',
  action: 'Action',
  user: 'User',
};

export class NotFoundError extends EngineError {
  public readonly code = 'NotFound';
  public readonly entity: EntityKind;
  public readonly id: string;

  constructor(entity: EntityKind, id: string) {
    super(`${ENTITY_LABELS[entity]} not found.`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

/**
 * Free text did not match the pipe-delimited grammar of the current editor step.
 */
export class FormatError extends EngineError {
  public readonly code = 'FormatError';
  public readonly expected: string;

  constructor(expected: string) {
    super(`Invalid format. Use: ${expected}`);
    this.name = 'FormatError';
    this.expected = expected;
  }
}

export class UnroutableCallbackError extends EngineError {
  public readonly code = 'UnroutableCallback';
  public readonly token: string;

  constructor(token: string) {
    super(`No route or action for callback "${token}"`);
    this.name = 'UnroutableCallbackError';
    this.token = token;
  }
}

export class PermissionDeniedError extends EngineError {
  public readonly code = 'PermissionDenied';
  public readonly permission: string;

  constructor(permission: string, message: string) {
    super(message);
    this.name = 'PermissionDeniedError';
    this.permission = permission;
  }
}

export class InternalError extends EngineError {
  public readonly code = 'InternalError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InternalError';
  }
}
