export type LeaveErrorCode =
  | 'NotFound'
  | 'InvalidInput'
  | 'InvalidDuration'
  | 'InsufficientNotice'
  | 'InsufficientBalance'
  | 'Conflict';

/**
 * A precondition failure of a leave operation. Every rejected operation maps to
 * exactly one code and leaves the stores untouched.
 *
 * `NotFound` also covers "not authorized": callers cannot tell an unknown record
 * from one they may not act on.
 */
export class LeaveError extends Error {
  readonly code: LeaveErrorCode;

  constructor(code: LeaveErrorCode, message: string) {
    super(message);
    this.name = 'LeaveError';
    this.code = code;
  }
}

export const HTTP_STATUS_BY_CODE: Record<LeaveErrorCode, number> = {
  NotFound: 404,
  InvalidInput: 400,
  InvalidDuration: 400,
  InsufficientNotice: 422,
  InsufficientBalance: 422,
  Conflict: 409,
};
