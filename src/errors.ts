export class InvalidScheduleError extends Error {
  override readonly name = 'InvalidScheduleError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidCourseError extends Error {
  override readonly name = 'InvalidCourseError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface RecordIssue {
  path: string;
  message: string;
}

export class RecordDecodeError extends Error {
  override readonly name = 'RecordDecodeError';

  constructor(
    readonly kind: 'course' | 'registration',
    readonly issues: RecordIssue[],
    message?: string,
  ) {
    super(message ?? `Invalid ${kind} record: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RecordStoreError extends Error {
  override readonly name = 'RecordStoreError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
