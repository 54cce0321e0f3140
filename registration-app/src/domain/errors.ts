export class CourseNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CourseNotFoundError';
  }
}

export class CourseAlreadyExistsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CourseAlreadyExistsError';
  }
}

export class CourseInactiveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CourseInactiveError';
  }
}

export class CourseFullError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CourseFullError';
  }
}

export class StudentAlreadyEnrolledError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StudentAlreadyEnrolledError';
  }
}

export class StudentNotEnrolledError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StudentNotEnrolledError';
  }
}

export class RegistrationNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistrationNotFoundError';
  }
}

export class RegistrationNotDroppedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistrationNotDroppedError';
  }
}

export class PrerequisiteNotSatisfiedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PrerequisiteNotSatisfiedError';
  }
}

export class CourseLimitExceededError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CourseLimitExceededError';
  }
}

export class CreditLimitExceededError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CreditLimitExceededError';
  }
}

export class ScheduleConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScheduleConflictError';
  }
}

export class EnrollmentRejectedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnrollmentRejectedError';
  }
}

export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}
