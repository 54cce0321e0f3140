import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import { newRegistrationId } from '../ids.js';
import type { REGISTRATION_STATUSES } from '../records/schema.js';

/**
 * `waitlisted` and `pending` are valid stored states, but no transition here
 * produces or consumes them yet.
 */
export type RegistrationStatus = (typeof REGISTRATION_STATUSES)[number];

export interface RegistrationInput {
  id?: string;
  studentId: string;
  courseId: string;
}

export interface RegistrationSnapshot {
  id: string;
  studentId: string;
  courseId: string;
  status: RegistrationStatus;
  enrollmentDate: Date;
  dropDate: Date | null;
  grade: string | null;
  notes: string;
}

export class Registration {
  readonly id: string;
  readonly studentId: string;
  readonly courseId: string;
  private _status: RegistrationStatus = 'enrolled';
  private _enrollmentDate: Date;
  private _dropDate: Date | null = null;
  private _grade: string | null = null;
  private _notes = '';

  constructor(input: RegistrationInput, private readonly clock: Clock = systemClock) {
    this.id = input.id ?? newRegistrationId();
    this.studentId = input.studentId;
    this.courseId = input.courseId;
    this._enrollmentDate = clock.now();
  }

  static restore(snapshot: RegistrationSnapshot, clock: Clock = systemClock): Registration {
    const registration = new Registration(snapshot, clock);
    registration._status = snapshot.status;
    registration._enrollmentDate = new Date(snapshot.enrollmentDate.getTime());
    registration._dropDate =
      snapshot.status === 'dropped' && snapshot.dropDate !== null ? new Date(snapshot.dropDate.getTime()) : null;
    registration._grade = snapshot.grade;
    registration._notes = snapshot.notes;
    return registration;
  }

  get status(): RegistrationStatus { return this._status; }
  get enrollmentDate(): Date { return new Date(this._enrollmentDate.getTime()); }
  get dropDate(): Date | null {
    return this._dropDate === null ? null : new Date(this._dropDate.getTime());
  }
  get grade(): string | null { return this._grade; }
  get notes(): string { return this._notes; }

  isActive(): boolean {
    return this._status === 'enrolled';
  }

  isDropped(): boolean {
    return this._status === 'dropped';
  }

  /** enrolled → dropped. Any other state is left alone. */
  drop(): boolean {
    if (this._status !== 'enrolled') return false;
    this._status = 'dropped';
    this._dropDate = this.clock.now();
    return true;
  }

  /** dropped → enrolled. Any other state is left alone. */
  reEnroll(): boolean {
    if (this._status !== 'dropped') return false;
    this._status = 'enrolled';
    this._dropDate = null;
    return true;
  }

  setGrade(grade: string | null): void {
    this._grade = grade;
  }

  addNote(note: string): void {
    const text = note.trim();
    if (text === '') return;
    this._notes = this._notes === '' ? text : `${this._notes}; ${text}`;
  }
}
