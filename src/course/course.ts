import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import { InvalidCourseError } from '../errors.js';
import type { Schedule } from '../schedule/schedule.js';

export interface CourseInput {
  id: string;
  name: string;
  description?: string;
  credits: number;
  instructor: string;
  capacity: number;
  prerequisites?: Iterable<string>;
  schedule?: Schedule | null;
}

/** Restores a course exactly as it was saved, counters and timestamps included. */
export interface CourseSnapshot extends CourseInput {
  enrolled: number;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface CourseChanges {
  name?: string;
  description?: string;
  credits?: number;
  instructor?: string;
  capacity?: number;
  schedule?: Schedule | null;
}

function requirePositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidCourseError(`${field} must be a positive integer, got ${value}`);
  }
}

function requireText(field: string, value: string): string {
  const trimmed = value.trim();
  if (trimmed === '') {
    throw new InvalidCourseError(`${field} must not be empty`);
  }
  return trimmed;
}

export class Course {
  readonly id: string;
  private _name: string;
  private _description: string;
  private _credits: number;
  private _instructor: string;
  private _capacity: number;
  private _enrolled: number;
  private _prerequisites: ReadonlySet<string>;
  private _schedule: Schedule | null;
  private _active: boolean;
  private _createdAt: Date;
  private _updatedAt: Date;

  constructor(input: CourseInput, private readonly clock: Clock = systemClock) {
    this.id = requireText('id', input.id);
    this._name = requireText('name', input.name);
    this._description = input.description ?? '';
    requirePositiveInteger('credits', input.credits);
    this._credits = input.credits;
    this._instructor = input.instructor.trim();
    requirePositiveInteger('capacity', input.capacity);
    this._capacity = input.capacity;
    this._enrolled = 0;
    this._prerequisites = new Set(input.prerequisites ?? []);
    this._schedule = input.schedule ?? null;
    this._active = true;
    this._createdAt = clock.now();
    this._updatedAt = this._createdAt;
  }

  static restore(snapshot: CourseSnapshot, clock: Clock = systemClock): Course {
    const course = new Course(snapshot, clock);
    if (!Number.isInteger(snapshot.enrolled) || snapshot.enrolled < 0 || snapshot.enrolled > snapshot.capacity) {
      throw new InvalidCourseError(
        `enrolled must be between 0 and capacity (${snapshot.capacity}), got ${snapshot.enrolled}`,
      );
    }
    if (snapshot.updatedAt < snapshot.createdAt) {
      throw new InvalidCourseError(`Course '${snapshot.id}' was updated before it was created`);
    }
    course._enrolled = snapshot.enrolled;
    course._active = snapshot.active;
    course._createdAt = new Date(snapshot.createdAt.getTime());
    course._updatedAt = new Date(snapshot.updatedAt.getTime());
    return course;
  }

  get name(): string { return this._name; }
  get description(): string { return this._description; }
  get credits(): number { return this._credits; }
  get instructor(): string { return this._instructor; }
  get capacity(): number { return this._capacity; }
  get enrolled(): number { return this._enrolled; }
  get prerequisites(): string[] { return [...this._prerequisites]; }
  get schedule(): Schedule | null { return this._schedule; }
  get active(): boolean { return this._active; }
  get createdAt(): Date { return new Date(this._createdAt.getTime()); }
  get updatedAt(): Date { return new Date(this._updatedAt.getTime()); }

  isFull(): boolean {
    return this._enrolled >= this._capacity;
  }

  canEnroll(): boolean {
    return this._active && !this.isFull();
  }

  /**
   * Takes one seat. Returns false without touching the counters when the course
   * is inactive or full.
   */
  enroll(): boolean {
    if (!this.canEnroll()) return false;
    this._enrolled += 1;
    this.touch();
    return true;
  }

  /** Releases one seat; never takes the counter below zero. */
  drop(): boolean {
    if (this._enrolled === 0) return false;
    this._enrolled -= 1;
    this.touch();
    return true;
  }

  availableSeats(): number {
    return Math.max(0, this._capacity - this._enrolled);
  }

  enrollmentPercentage(): number {
    return (this._enrolled / this._capacity) * 100;
  }

  hasPrerequisites(): boolean {
    return this._prerequisites.size > 0;
  }

  meetsPrerequisites(completedCourseIds: Iterable<string>): boolean {
    if (this._prerequisites.size === 0) return true;
    const completed = new Set(completedCourseIds);
    for (const prerequisite of this._prerequisites) {
      if (!completed.has(prerequisite)) return false;
    }
    return true;
  }

  /** Unmet prerequisite ids, in declaration order. */
  missingPrerequisites(completedCourseIds: Iterable<string>): string[] {
    const completed = new Set(completedCourseIds);
    return [...this._prerequisites].filter((id) => !completed.has(id));
  }

  conflictsWith(other: Course): boolean {
    if (this._schedule === null || other._schedule === null) return false;
    return this._schedule.overlaps(other._schedule);
  }

  setSchedule(schedule: Schedule | null): void {
    this._schedule = schedule;
    this.touch();
  }

  update(changes: CourseChanges): void {
    // Validate everything before assigning anything
    const name = changes.name !== undefined ? requireText('name', changes.name) : this._name;
    if (changes.credits !== undefined) requirePositiveInteger('credits', changes.credits);
    if (changes.capacity !== undefined) {
      requirePositiveInteger('capacity', changes.capacity);
      if (changes.capacity < this._enrolled) {
        throw new InvalidCourseError(
          `capacity ${changes.capacity} is below the ${this._enrolled} students already enrolled`,
        );
      }
    }

    this._name = name;
    if (changes.description !== undefined) this._description = changes.description;
    if (changes.credits !== undefined) this._credits = changes.credits;
    if (changes.instructor !== undefined) this._instructor = changes.instructor.trim();
    if (changes.capacity !== undefined) this._capacity = changes.capacity;
    if (changes.schedule !== undefined) this._schedule = changes.schedule;
    this.touch();
  }

  /** Soft delete. The course keeps its id and history and is never reactivated. */
  deactivate(): void {
    if (!this._active) return;
    this._active = false;
    this.touch();
  }

  private touch(): void {
    const now = this.clock.now();
    if (now > this._updatedAt) this._updatedAt = now;
  }
}
