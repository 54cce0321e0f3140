import { CourseRegistry, RegistrationRegistry, systemClock } from 'enrollment-engine';
import type { Clock, RecordStore } from 'enrollment-engine';

/**
 * The live registries plus the store they are saved to. One instance is built
 * at startup and handed to every route; there is no module-level state.
 */
export class Catalog {
  // Saves run one at a time, each writing the registries as they are when it starts
  private writes: Promise<void> = Promise.resolve();

  constructor(
    readonly courses: CourseRegistry,
    readonly registrations: RegistrationRegistry,
    private readonly store: RecordStore,
    readonly clock: Clock = systemClock,
  ) {}

  static empty(store: RecordStore, clock: Clock = systemClock): Catalog {
    const courses = new CourseRegistry(clock);
    return new Catalog(courses, new RegistrationRegistry(courses, clock), store, clock);
  }

  static async load(store: RecordStore, clock: Clock = systemClock): Promise<Catalog> {
    const [courseRecords, registrationRecords] = await Promise.all([
      store.loadCourses(),
      store.loadRegistrations(),
    ]);
    const courses = CourseRegistry.fromRecords(courseRecords, clock);
    const registrations = RegistrationRegistry.fromRecords(registrationRecords, courses, clock);
    return new Catalog(courses, registrations, store, clock);
  }

  saveCourses(): Promise<void> {
    return this.enqueue(() => this.store.saveCourses(this.courses.toRecords()));
  }

  saveRegistrations(): Promise<void> {
    return this.enqueue(() => this.store.saveRegistrations(this.registrations.toRecords()));
  }

  /** Enrollment changes touch both collections: seat counters and registrations. */
  saveAll(): Promise<void> {
    return this.enqueue(async () => {
      await this.store.saveCourses(this.courses.toRecords());
      await this.store.saveRegistrations(this.registrations.toRecords());
    });
  }

  private enqueue(write: () => Promise<void>): Promise<void> {
    const run = this.writes.then(write);
    // A failed save rejects for its caller only; later saves still run
    this.writes = run.catch(() => undefined);
    return run;
  }
}
