import type { Catalog } from '../../catalog.js';

/** Deletes dropped registrations older than `daysOld` days and saves if any went. */
export async function cleanupRegistrations(catalog: Catalog, daysOld: number): Promise<number> {
  const removed = catalog.registrations.cleanup(daysOld);
  if (removed > 0) {
    await catalog.saveRegistrations();
  }
  return removed;
}
