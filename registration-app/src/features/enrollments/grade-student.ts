import type { Registration } from 'enrollment-engine';
import type { Catalog } from '../../catalog.js';
import { RegistrationNotFoundError } from '../../domain/errors.js';

function requireRegistration(catalog: Catalog, registrationId: string): Registration {
  const registration = catalog.registrations.get(registrationId);
  if (registration === null) {
    throw new RegistrationNotFoundError(`Registration '${registrationId}' not found`);
  }
  return registration;
}

// Grades are recorded in any status; a null grade clears it.
export async function gradeStudent(
  catalog: Catalog,
  registrationId: string,
  grade: string | null,
): Promise<Registration> {
  const registration = requireRegistration(catalog, registrationId);
  registration.setGrade(grade);
  await catalog.saveRegistrations();
  return registration;
}

export async function addRegistrationNote(
  catalog: Catalog,
  registrationId: string,
  note: string,
): Promise<Registration> {
  const registration = requireRegistration(catalog, registrationId);
  registration.addNote(note);
  await catalog.saveRegistrations();
  return registration;
}
