import { v4 as uuidv4 } from 'uuid';

export function newRegistrationId(): string {
  return uuidv4();
}
