import type { Course, Registration } from 'enrollment-engine';

export function courseView(course: Course) {
  return {
    id: course.id,
    name: course.name,
    description: course.description,
    credits: course.credits,
    instructor: course.instructor,
    capacity: course.capacity,
    enrolled: course.enrolled,
    availableSeats: course.availableSeats(),
    enrollmentPercentage: course.enrollmentPercentage(),
    isFull: course.isFull(),
    prerequisites: course.prerequisites,
    schedule: course.schedule?.toRecord() ?? null,
    active: course.active,
    createdAt: course.createdAt.toISOString(),
    updatedAt: course.updatedAt.toISOString(),
  };
}

export function registrationView(registration: Registration) {
  return {
    id: registration.id,
    studentId: registration.studentId,
    courseId: registration.courseId,
    status: registration.status,
    enrollmentDate: registration.enrollmentDate.toISOString(),
    dropDate: registration.dropDate?.toISOString() ?? null,
    grade: registration.grade,
    notes: registration.notes,
  };
}
