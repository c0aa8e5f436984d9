/**
 * Section Domain Model
 *
 * One scheduled instance of a Course. A section references (but does not own)
 * a period, a room and a teacher; deleting any of those nulls the reference.
 * Students land in `studentIds` only through the distributor.
 */

import { Course, CourseDuration } from "./course";

export type Trimester = 1 | 2 | 3;

export const TRIMESTERS: Trimester[] = [1, 2, 3];

export interface Section {
  id: string;
  courseId: string;
  sectionNumber: number; // Unique within the course
  name: string; // Unique, e.g. "ENG7-1"
  trimester: Trimester | null; // null = runs the whole year
  maxStudents?: number; // Optional override, never above the course max
  teacherId: string | null;
  periodId: string | null;
  roomId: string | null;

  // Students placed by the distributor
  studentIds: string[];

  createdAt: string;
  updatedAt?: string;
}

export interface CreateSectionInput {
  courseId: string;
  sectionNumber?: number; // Defaults to the course's next number
  name?: string;
  trimester?: Trimester | null;
  maxStudents?: number;
  teacherId?: string | null;
  periodId?: string | null;
  roomId?: string | null;
}

export interface UpdateSectionInput {
  name?: string;
  trimester?: Trimester | null;
  maxStudents?: number;
  teacherId?: string | null;
  periodId?: string | null;
  roomId?: string | null;
}

export function isTrimester(value: unknown): value is Trimester {
  return value === 1 || value === 2 || value === 3;
}

export function generateSectionName(
  course: Pick<Course, "name" | "code">,
  sectionNumber: number
): string {
  return `${course.code || course.name}-${sectionNumber}`;
}

/**
 * Two sections overlap in time of year unless both are trimester sections
 * scheduled in different trimesters.
 */
export function termsOverlap(a: Trimester | null, b: Trimester | null): boolean {
  if (a === null || b === null) {
    return true;
  }
  return a === b;
}

/**
 * Effective capacity: the smallest of the course max, the section override
 * and the room capacity.
 */
export function getSectionCapacity(
  section: Pick<Section, "maxStudents">,
  course: Pick<Course, "maxStudentsPerSection">,
  roomCapacity?: number
): number {
  let capacity = course.maxStudentsPerSection;
  if (section.maxStudents !== undefined) {
    capacity = Math.min(capacity, section.maxStudents);
  }
  if (roomCapacity !== undefined) {
    capacity = Math.min(capacity, roomCapacity);
  }
  return capacity;
}

/**
 * Validate the section fields that depend only on the section and its course.
 * Cross-section rules (numbering, teacher/room double-booking) live in the store.
 */
export function validateSection(
  input: { sectionNumber?: number; trimester?: unknown; maxStudents?: number },
  duration: CourseDuration
): string[] {
  const errors: string[] = [];

  if (input.sectionNumber !== undefined) {
    if (!Number.isInteger(input.sectionNumber) || input.sectionNumber < 1) {
      errors.push("sectionNumber must be at least 1");
    }
  }

  if (input.trimester !== undefined && input.trimester !== null && !isTrimester(input.trimester)) {
    errors.push("trimester must be 1, 2 or 3");
  }

  if (duration === "TRIMESTER" && (input.trimester === undefined || input.trimester === null)) {
    errors.push("Trimester courses must have a trimester assigned");
  }

  if (input.maxStudents !== undefined) {
    if (!Number.isInteger(input.maxStudents) || input.maxStudents < 1) {
      errors.push("maxStudents must be at least 1");
    }
  }

  return errors;
}
