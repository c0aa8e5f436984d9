/**
 * User Domain Model
 *
 * Students, teachers and administrators share one record type. Only students
 * carry a grade level; only teachers can be assigned to sections.
 *
 * A student's period assignments are not stored on the user. They are derived
 * from the sections whose studentIds include the user.
 */

import { MAX_GRADE_LEVEL, MIN_GRADE_LEVEL } from "./course";

export type UserRole = "ADMIN" | "TEACHER" | "STUDENT";

export const USER_ROLES: UserRole[] = ["ADMIN", "TEACHER", "STUDENT"];

export interface User {
  id: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  email?: string;
  gradeLevel?: number; // Required for students
  createdAt: string;
  updatedAt?: string;
}

export interface Student extends User {
  role: "STUDENT";
  gradeLevel: number;
}

/**
 * Compact student shape used in distribution results
 */
export interface StudentSummary {
  id: string;
  firstName: string;
  lastName: string;
  gradeLevel: number;
}

export interface CreateUserInput {
  firstName: string;
  lastName: string;
  role?: UserRole;
  email?: string;
  gradeLevel?: number;
}

export interface UpdateUserInput {
  firstName?: string;
  lastName?: string;
  email?: string;
  gradeLevel?: number;
}

export function isUserRole(value: unknown): value is UserRole {
  return typeof value === "string" && (USER_ROLES as string[]).includes(value);
}

export function isStudent(user: User): user is Student {
  return user.role === "STUDENT" && typeof user.gradeLevel === "number";
}

export function getFullName(user: Pick<User, "firstName" | "lastName">): string {
  return `${user.firstName} ${user.lastName}`.trim();
}

export function toStudentSummary(student: Student): StudentSummary {
  return {
    id: student.id,
    firstName: student.firstName,
    lastName: student.lastName,
    gradeLevel: student.gradeLevel,
  };
}

export function validateUser(input: {
  firstName?: string;
  lastName?: string;
  role?: unknown;
  gradeLevel?: number;
}): string[] {
  const errors: string[] = [];

  if (input.firstName !== undefined && input.firstName.trim().length === 0) {
    errors.push("firstName is required");
  }
  if (input.lastName !== undefined && input.lastName.trim().length === 0) {
    errors.push("lastName is required");
  }
  if (input.role !== undefined && !isUserRole(input.role)) {
    errors.push(`role must be one of ${USER_ROLES.join(", ")}`);
  }

  if (input.role === "STUDENT" && input.gradeLevel === undefined) {
    errors.push("Students must have a gradeLevel");
  }
  if (input.gradeLevel !== undefined) {
    if (
      !Number.isInteger(input.gradeLevel) ||
      input.gradeLevel < MIN_GRADE_LEVEL ||
      input.gradeLevel > MAX_GRADE_LEVEL
    ) {
      errors.push(`gradeLevel must be between ${MIN_GRADE_LEVEL} and ${MAX_GRADE_LEVEL}`);
    }
  }

  return errors;
}
