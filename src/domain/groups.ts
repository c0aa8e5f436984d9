/**
 * Course Grouping Domain Models
 *
 * LanguageGroup: language courses for one grade that share a set of periods.
 * Every student of the grade rotates through all of the group's courses, one
 * per trimester, inside a single period slot.
 *
 * CourseGroup: a named set of mutually exclusive courses. A student may be
 * registered for at most one of them at a time.
 */

import { Course } from "./course";
import { TRIMESTERS } from "./section";

export interface LanguageGroup {
  id: string;
  name: string;
  gradeLevel: number;
  periodIds: string[];
  courseIds: string[]; // Order decides trimester: courseIds[i] runs in trimester i + 1
  createdAt: string;
  updatedAt?: string;
}

export interface CreateLanguageGroupInput {
  name?: string;
  gradeLevel: number;
  periodIds?: string[];
  courseIds?: string[];
}

export interface UpdateLanguageGroupInput {
  name?: string;
  periodIds?: string[];
  courseIds?: string[];
}

export interface CourseGroup {
  id: string;
  name: string;
  description?: string;
  courseIds: string[];
  createdAt: string;
  updatedAt?: string;
}

export interface CreateCourseGroupInput {
  name: string;
  description?: string;
  courseIds?: string[];
}

export interface UpdateCourseGroupInput {
  name?: string;
  description?: string;
  courseIds?: string[];
}

export const MAX_LANGUAGE_GROUP_COURSES = TRIMESTERS.length;

/**
 * Validate the courses of a language group. Periods are checked by the store,
 * which knows which ids exist.
 */
export function validateLanguageGroupCourses(gradeLevel: number, courses: Course[]): string[] {
  const errors: string[] = [];

  if (courses.length > MAX_LANGUAGE_GROUP_COURSES) {
    errors.push(
      `A language group can hold at most ${MAX_LANGUAGE_GROUP_COURSES} courses (one per trimester)`
    );
  }

  for (const course of courses) {
    if (course.courseType !== "LANGUAGE") {
      errors.push(`${course.name} is not a language course`);
    }
    if (course.gradeLevel !== gradeLevel) {
      errors.push(`${course.name} is for grade ${course.gradeLevel}, not grade ${gradeLevel}`);
    }
  }

  return errors;
}
