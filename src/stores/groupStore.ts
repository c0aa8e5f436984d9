/**
 * Group Store
 *
 * Language groups (trimester rotations of language courses) and course
 * groups (mutually exclusive courses).
 */

import { randomUUID } from "crypto";
import {
  CourseGroup,
  CreateCourseGroupInput,
  CreateLanguageGroupInput,
  LanguageGroup,
  UpdateCourseGroupInput,
  UpdateLanguageGroupInput,
  validateLanguageGroupCourses,
} from "../domain/groups";
import { Course } from "../domain/course";
import { SchoolDatabase, definedFields, getSchoolDatabase } from "./schoolDatabase";
import { ValidationError } from "../domain/validationError";

export class GroupStore {
  constructor(private readonly db: SchoolDatabase = getSchoolDatabase()) {}

  // ============================================
  // Language Groups
  // ============================================

  createLanguageGroup(input: CreateLanguageGroupInput): LanguageGroup {
    const courseIds = [...new Set(input.courseIds ?? [])];
    const periodIds = [...new Set(input.periodIds ?? [])];

    const errors = this.validateLanguageGroup(input.gradeLevel, courseIds, periodIds);
    if (errors.length > 0) {
      throw new ValidationError("language group", errors);
    }

    const group: LanguageGroup = {
      id: randomUUID(),
      name: input.name?.trim() || `Grade ${input.gradeLevel} Languages`,
      gradeLevel: input.gradeLevel,
      periodIds,
      courseIds,
      createdAt: new Date().toISOString(),
    };

    this.db.tables.languageGroups.push(group);
    this.db.save();
    return group;
  }

  /**
   * Courses must exist, be LANGUAGE courses of the group's grade, and belong
   * to no other language group. Periods must exist.
   */
  validateLanguageGroup(
    gradeLevel: number,
    courseIds: string[],
    periodIds: string[],
    groupId?: string
  ): string[] {
    const tables = this.db.tables;
    const errors: string[] = [];
    const courses: Course[] = [];

    for (const courseId of courseIds) {
      const course = tables.courses.find((c) => c.id === courseId);
      if (!course) {
        errors.push(`Course ${courseId} not found`);
        continue;
      }
      courses.push(course);

      const owner = tables.languageGroups.find(
        (g) => g.id !== groupId && g.courseIds.includes(courseId)
      );
      if (owner) {
        errors.push(`${course.name} already belongs to language group ${owner.name}`);
      }
    }

    for (const periodId of periodIds) {
      if (!tables.periods.some((p) => p.id === periodId)) {
        errors.push(`Period ${periodId} not found`);
      }
    }

    return [...errors, ...validateLanguageGroupCourses(gradeLevel, courses)];
  }

  loadLanguageGroup(groupId: string): LanguageGroup | null {
    return this.db.tables.languageGroups.find((g) => g.id === groupId) || null;
  }

  getLanguageGroups(): LanguageGroup[] {
    return [...this.db.tables.languageGroups].sort(
      (a, b) => a.gradeLevel - b.gradeLevel || a.name.localeCompare(b.name)
    );
  }

  /**
   * Ids of every course that is distributed as part of a language group
   */
  getLanguageGroupCourseIds(): Set<string> {
    return new Set(this.db.tables.languageGroups.flatMap((g) => g.courseIds));
  }

  updateLanguageGroup(groupId: string, input: UpdateLanguageGroupInput): LanguageGroup | null {
    const existing = this.loadLanguageGroup(groupId);
    if (!existing) {
      return null;
    }

    const merged = { ...existing, ...definedFields(input) };
    const courseIds = [...new Set(merged.courseIds)];
    const periodIds = [...new Set(merged.periodIds)];
    const errors = this.validateLanguageGroup(existing.gradeLevel, courseIds, periodIds, groupId);
    if (errors.length > 0) {
      throw new ValidationError("language group", errors);
    }

    Object.assign(existing, {
      name: merged.name.trim() || existing.name,
      courseIds,
      periodIds,
      updatedAt: new Date().toISOString(),
    });
    this.db.save();
    return existing;
  }

  deleteLanguageGroup(groupId: string): boolean {
    const tables = this.db.tables;
    const initialLength = tables.languageGroups.length;
    tables.languageGroups = tables.languageGroups.filter((g) => g.id !== groupId);

    if (tables.languageGroups.length < initialLength) {
      this.db.save();
      return true;
    }
    return false;
  }

  // ============================================
  // Course Groups
  // ============================================

  createCourseGroup(input: CreateCourseGroupInput): CourseGroup {
    const courseIds = [...new Set(input.courseIds ?? [])];
    const errors = this.validateCourseGroup(input.name, courseIds);
    if (errors.length > 0) {
      throw new ValidationError("course group", errors);
    }

    const group: CourseGroup = {
      id: randomUUID(),
      name: input.name.trim(),
      description: input.description,
      courseIds,
      createdAt: new Date().toISOString(),
    };

    this.db.tables.courseGroups.push(group);
    this.db.save();
    return group;
  }

  validateCourseGroup(name: string | undefined, courseIds: string[]): string[] {
    const errors: string[] = [];
    if (name !== undefined && name.trim().length === 0) {
      errors.push("name is required");
    }
    for (const courseId of courseIds) {
      if (!this.db.tables.courses.some((c) => c.id === courseId)) {
        errors.push(`Course ${courseId} not found`);
      }
    }
    return errors;
  }

  loadCourseGroup(groupId: string): CourseGroup | null {
    return this.db.tables.courseGroups.find((g) => g.id === groupId) || null;
  }

  getCourseGroups(): CourseGroup[] {
    return [...this.db.tables.courseGroups].sort((a, b) => a.name.localeCompare(b.name));
  }

  updateCourseGroup(groupId: string, input: UpdateCourseGroupInput): CourseGroup | null {
    const existing = this.loadCourseGroup(groupId);
    if (!existing) {
      return null;
    }

    const changes = definedFields(input);
    const courseIds = [...new Set(changes.courseIds ?? existing.courseIds)];
    const errors = this.validateCourseGroup(changes.name, courseIds);
    if (errors.length > 0) {
      throw new ValidationError("course group", errors);
    }

    Object.assign(existing, changes, { courseIds, updatedAt: new Date().toISOString() });
    this.db.save();
    return existing;
  }

  deleteCourseGroup(groupId: string): boolean {
    const tables = this.db.tables;
    const initialLength = tables.courseGroups.length;
    tables.courseGroups = tables.courseGroups.filter((g) => g.id !== groupId);

    if (tables.courseGroups.length < initialLength) {
      this.db.save();
      return true;
    }
    return false;
  }
}
