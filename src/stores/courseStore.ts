/**
 * Course Store
 *
 * Courses and their registered-student rosters. Section enrollment lives on
 * the sections themselves (see SectionStore).
 */

import { randomUUID } from "crypto";
import {
  Course,
  CourseType,
  CreateCourseInput,
  UpdateCourseInput,
  getCourseLabel,
  validateCourse,
} from "../domain/course";
import { validateLanguageGroupCourses } from "../domain/groups";
import { SchoolDatabase, definedFields, getSchoolDatabase } from "./schoolDatabase";
import { ValidationError } from "../domain/validationError";

export class CourseStore {
  constructor(private readonly db: SchoolDatabase = getSchoolDatabase()) {}

  /**
   * Create a new course
   */
  create(input: CreateCourseInput): Course {
    const errors = this.validate(input);
    if (errors.length > 0) {
      throw new ValidationError("course", errors);
    }

    const registrationErrors = this.checkStudents(
      [...new Set(input.registeredStudentIds ?? [])],
      this.findPeers(null, input.exclusivityGroup)
    );
    if (registrationErrors.length > 0) {
      throw new ValidationError("registration", registrationErrors);
    }

    const course: Course = {
      id: randomUUID(),
      name: input.name.trim(),
      code: input.code || undefined,
      description: input.description,
      gradeLevel: input.gradeLevel,
      courseType: input.courseType ?? "CORE",
      duration: input.duration ?? "TRIMESTER",
      numSections: input.numSections ?? 1,
      maxStudentsPerSection: input.maxStudentsPerSection ?? 30,
      exclusivityGroup: input.exclusivityGroup || undefined,
      studentCountRequirement: input.studentCountRequirement,
      registeredStudentIds: [...new Set(input.registeredStudentIds ?? [])],
      createdAt: new Date().toISOString(),
    };

    this.db.tables.courses.push(course);
    this.db.save();
    return course;
  }

  /**
   * Validate a create/update payload, including code uniqueness
   */
  validate(input: CreateCourseInput | UpdateCourseInput, courseId?: string): string[] {
    const errors = validateCourse(input);

    if (input.code) {
      const code = input.code.toLowerCase();
      const clash = this.db.tables.courses.find(
        (c) => c.id !== courseId && c.code !== undefined && c.code.toLowerCase() === code
      );
      if (clash) {
        errors.push(`code ${input.code} is already used by ${clash.name}`);
      }
    }

    return errors;
  }

  load(courseId: string): Course | null {
    return this.db.tables.courses.find((c) => c.id === courseId) || null;
  }

  /**
   * All courses ordered by grade level, then name
   */
  getAll(): Course[] {
    return [...this.db.tables.courses].sort(
      (a, b) => a.gradeLevel - b.gradeLevel || a.name.localeCompare(b.name)
    );
  }

  getByGradeLevel(gradeLevel: number): Course[] {
    return this.getAll().filter((c) => c.gradeLevel === gradeLevel);
  }

  getByType(courseType: CourseType): Course[] {
    return this.getAll().filter((c) => c.courseType === courseType);
  }

  /**
   * Update a course
   */
  update(courseId: string, input: UpdateCourseInput): Course | null {
    const existing = this.load(courseId);
    if (!existing) {
      return null;
    }

    const changes = definedFields(input);
    const errors = [...this.validate(changes, courseId), ...this.validateScheduling(existing, changes)];
    if (errors.length > 0) {
      throw new ValidationError("course", errors);
    }

    Object.assign(existing, changes, {
      name: changes.name?.trim() ?? existing.name,
      updatedAt: new Date().toISOString(),
    });
    this.db.save();
    return existing;
  }

  /**
   * An update must keep the course valid for the language groups holding it
   * and for the sections it already has
   */
  private validateScheduling(existing: Course, changes: UpdateCourseInput): string[] {
    const updated: Course = { ...existing, ...changes };
    const errors: string[] = [];

    for (const group of this.db.tables.languageGroups) {
      if (group.courseIds.includes(existing.id)) {
        errors.push(
          ...validateLanguageGroupCourses(group.gradeLevel, [updated]).map((e) => `${e} (${group.name})`)
        );
      }
    }

    if (updated.duration === "TRIMESTER") {
      const unscheduled = this.db.tables.sections.filter(
        (s) => s.courseId === existing.id && s.trimester === null
      );
      if (unscheduled.length > 0) {
        errors.push(
          `Trimester courses must have a trimester assigned: ${unscheduled.map((s) => s.name).join(", ")}`
        );
      }
    }

    return errors;
  }

  /**
   * Delete a course along with its sections, and drop it from any group
   */
  delete(courseId: string): boolean {
    const tables = this.db.tables;
    const initialLength = tables.courses.length;
    tables.courses = tables.courses.filter((c) => c.id !== courseId);
    if (tables.courses.length === initialLength) {
      return false;
    }

    tables.sections = tables.sections.filter((s) => s.courseId !== courseId);
    for (const group of [...tables.languageGroups, ...tables.courseGroups]) {
      group.courseIds = group.courseIds.filter((id) => id !== courseId);
    }

    this.db.save();
    return true;
  }

  // ============================================
  // Registration (pre-distribution roster)
  // ============================================

  /**
   * Courses a student may not be registered for alongside this one: members of
   * a shared CourseGroup, or courses with the same exclusivity label
   */
  getExclusivePeers(courseId: string): Course[] {
    const course = this.load(courseId);
    if (!course) {
      return [];
    }
    return this.findPeers(course.id, course.exclusivityGroup);
  }

  /**
   * `courseId` is null for a course that is not stored yet
   */
  private findPeers(courseId: string | null, exclusivityGroup?: string): Course[] {
    const peerIds = new Set<string>();
    if (courseId) {
      for (const group of this.db.tables.courseGroups) {
        if (group.courseIds.includes(courseId)) {
          group.courseIds.forEach((id) => peerIds.add(id));
        }
      }
    }
    if (exclusivityGroup) {
      for (const other of this.db.tables.courses) {
        if (other.exclusivityGroup === exclusivityGroup) {
          peerIds.add(other.id);
        }
      }
    }
    if (courseId) {
      peerIds.delete(courseId);
    }

    return this.db.tables.courses.filter((c) => peerIds.has(c.id));
  }

  /**
   * Problems that would block registering these students
   */
  validateRegistration(courseId: string, studentIds: string[]): string[] {
    return this.checkStudents(studentIds, this.getExclusivePeers(courseId));
  }

  private checkStudents(studentIds: string[], peers: Course[]): string[] {
    const errors: string[] = [];

    for (const studentId of studentIds) {
      const student = this.db.tables.users.find((u) => u.id === studentId);
      if (!student || student.role !== "STUDENT") {
        errors.push(`Student ${studentId} not found`);
        continue;
      }

      const clash = peers.find((p) => p.registeredStudentIds.includes(studentId));
      if (clash) {
        errors.push(
          `${student.firstName} ${student.lastName} is already registered for ${getCourseLabel(clash)}`
        );
      }
    }

    return errors;
  }

  /**
   * Register students for a course (duplicates are ignored)
   */
  registerStudents(courseId: string, studentIds: string[]): Course | null {
    const existing = this.load(courseId);
    if (!existing) {
      return null;
    }

    const errors = this.validateRegistration(courseId, studentIds);
    if (errors.length > 0) {
      throw new ValidationError("registration", errors);
    }

    const newStudentIds = studentIds.filter((id) => !existing.registeredStudentIds.includes(id));
    existing.registeredStudentIds = [...existing.registeredStudentIds, ...newStudentIds];
    existing.updatedAt = new Date().toISOString();

    this.db.save();
    return existing;
  }

  /**
   * Remove a student from the roster and from every section of the course
   */
  unregisterStudent(courseId: string, studentId: string): Course | null {
    const existing = this.load(courseId);
    if (!existing) {
      return null;
    }

    existing.registeredStudentIds = existing.registeredStudentIds.filter((id) => id !== studentId);
    existing.updatedAt = new Date().toISOString();
    for (const section of this.db.tables.sections) {
      if (section.courseId === courseId) {
        section.studentIds = section.studentIds.filter((id) => id !== studentId);
      }
    }

    this.db.save();
    return existing;
  }

  /**
   * Replace the roster as a whole. Skips exclusivity checks: used by the
   * language-group distributor, whose courses are exclusive per trimester only.
   */
  setRegisteredStudents(courseId: string, studentIds: string[]): Course | null {
    const existing = this.load(courseId);
    if (!existing) {
      return null;
    }

    existing.registeredStudentIds = [...new Set(studentIds)];
    existing.updatedAt = new Date().toISOString();
    this.db.save();
    return existing;
  }

  findByStudent(studentId: string): Course[] {
    return this.getAll().filter((c) => c.registeredStudentIds.includes(studentId));
  }
}
