/**
 * Section Store
 *
 * Sections and their enrollment. Enrollment is mutated only through the
 * set-style helpers at the bottom, which is all the distributor needs.
 */

import { randomUUID } from "crypto";
import {
  CreateSectionInput,
  Section,
  UpdateSectionInput,
  generateSectionName,
  getSectionCapacity,
  validateSection,
} from "../domain/section";
import { getFullName } from "../domain/user";
import { SchoolDatabase, definedFields, getSchoolDatabase } from "./schoolDatabase";
import { ValidationError } from "../domain/validationError";

function compareSections(a: Section, b: Section): number {
  return a.courseId.localeCompare(b.courseId) || a.sectionNumber - b.sectionNumber;
}

export class SectionStore {
  constructor(private readonly db: SchoolDatabase = getSchoolDatabase()) {}

  // ============================================
  // Core CRUD Operations
  // ============================================

  /**
   * Create a section. Number and name are generated when omitted.
   */
  create(input: CreateSectionInput): Section {
    const sectionNumber = input.sectionNumber ?? this.getNextSectionNumber(input.courseId);
    const candidate = {
      courseId: input.courseId,
      sectionNumber,
      name: input.name,
      trimester: input.trimester ?? null,
      maxStudents: input.maxStudents,
      teacherId: input.teacherId ?? null,
      periodId: input.periodId ?? null,
      roomId: input.roomId ?? null,
    };

    const errors = this.validate(candidate);
    if (errors.length > 0) {
      throw new ValidationError("section", errors);
    }

    const course = this.db.tables.courses.find((c) => c.id === input.courseId);
    const section: Section = {
      ...candidate,
      id: randomUUID(),
      name: input.name?.trim() || (course ? generateSectionName(course, sectionNumber) : `${sectionNumber}`),
      studentIds: [],
      createdAt: new Date().toISOString(),
    };

    this.db.tables.sections.push(section);
    this.db.save();
    return section;
  }

  /**
   * Validate a section against its course and every other section.
   * `sectionId` excludes the section itself when updating.
   */
  validate(
    candidate: {
      courseId: string;
      sectionNumber: number;
      name?: string;
      trimester: unknown;
      maxStudents?: number;
      teacherId: string | null;
      periodId: string | null;
      roomId: string | null;
      studentCount?: number;
    },
    sectionId?: string
  ): string[] {
    const tables = this.db.tables;
    const course = tables.courses.find((c) => c.id === candidate.courseId);
    if (!course) {
      return [`Course ${candidate.courseId} not found`];
    }

    const errors = validateSection(candidate, course.duration);
    const others = tables.sections.filter((s) => s.id !== sectionId);

    if (others.some((s) => s.courseId === course.id && s.sectionNumber === candidate.sectionNumber)) {
      errors.push(`Section number ${candidate.sectionNumber} already exists for ${course.name}`);
    }

    const name = candidate.name?.trim() || generateSectionName(course, candidate.sectionNumber);
    if (others.some((s) => s.name === name)) {
      errors.push(`Section name ${name} is already in use`);
    }

    if (candidate.periodId && !tables.periods.some((p) => p.id === candidate.periodId)) {
      errors.push(`Period ${candidate.periodId} not found`);
    }

    if (candidate.teacherId) {
      const teacher = tables.users.find((u) => u.id === candidate.teacherId);
      if (!teacher || teacher.role !== "TEACHER") {
        errors.push(`Teacher ${candidate.teacherId} not found`);
      } else if (
        candidate.periodId &&
        others.some((s) => s.teacherId === teacher.id && s.periodId === candidate.periodId)
      ) {
        errors.push(`Teacher ${getFullName(teacher)} is already scheduled for this period`);
      }
    }

    const room = candidate.roomId ? tables.rooms.find((r) => r.id === candidate.roomId) : undefined;
    if (candidate.roomId) {
      if (!room) {
        errors.push(`Room ${candidate.roomId} not found`);
      } else if (
        candidate.periodId &&
        others.some((s) => s.roomId === room.id && s.periodId === candidate.periodId)
      ) {
        errors.push(`Room ${room.name} is already scheduled for this period`);
      }
    }

    if (candidate.studentCount) {
      const capacity = getSectionCapacity(candidate, course, room?.capacity);
      if (candidate.studentCount > capacity) {
        errors.push(
          `Capacity ${capacity} is below the ${candidate.studentCount} students already enrolled`
        );
      }
    }

    return errors;
  }

  load(sectionId: string): Section | null {
    return this.db.tables.sections.find((s) => s.id === sectionId) || null;
  }

  getAll(): Section[] {
    return [...this.db.tables.sections].sort(compareSections);
  }

  /**
   * Sections of a course, by section number
   */
  getByCourse(courseId: string): Section[] {
    return this.db.tables.sections
      .filter((s) => s.courseId === courseId)
      .sort((a, b) => a.sectionNumber - b.sectionNumber);
  }

  getByPeriod(periodId: string): Section[] {
    return this.db.tables.sections.filter((s) => s.periodId === periodId).sort(compareSections);
  }

  /**
   * Sections a student is enrolled in
   */
  getByStudent(studentId: string): Section[] {
    return this.db.tables.sections.filter((s) => s.studentIds.includes(studentId)).sort(compareSections);
  }

  getNextSectionNumber(courseId: string): number {
    const numbers = this.db.tables.sections
      .filter((s) => s.courseId === courseId)
      .map((s) => s.sectionNumber);
    return numbers.length === 0 ? 1 : Math.max(...numbers) + 1;
  }

  update(sectionId: string, input: UpdateSectionInput): Section | null {
    const existing = this.load(sectionId);
    if (!existing) {
      return null;
    }

    const changes = definedFields(input);
    const errors = this.validate(
      { ...existing, ...changes, studentCount: existing.studentIds.length },
      sectionId
    );
    if (errors.length > 0) {
      throw new ValidationError("section", errors);
    }

    Object.assign(existing, changes, { updatedAt: new Date().toISOString() });
    this.db.save();
    return existing;
  }

  delete(sectionId: string): boolean {
    const tables = this.db.tables;
    const initialLength = tables.sections.length;
    tables.sections = tables.sections.filter((s) => s.id !== sectionId);

    if (tables.sections.length < initialLength) {
      this.db.save();
      return true;
    }
    return false;
  }

  /**
   * Effective capacity of a section (course max, section override, room)
   */
  getCapacity(section: Section): number {
    const tables = this.db.tables;
    const course = tables.courses.find((c) => c.id === section.courseId);
    const room = section.roomId ? tables.rooms.find((r) => r.id === section.roomId) : undefined;
    if (!course) {
      return section.maxStudents ?? 0;
    }
    return getSectionCapacity(section, course, room?.capacity);
  }

  // ============================================
  // Weak references
  // ============================================

  /**
   * Null out a period/room/teacher reference on every section that holds it
   */
  detachReference(field: "periodId" | "roomId" | "teacherId", id: string): number {
    let detached = 0;
    for (const section of this.db.tables.sections) {
      if (section[field] === id) {
        section[field] = null;
        detached++;
      }
    }
    if (detached > 0) {
      this.db.save();
    }
    return detached;
  }

  // ============================================
  // Enrollment
  // ============================================

  /**
   * Hand enrollment outside a distribution run. The student must exist and
   * the section must have room; period conflicts are not checked.
   */
  enrollStudent(sectionId: string, studentId: string): Section | null {
    const section = this.load(sectionId);
    if (!section) {
      return null;
    }
    if (section.studentIds.includes(studentId)) {
      return section;
    }

    const errors: string[] = [];
    const student = this.db.tables.users.find((u) => u.id === studentId);
    if (!student || student.role !== "STUDENT") {
      errors.push(`Student ${studentId} not found`);
    }
    const capacity = this.getCapacity(section);
    if (section.studentIds.length >= capacity) {
      errors.push(`Section ${section.name} is full (${capacity} students)`);
    }
    if (errors.length > 0) {
      throw new ValidationError("enrollment", errors);
    }

    return this.addStudent(sectionId, studentId);
  }

  addStudent(sectionId: string, studentId: string): Section | null {
    const section = this.load(sectionId);
    if (!section) {
      return null;
    }

    if (!section.studentIds.includes(studentId)) {
      section.studentIds.push(studentId);
      this.db.save();
    }
    return section;
  }

  removeStudent(sectionId: string, studentId: string): Section | null {
    const section = this.load(sectionId);
    if (!section) {
      return null;
    }

    section.studentIds = section.studentIds.filter((id) => id !== studentId);
    this.db.save();
    return section;
  }

  /**
   * Empty every section of a course. Returns the number of sections touched.
   */
  clearCourseEnrollments(courseId: string): number {
    const sections = this.db.tables.sections.filter((s) => s.courseId === courseId);
    for (const section of sections) {
      section.studentIds = [];
    }
    this.db.save();
    return sections.length;
  }

  clearAllEnrollments(): number {
    const sections = this.db.tables.sections;
    for (const section of sections) {
      section.studentIds = [];
    }
    this.db.save();
    return sections.length;
  }
}
