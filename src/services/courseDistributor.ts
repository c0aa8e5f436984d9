/**
 * Single-Course Distributor
 *
 * Places every registered student of one course into one of the course's
 * sections:
 * - no student is double-booked in a period (see ConflictChecker)
 * - per period, a grade never places more students than it registered
 * - no section exceeds its effective capacity
 * - sections stay balanced (fewest-enrolled section wins)
 *
 * Students with the fewest available sections are placed first so that
 * hard-to-place students are not starved by flexible ones. Ties are broken
 * with the injected random source.
 */

import { Course } from "../domain/course";
import {
  CourseDistributionResult,
  UNASSIGNED_REASONS,
  UnassignedStudent,
  errorMessage,
  failure,
} from "../domain/distribution";
import { RandomSource, createRandom, randomIndex } from "../domain/random";
import { Section } from "../domain/section";
import { Student, toStudentSummary } from "../domain/user";
import { CourseStore } from "../stores/courseStore";
import { SchoolDatabase, getSchoolDatabase } from "../stores/schoolDatabase";
import { SectionStore } from "../stores/sectionStore";
import { UserStore } from "../stores/userStore";
import { ConflictChecker, PeriodOccupancy } from "./conflictChecker";
import { snapshotSections } from "./sectionSnapshot";

export interface DistributorOptions {
  random?: RandomSource;
}

interface SectionSlot {
  section: Section;
  periodId: string;
  capacity: number;
  enrolled: number;
}

export class CourseDistributor {
  private courseStore: CourseStore;
  private sectionStore: SectionStore;
  private userStore: UserStore;
  private conflictChecker: ConflictChecker;
  private random: RandomSource;

  constructor(
    private readonly db: SchoolDatabase = getSchoolDatabase(),
    options: DistributorOptions = {}
  ) {
    this.courseStore = new CourseStore(db);
    this.sectionStore = new SectionStore(db);
    this.userStore = new UserStore(db);
    this.conflictChecker = new ConflictChecker(db);
    this.random = options.random ?? createRandom();
  }

  /**
   * Distribute one course against the store's current enrollments
   */
  distributeCourse(courseId: string): CourseDistributionResult {
    return this.distributeWithOccupancy(courseId, this.conflictChecker.buildOccupancy());
  }

  /**
   * Distribute one course against a caller-maintained occupancy index (batch runs).
   * On failure the index is restored to its state before the call.
   */
  distributeWithOccupancy(courseId: string, occupancy: PeriodOccupancy): CourseDistributionResult {
    const course = this.courseStore.load(courseId);
    if (!course) {
      return failure(`Course with id ${courseId} not found`, "not_found");
    }

    const sections = this.sectionStore.getByCourse(course.id);
    const preconditionError = this.checkPreconditions(course, sections);
    if (preconditionError) {
      return failure(preconditionError, "precondition");
    }

    if (course.registeredStudentIds.length === 0) {
      return failure(`No students registered for ${course.name}`, "precondition");
    }

    const { students, missing } = this.getRegisteredStudents(course);
    const before = occupancy.snapshot();
    try {
      return this.db.transaction(() => this.run(course, sections, students, missing, occupancy));
    } catch (err) {
      occupancy.restore(before);
      console.error(`[CourseDistributor] Error distributing ${course.name}:`, err);
      return failure(errorMessage(err), "unexpected");
    }
  }

  private checkPreconditions(course: Course, sections: Section[]): string | null {
    if (sections.length === 0) {
      return `Course ${course.name} has no sections`;
    }

    const withoutPeriods = sections.filter((s) => !s.periodId);
    if (withoutPeriods.length > 0) {
      return `Course ${course.name} has sections without assigned periods: ${withoutPeriods
        .map((s) => s.name)
        .join(", ")}`;
    }
    return null;
  }

  /**
   * Registered ids split into loadable students and ids that no longer
   * resolve to a student. The latter are reported as unassigned.
   */
  private getRegisteredStudents(course: Course): { students: Student[]; missing: UnassignedStudent[] } {
    const students: Student[] = [];
    const missing: UnassignedStudent[] = [];
    for (const studentId of course.registeredStudentIds) {
      const student = this.userStore.loadStudent(studentId);
      if (student) {
        students.push(student);
      } else {
        console.warn(`[CourseDistributor] Registered student ${studentId} of ${course.name} not found`);
        missing.push({
          id: studentId,
          firstName: "",
          lastName: "",
          gradeLevel: course.gradeLevel,
          reason: UNASSIGNED_REASONS.studentNotFound,
        });
      }
    }
    return { students, missing };
  }

  private run(
    course: Course,
    sections: Section[],
    students: Student[],
    missing: UnassignedStudent[],
    occupancy: PeriodOccupancy
  ): CourseDistributionResult {
    this.sectionStore.clearCourseEnrollments(course.id);
    occupancy.removeCourses([course.id]);

    const slots: SectionSlot[] = [];
    for (const section of sections) {
      if (section.periodId) {
        slots.push({
          section,
          periodId: section.periodId,
          capacity: this.sectionStore.getCapacity(section),
          enrolled: 0,
        });
      }
    }

    // Occupancy is tracked per period per grade: a grade never fills more
    // seats in one period than it has registered students
    const gradeTotals = new Map<number, number>();
    for (const student of students) {
      gradeTotals.set(student.gradeLevel, (gradeTotals.get(student.gradeLevel) ?? 0) + 1);
    }
    const periodGradeCounts = new Map<string, number>();
    const gradeKey = (periodId: string, gradeLevel: number) => `${periodId}:${gradeLevel}`;

    const availableSlots = (student: Student): SectionSlot[] =>
      slots.filter(
        (slot) =>
          !occupancy.hasConflict(student.id, slot.periodId, course.id, slot.section.trimester) &&
          (periodGradeCounts.get(gradeKey(slot.periodId, student.gradeLevel)) ?? 0) <
            (gradeTotals.get(student.gradeLevel) ?? 0) &&
          slot.enrolled < slot.capacity
      );

    // Most constrained first, random among equals
    const ordered = students
      .map((student) => ({
        student,
        options: availableSlots(student).length,
        tiebreak: this.random.next(),
      }))
      .sort((a, b) => a.options - b.options || a.tiebreak - b.tiebreak)
      .map((entry) => entry.student);

    const unassigned: UnassignedStudent[] = [...missing];

    for (const student of ordered) {
      const available = availableSlots(student);
      if (available.length === 0) {
        console.warn(
          `[CourseDistributor] Cannot assign student ${student.id} to ${course.name}: no available sections`
        );
        unassigned.push({ ...toStudentSummary(student), reason: UNASSIGNED_REASONS.noAvailableSection });
        continue;
      }

      const fewest = Math.min(...available.map((slot) => slot.enrolled));
      const candidates = available.filter((slot) => slot.enrolled === fewest);
      const target = candidates[randomIndex(this.random, candidates.length)];

      if (
        this.conflictChecker.hasPeriodConflict(
          student.id,
          target.periodId,
          course.id,
          target.section.trimester
        )
      ) {
        console.error(
          `[CourseDistributor] Final check failed for student ${student.id} in period ${target.periodId}`
        );
        unassigned.push({ ...toStudentSummary(student), reason: UNASSIGNED_REASONS.finalCheckConflict });
        continue;
      }

      this.sectionStore.addStudent(target.section.id, student.id);
      target.enrolled++;
      occupancy.add(student.id, target.periodId, course.id, target.section.trimester);
      const key = gradeKey(target.periodId, student.gradeLevel);
      periodGradeCounts.set(key, (periodGradeCounts.get(key) ?? 0) + 1);
    }

    const totalStudents = course.registeredStudentIds.length;
    console.log(
      `[CourseDistributor] ${course.name}: placed ${totalStudents - unassigned.length}/${totalStudents} students across ${sections.length} sections`
    );

    return {
      success: true,
      courseId: course.id,
      courseName: course.name,
      courseCode: course.code,
      totalStudents,
      numSections: sections.length,
      distribution: snapshotSections(this.db, this.sectionStore.getByCourse(course.id)),
      unassigned,
    };
  }
}
