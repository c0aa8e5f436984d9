/**
 * Post-distribution checks. Read-only: problems are reported, never fixed.
 */

import { checkStudentCountRequirement } from "../domain/course";
import {
  DistributionValidation,
  GradeLevelValidation,
  PeriodConflict,
} from "../domain/distribution";
import { Section, termsOverlap } from "../domain/section";
import { CourseStore } from "../stores/courseStore";
import { PeriodStore } from "../stores/periodStore";
import { SchoolDatabase, getSchoolDatabase } from "../stores/schoolDatabase";
import { SectionStore } from "../stores/sectionStore";
import { UserStore } from "../stores/userStore";

export class DistributionValidator {
  private courseStore: CourseStore;
  private sectionStore: SectionStore;
  private periodStore: PeriodStore;
  private userStore: UserStore;

  constructor(db: SchoolDatabase = getSchoolDatabase()) {
    this.courseStore = new CourseStore(db);
    this.sectionStore = new SectionStore(db);
    this.periodStore = new PeriodStore(db);
    this.userStore = new UserStore(db);
  }

  /**
   * 1. Every CORE course of the grade enrolls the whole grade
   * 2. No period holds more of the grade's students than the grade has
   */
  validateGradeLevel(gradeLevel: number): GradeLevelValidation {
    const gradeStudentIds = new Set(this.userStore.getStudents(gradeLevel).map((s) => s.id));
    const totalStudents = gradeStudentIds.size;
    const errors: string[] = [];

    for (const course of this.courseStore.getByGradeLevel(gradeLevel)) {
      if (course.courseType !== "CORE") {
        continue;
      }

      const enrolled = new Set(
        this.sectionStore
          .getByCourse(course.id)
          .flatMap((s) => s.studentIds)
          .filter((id) => gradeStudentIds.has(id))
      );
      if (enrolled.size !== totalStudents) {
        errors.push(
          `Required course ${course.name} has ${enrolled.size} students enrolled, but grade ${gradeLevel} has ${totalStudents} total students`
        );
      }
    }

    for (const period of this.periodStore.getAll()) {
      const inPeriod = new Set(
        this.sectionStore
          .getByPeriod(period.id)
          .flatMap((s) => s.studentIds)
          .filter((id) => gradeStudentIds.has(id))
      );
      if (inPeriod.size > totalStudents) {
        errors.push(
          `Period ${period.name} has ${inPeriod.size} students from grade ${gradeLevel}, which exceeds the grade level total of ${totalStudents}`
        );
      }
    }

    return { valid: errors.length === 0, totalStudents, errors };
  }

  /**
   * Students enrolled in two different courses meeting in the same period
   * during overlapping terms
   */
  findPeriodConflicts(): PeriodConflict[] {
    const conflicts: PeriodConflict[] = [];
    const sectionsByStudent = new Map<string, Section[]>();

    for (const section of this.sectionStore.getAll()) {
      for (const studentId of section.studentIds) {
        const list = sectionsByStudent.get(studentId) ?? [];
        list.push(section);
        sectionsByStudent.set(studentId, list);
      }
    }

    for (const [studentId, studentSections] of sectionsByStudent) {
      const byPeriod = new Map<string, Section[]>();
      for (const section of studentSections) {
        if (!section.periodId) continue;
        const list = byPeriod.get(section.periodId) ?? [];
        list.push(section);
        byPeriod.set(section.periodId, list);
      }

      for (const [periodId, periodSections] of byPeriod) {
        const clashing = periodSections.filter((a) =>
          periodSections.some(
            (b) => b.courseId !== a.courseId && termsOverlap(a.trimester, b.trimester)
          )
        );
        if (clashing.length > 0) {
          conflicts.push({ studentId, periodId, sectionIds: clashing.map((s) => s.id) });
        }
      }
    }

    return conflicts;
  }

  /**
   * Messages for courses whose registered count misses their count requirement
   */
  checkStudentCountRequirements(): string[] {
    const warnings: string[] = [];
    const gradePopulation = new Map<number, number>();
    for (const student of this.userStore.getStudents()) {
      gradePopulation.set(student.gradeLevel, (gradePopulation.get(student.gradeLevel) ?? 0) + 1);
    }

    for (const course of this.courseStore.getAll()) {
      const warning = checkStudentCountRequirement(course, gradePopulation.get(course.gradeLevel) ?? 0);
      if (warning) {
        warnings.push(warning);
      }
    }
    return warnings;
  }

  /**
   * Run every check. Grade levels default to those with CORE courses.
   */
  validateAll(gradeLevels?: number[]): DistributionValidation {
    const grades =
      gradeLevels ?? [...new Set(this.courseStore.getByType("CORE").map((c) => c.gradeLevel))];

    const results: Record<number, GradeLevelValidation> = {};
    for (const gradeLevel of grades) {
      const validation = this.validateGradeLevel(gradeLevel);
      if (!validation.valid) {
        console.error(`[DistributionValidator] Grade ${gradeLevel}: ${validation.errors.join("; ")}`);
      }
      results[gradeLevel] = validation;
    }

    return {
      gradeLevels: results,
      conflicts: this.findPeriodConflicts(),
      requirementWarnings: this.checkStudentCountRequirements(),
    };
  }
}
