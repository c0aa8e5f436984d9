/**
 * Conflict Checker
 *
 * A student has a period conflict when they are already enrolled in a
 * section of a *different* course that meets in the same period during an
 * overlapping part of the year. Other sections of the same course never
 * conflict.
 *
 * Two sources of truth are offered:
 * - ConflictChecker queries live section membership in the store. It is the
 *   final check before a placement is committed.
 * - PeriodOccupancy is an in-memory index seeded from the store at the start
 *   of a run and updated as placements are made, so the distributor does not
 *   rescan every section for every candidate.
 */

import { Section, Trimester, termsOverlap } from "../domain/section";
import { SchoolDatabase, getSchoolDatabase } from "../stores/schoolDatabase";
import { SectionStore } from "../stores/sectionStore";

interface OccupancyEntry {
  courseId: string;
  trimester: Trimester | null;
}

export class PeriodOccupancy {
  // studentId -> periodId -> entries
  private entries = new Map<string, Map<string, OccupancyEntry[]>>();

  static fromSections(sections: Section[]): PeriodOccupancy {
    const occupancy = new PeriodOccupancy();
    for (const section of sections) {
      if (!section.periodId) {
        continue;
      }
      for (const studentId of section.studentIds) {
        occupancy.add(studentId, section.periodId, section.courseId, section.trimester);
      }
    }
    return occupancy;
  }

  add(studentId: string, periodId: string, courseId: string, trimester: Trimester | null): void {
    let periods = this.entries.get(studentId);
    if (!periods) {
      periods = new Map();
      this.entries.set(studentId, periods);
    }

    const list = periods.get(periodId) ?? [];
    if (!list.some((e) => e.courseId === courseId && e.trimester === trimester)) {
      list.push({ courseId, trimester });
    }
    periods.set(periodId, list);
  }

  hasConflict(
    studentId: string,
    periodId: string,
    courseId: string,
    trimester: Trimester | null = null
  ): boolean {
    const list = this.entries.get(studentId)?.get(periodId) ?? [];
    return list.some((e) => e.courseId !== courseId && termsOverlap(e.trimester, trimester));
  }

  /**
   * Forget every placement in the given courses (after their sections are cleared)
   */
  removeCourses(courseIds: Iterable<string>): void {
    const removed = new Set(courseIds);
    for (const periods of this.entries.values()) {
      for (const [periodId, list] of periods) {
        const kept = list.filter((e) => !removed.has(e.courseId));
        if (kept.length > 0) {
          periods.set(periodId, kept);
        } else {
          periods.delete(periodId);
        }
      }
    }
  }

  clear(): void {
    this.entries.clear();
  }

  snapshot(): PeriodOccupancy {
    const copy = new PeriodOccupancy();
    for (const [studentId, periods] of this.entries) {
      const periodsCopy = new Map<string, OccupancyEntry[]>();
      for (const [periodId, list] of periods) {
        periodsCopy.set(periodId, list.map((e) => ({ ...e })));
      }
      copy.entries.set(studentId, periodsCopy);
    }
    return copy;
  }

  restore(from: PeriodOccupancy): void {
    this.entries = from.snapshot().entries;
  }
}

export class ConflictChecker {
  private sectionStore: SectionStore;

  constructor(db: SchoolDatabase = getSchoolDatabase()) {
    this.sectionStore = new SectionStore(db);
  }

  /**
   * Query current section membership for a conflicting enrollment
   */
  hasPeriodConflict(
    studentId: string,
    periodId: string,
    courseId: string,
    trimester: Trimester | null = null
  ): boolean {
    const conflict = this.sectionStore
      .getByStudent(studentId)
      .find(
        (s) =>
          s.periodId === periodId &&
          s.courseId !== courseId &&
          termsOverlap(s.trimester, trimester)
      );

    if (conflict) {
      console.warn(
        `[ConflictChecker] Student ${studentId} already has ${conflict.name} in period ${periodId}`
      );
      return true;
    }
    return false;
  }

  /**
   * periodId -> courseIds the student is enrolled in during that period
   */
  getStudentPeriodAssignments(studentId: string): Map<string, string[]> {
    const assignments = new Map<string, string[]>();
    for (const section of this.sectionStore.getByStudent(studentId)) {
      if (!section.periodId) {
        continue;
      }
      const courseIds = assignments.get(section.periodId) ?? [];
      if (!courseIds.includes(section.courseId)) {
        courseIds.push(section.courseId);
      }
      assignments.set(section.periodId, courseIds);
    }
    return assignments;
  }

  /**
   * Occupancy index built from the store's current state
   */
  buildOccupancy(): PeriodOccupancy {
    return PeriodOccupancy.fromSections(this.sectionStore.getAll());
  }
}
