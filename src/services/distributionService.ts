/**
 * Distribution Service
 *
 * Entry point for every distribution operation:
 * - distribute one course / one language group
 * - distribute everything (batch)
 * - clear one course / everything
 * - report a course's distribution status
 *
 * Every operation answers with a structured result; nothing throws across
 * this boundary.
 */

import {
  Course,
  CourseType,
  DEFAULT_COURSE_TYPE_PRIORITY,
  getCourseTypeRank,
} from "../domain/course";
import {
  BatchDistributionResult,
  ClearResult,
  CourseDistributionResult,
  DistributionStatusResult,
  LanguageGroupDistributionResult,
  errorMessage,
  failure,
} from "../domain/distribution";
import { RandomSource, createRandom } from "../domain/random";
import { CourseStore } from "../stores/courseStore";
import { GroupStore } from "../stores/groupStore";
import { SchoolDatabase, getSchoolDatabase } from "../stores/schoolDatabase";
import { SectionStore } from "../stores/sectionStore";
import { PeriodOccupancy } from "./conflictChecker";
import { CourseDistributor } from "./courseDistributor";
import { DistributionValidator } from "./distributionValidation";
import { LanguageGroupDistributor } from "./languageGroupDistributor";
import { snapshotSections } from "./sectionSnapshot";

export interface DistributionServiceOptions {
  /** Fixes every random tiebreak; omit for varied groupings per run */
  seed?: number | null;
  /** Supplied random source; takes precedence over `seed` */
  random?: RandomSource;
  courseTypePriority?: CourseType[];
}

export class DistributionService {
  private courseStore: CourseStore;
  private sectionStore: SectionStore;
  private groupStore: GroupStore;
  private courseDistributor: CourseDistributor;
  private languageGroupDistributor: LanguageGroupDistributor;
  private validator: DistributionValidator;
  private courseTypePriority: CourseType[];

  constructor(
    private readonly db: SchoolDatabase = getSchoolDatabase(),
    options: DistributionServiceOptions = {}
  ) {
    const random = options.random ?? createRandom(options.seed);
    this.courseStore = new CourseStore(db);
    this.sectionStore = new SectionStore(db);
    this.groupStore = new GroupStore(db);
    this.courseDistributor = new CourseDistributor(db, { random });
    this.languageGroupDistributor = new LanguageGroupDistributor(db, { random });
    this.validator = new DistributionValidator(db);
    this.courseTypePriority = options.courseTypePriority ?? DEFAULT_COURSE_TYPE_PRIORITY;
  }

  distribute(courseId: string): CourseDistributionResult {
    return this.courseDistributor.distributeCourse(courseId);
  }

  distributeLanguageGroup(groupId: string): LanguageGroupDistributionResult {
    return this.languageGroupDistributor.distributeLanguageGroup(groupId);
  }

  /**
   * Clear everything, rotate language groups, then distribute the remaining
   * courses hardest-first. Each group/course runs in its own nested
   * transaction, so one failing unit rolls back only its own writes.
   */
  distributeAll(): BatchDistributionResult {
    try {
      return this.db.transaction(() => {
        this.sectionStore.clearAllEnrollments();
        console.log("[DistributionService] Cleared all existing distributions");

        const occupancy = new PeriodOccupancy();
        const languageGroups: Record<string, LanguageGroupDistributionResult> = {};
        for (const group of this.groupStore.getLanguageGroups()) {
          languageGroups[group.id] = this.languageGroupDistributor.distributeWithOccupancy(
            group.id,
            occupancy
          );
        }

        const courses: Record<string, CourseDistributionResult> = {};
        for (const course of this.getBatchCourses()) {
          courses[course.id] = this.courseDistributor.distributeWithOccupancy(course.id, occupancy);
        }

        const validation = this.validator.validateAll();
        if (validation.conflicts.length > 0) {
          console.error(
            `[DistributionService] ${validation.conflicts.length} period conflicts remain after distribution`
          );
        }

        return { success: true as const, languageGroups, courses, validation };
      });
    } catch (err) {
      console.error("[DistributionService] Error distributing all courses:", err);
      return failure(errorMessage(err), "unexpected");
    }
  }

  /**
   * Courses the batch distributes individually, in the order it runs them:
   * course-type priority, fewer sections first, then more students first
   */
  getBatchCourses(): Course[] {
    const languageCourseIds = this.groupStore.getLanguageGroupCourseIds();
    const sectionCounts = new Map<string, number>();
    for (const section of this.sectionStore.getAll()) {
      sectionCounts.set(section.courseId, (sectionCounts.get(section.courseId) ?? 0) + 1);
    }

    return this.courseStore
      .getAll()
      .filter((c) => !languageCourseIds.has(c.id) && c.registeredStudentIds.length > 0)
      .sort(
        (a, b) =>
          getCourseTypeRank(a.courseType, this.courseTypePriority) -
            getCourseTypeRank(b.courseType, this.courseTypePriority) ||
          (sectionCounts.get(a.id) ?? 0) - (sectionCounts.get(b.id) ?? 0) ||
          b.registeredStudentIds.length - a.registeredStudentIds.length ||
          a.name.localeCompare(b.name)
      );
  }

  /**
   * Remove all section enrollments of a course. Registrations are untouched.
   */
  clear(courseId: string): ClearResult {
    if (!this.courseStore.load(courseId)) {
      return {
        success: false,
        error: `Course with id ${courseId} not found`,
        errorKind: "not_found",
        sectionsCleared: 0,
      };
    }

    try {
      const sectionsCleared = this.db.transaction(() =>
        this.sectionStore.clearCourseEnrollments(courseId)
      );
      return { success: true, sectionsCleared };
    } catch (err) {
      console.error("[DistributionService] Error clearing course distribution:", err);
      return { success: false, error: errorMessage(err), errorKind: "unexpected", sectionsCleared: 0 };
    }
  }

  clearAll(): ClearResult {
    try {
      const sectionsCleared = this.db.transaction(() => this.sectionStore.clearAllEnrollments());
      return { success: true, sectionsCleared };
    } catch (err) {
      console.error("[DistributionService] Error clearing all distributions:", err);
      return { success: false, error: errorMessage(err), errorKind: "unexpected", sectionsCleared: 0 };
    }
  }

  status(courseId: string): DistributionStatusResult {
    const course = this.courseStore.load(courseId);
    if (!course) {
      return failure(`Course with id ${courseId} not found`, "not_found");
    }

    const sections = this.sectionStore.getByCourse(course.id);
    return {
      success: true,
      courseId: course.id,
      courseName: course.name,
      courseCode: course.code,
      totalStudents: course.registeredStudentIds.length,
      numSections: sections.length,
      isDistributed: sections.some((s) => s.studentIds.length > 0),
      distribution: snapshotSections(this.db, sections),
    };
  }

  statusAll(): DistributionStatusResult[] {
    return this.courseStore.getAll().map((course) => this.status(course.id));
  }
}
