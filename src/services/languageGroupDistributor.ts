/**
 * Language-Group Distributor
 *
 * Language courses of a grade (e.g. French, Spanish) share a set of periods.
 * Every student of the grade takes every course of the group, one per
 * trimester, always in the same period:
 *
 *   period P3: French (T1) -> Spanish (T2)   students 1..20
 *   period P4: French (T1) -> Spanish (T2)   students 21..40
 *
 * Because a student only ever sits in one period of the group, the rotation
 * cannot double-book them. Students are split evenly across the periods; the
 * first `n mod k` periods take one extra student. A student their own period
 * cannot take is offered the group's other periods.
 */

import { Course } from "../domain/course";
import {
  LanguageGroupDistributionResult,
  UNASSIGNED_REASONS,
  UnassignedStudent,
  errorMessage,
  failure,
} from "../domain/distribution";
import { MAX_LANGUAGE_GROUP_COURSES, LanguageGroup } from "../domain/groups";
import { Period } from "../domain/period";
import { RandomSource, createRandom, shuffle } from "../domain/random";
import { Section, TRIMESTERS } from "../domain/section";
import { Student, toStudentSummary } from "../domain/user";
import { CourseStore } from "../stores/courseStore";
import { GroupStore } from "../stores/groupStore";
import { PeriodStore } from "../stores/periodStore";
import { SchoolDatabase, getSchoolDatabase } from "../stores/schoolDatabase";
import { SectionStore } from "../stores/sectionStore";
import { UserStore } from "../stores/userStore";
import { ConflictChecker, PeriodOccupancy } from "./conflictChecker";
import { DistributorOptions } from "./courseDistributor";
import { snapshotSections } from "./sectionSnapshot";

interface RotationSlot {
  course: Course;
  section: Section;
}

interface PeriodSlot {
  period: Period;
  rotation: RotationSlot[];
  capacity: number;
  placed: number;
}

/**
 * Split `items` into `parts` contiguous chunks whose sizes differ by at most one
 */
export function splitEvenly<T>(items: T[], parts: number): T[][] {
  const base = Math.floor(items.length / parts);
  const extras = items.length % parts;
  const chunks: T[][] = [];

  let index = 0;
  for (let i = 0; i < parts; i++) {
    const size = base + (i < extras ? 1 : 0);
    chunks.push(items.slice(index, index + size));
    index += size;
  }
  return chunks;
}

export class LanguageGroupDistributor {
  private courseStore: CourseStore;
  private sectionStore: SectionStore;
  private periodStore: PeriodStore;
  private userStore: UserStore;
  private groupStore: GroupStore;
  private conflictChecker: ConflictChecker;
  private random: RandomSource;

  constructor(
    private readonly db: SchoolDatabase = getSchoolDatabase(),
    options: DistributorOptions = {}
  ) {
    this.courseStore = new CourseStore(db);
    this.sectionStore = new SectionStore(db);
    this.periodStore = new PeriodStore(db);
    this.userStore = new UserStore(db);
    this.groupStore = new GroupStore(db);
    this.conflictChecker = new ConflictChecker(db);
    this.random = options.random ?? createRandom();
  }

  distributeLanguageGroup(groupId: string): LanguageGroupDistributionResult {
    return this.distributeWithOccupancy(groupId, this.conflictChecker.buildOccupancy());
  }

  distributeWithOccupancy(
    groupId: string,
    occupancy: PeriodOccupancy
  ): LanguageGroupDistributionResult {
    const group = this.groupStore.loadLanguageGroup(groupId);
    if (!group) {
      return failure(`Language group with id ${groupId} not found`, "not_found");
    }

    const courses = group.courseIds
      .map((id) => this.courseStore.load(id))
      .filter((c): c is Course => c !== null);
    const periods = group.periodIds
      .map((id) => this.periodStore.load(id))
      .filter((p): p is Period => p !== null);

    if (courses.length === 0) {
      return failure(`Language group ${group.name} has no courses`, "precondition");
    }
    if (periods.length === 0) {
      return failure(`Language group ${group.name} has no periods`, "precondition");
    }
    if (courses.length > MAX_LANGUAGE_GROUP_COURSES) {
      return failure(
        `Language group ${group.name} has ${courses.length} courses but only ${MAX_LANGUAGE_GROUP_COURSES} trimesters`,
        "precondition"
      );
    }

    const students = this.userStore.getStudents(group.gradeLevel);
    if (students.length === 0) {
      return failure(`No students found in grade ${group.gradeLevel}`, "precondition");
    }

    const before = occupancy.snapshot();
    try {
      return this.db.transaction(() => this.run(group, courses, periods, students, occupancy));
    } catch (err) {
      occupancy.restore(before);
      console.error(`[LanguageGroupDistributor] Error distributing ${group.name}:`, err);
      return failure(errorMessage(err), "unexpected");
    }
  }

  private run(
    group: LanguageGroup,
    courses: Course[],
    periods: Period[],
    students: Student[],
    occupancy: PeriodOccupancy
  ): LanguageGroupDistributionResult {
    for (const course of courses) {
      this.sectionStore.clearCourseEnrollments(course.id);
    }
    occupancy.removeCourses(courses.map((c) => c.id));

    const slots: PeriodSlot[] = periods.map((period) => {
      const rotation = this.prepareRotation(courses, period);
      return {
        period,
        rotation,
        capacity: Math.min(...rotation.map((slot) => this.sectionStore.getCapacity(slot.section))),
        placed: 0,
      };
    });
    const chunks = splitEvenly(shuffle(students, this.random), periods.length);
    const rosters = new Map<string, string[]>(courses.map((c) => [c.id, []]));

    const turnedAway: { student: Student; reason: string }[] = [];
    slots.forEach((slot, index) => {
      for (const student of chunks[index]) {
        const reason = this.place(slot, student, occupancy, rosters);
        if (reason) {
          turnedAway.push({ student, reason });
        }
      }
    });

    // A second pass offers the least-filled other periods before giving up
    const unassigned: UnassignedStudent[] = [];
    for (const { student, reason } of turnedAway) {
      const fallback = [...slots].sort((a, b) => a.placed - b.placed);
      if (!fallback.some((slot) => this.place(slot, student, occupancy, rosters) === null)) {
        unassigned.push({ ...toStudentSummary(student), reason });
      }
    }

    for (const [courseId, studentIds] of rosters) {
      this.courseStore.setRegisteredStudents(courseId, studentIds);
    }

    console.log(
      `[LanguageGroupDistributor] ${group.name}: placed ${students.length - unassigned.length}/${students.length} students across ${periods.length} periods`
    );

    return {
      success: true,
      groupId: group.id,
      groupName: group.name,
      gradeLevel: group.gradeLevel,
      totalStudents: students.length,
      distribution: snapshotSections(
        this.db,
        slots.flatMap((slot) => slot.rotation.map(({ section }) => section))
      ),
      unassigned,
    };
  }

  /**
   * Seat a student in every section of a period's rotation. Returns the
   * reason when the period cannot take them.
   */
  private place(
    slot: PeriodSlot,
    student: Student,
    occupancy: PeriodOccupancy,
    rosters: Map<string, string[]>
  ): string | null {
    if (slot.placed >= slot.capacity) {
      return UNASSIGNED_REASONS.sectionFull;
    }

    const periodId = slot.period.id;
    const blocked = slot.rotation.some(
      ({ course, section }) =>
        occupancy.hasConflict(student.id, periodId, course.id, section.trimester) ||
        this.conflictChecker.hasPeriodConflict(student.id, periodId, course.id, section.trimester)
    );
    if (blocked) {
      return UNASSIGNED_REASONS.noAvailableSection;
    }

    for (const { course, section } of slot.rotation) {
      this.sectionStore.addStudent(section.id, student.id);
      occupancy.add(student.id, periodId, course.id, section.trimester);
      rosters.get(course.id)?.push(student.id);
    }
    slot.placed++;
    return null;
  }

  /**
   * One section per course in the period, in trimester order. Missing
   * sections are created with the course's next section number.
   */
  private prepareRotation(courses: Course[], period: Period): RotationSlot[] {
    return courses.map((course, index) => {
      const trimester = TRIMESTERS[index];
      const existing = this.sectionStore
        .getByCourse(course.id)
        .find((s) => s.periodId === period.id);

      if (existing) {
        const section = this.sectionStore.update(existing.id, { trimester }) ?? existing;
        return { course, section };
      }

      const section = this.sectionStore.create({
        courseId: course.id,
        periodId: period.id,
        trimester,
      });
      return { course, section };
    });
  }
}
