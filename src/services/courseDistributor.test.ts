import { CourseDistributor } from "./courseDistributor";
import { PeriodOccupancy } from "./conflictChecker";
import { UNASSIGNED_REASONS } from "../domain/distribution";
import { createSeededRandom } from "../domain/random";
import { SchoolDatabase } from "../stores/schoolDatabase";
import { SectionStore } from "../stores/sectionStore";
import {
  addCourseWithSections,
  addPeriods,
  addStudents,
  createTestDatabase,
  expectSuccess,
  idsOf,
  silenceConsole,
  studentId,
} from "../testing/schoolFixtures";

describe("CourseDistributor", () => {
  silenceConsole();

  /**
   * 28 grade-6 students registered for PE6, which meets in P1 and P2
   */
  function setupPhysicalEducation(db: SchoolDatabase = createTestDatabase()) {
    const students = addStudents(db, 6, 28);
    const periods = addPeriods(db, 2);
    const pe = addCourseWithSections(
      db,
      {
        name: "Physical Education 6",
        code: "PE6",
        gradeLevel: 6,
        duration: "YEAR",
        registeredStudentIds: idsOf(students),
      },
      periods
    );
    return { db, students, periods, pe };
  }

  describe("distributeCourse", () => {
    it("splits a course evenly across its sections", () => {
      const { db, pe } = setupPhysicalEducation();

      const result = new CourseDistributor(db, { random: createSeededRandom(1) }).distributeCourse(
        pe.course.id
      );

      expectSuccess(result);
      expect(result.totalStudents).toBe(28);
      expect(result.numSections).toBe(2);
      expect(result.distribution.map((s) => [s.sectionName, s.periodName, s.studentCount])).toEqual([
        ["PE6-1", "P1", 14],
        ["PE6-2", "P2", 14],
      ]);
      expect(result.unassigned).toEqual([]);
    });

    it("places every registered student exactly once", () => {
      const { db, students, pe } = setupPhysicalEducation();
      const distributor = new CourseDistributor(db, { random: createSeededRandom(2) });

      distributor.distributeCourse(pe.course.id);
      const result = distributor.distributeCourse(pe.course.id);

      expectSuccess(result);
      const placed = result.distribution.flatMap((s) => s.students.map((st) => st.id));
      expect(placed.sort()).toEqual(idsOf(students).sort());
    });

    it("keeps students out of periods where they already have a class", () => {
      const { db, periods, pe } = setupPhysicalEducation();
      const math = addCourseWithSections(
        db,
        { name: "Math 6", gradeLevel: 6, courseType: "CORE", duration: "YEAR" },
        [periods[0]]
      );
      new SectionStore(db).addStudent(math.sections[0].id, studentId(6, 1));

      const result = new CourseDistributor(db, { random: createSeededRandom(3) }).distributeCourse(
        pe.course.id
      );

      expectSuccess(result);
      const [first, second] = result.distribution;
      expect(idsOf(first.students)).not.toContain(studentId(6, 1));
      expect(idsOf(second.students)).toContain(studentId(6, 1));
      expect([first.studentCount, second.studentCount]).toEqual([14, 14]);
    });

    it("leaves students unassigned once every section is full", () => {
      const db = createTestDatabase();
      const students = addStudents(db, 6, 7);
      const periods = addPeriods(db, 1);
      const art = addCourseWithSections(
        db,
        {
          name: "Art 6",
          gradeLevel: 6,
          courseType: "ELECTIVE",
          duration: "YEAR",
          maxStudentsPerSection: 5,
          registeredStudentIds: idsOf(students),
        },
        periods
      );

      const result = new CourseDistributor(db, { random: createSeededRandom(4) }).distributeCourse(
        art.course.id
      );

      expectSuccess(result);
      expect(result.distribution[0].studentCount).toBe(5);
      expect(result.unassigned).toHaveLength(2);
      expect(result.unassigned.every((s) => s.reason === UNASSIGNED_REASONS.noAvailableSection)).toBe(
        true
      );
    });

    it("leaves a student unassigned when every section meets in a period they already use", () => {
      const db = createTestDatabase();
      addStudents(db, 6, 1);
      const periods = addPeriods(db, 1);
      const math = addCourseWithSections(
        db,
        { name: "Math 6", gradeLevel: 6, duration: "YEAR" },
        periods
      );
      new SectionStore(db).addStudent(math.sections[0].id, studentId(6, 1));
      const choir = addCourseWithSections(
        db,
        {
          name: "Choir 6",
          gradeLevel: 6,
          courseType: "ELECTIVE",
          duration: "YEAR",
          registeredStudentIds: [studentId(6, 1)],
        },
        [periods[0], periods[0]]
      );

      const result = new CourseDistributor(db, { random: createSeededRandom(5) }).distributeCourse(
        choir.course.id
      );

      expectSuccess(result);
      expect(result.distribution.map((s) => [s.sectionName, s.periodName, s.studentCount])).toEqual([
        ["Choir 6-1", "P1", 0],
        ["Choir 6-2", "P1", 0],
      ]);
      expect(result.unassigned).toEqual([
        {
          id: studentId(6, 1),
          firstName: "Student1",
          lastName: "Grade6",
          gradeLevel: 6,
          reason: UNASSIGNED_REASONS.noAvailableSection,
        },
      ]);
    });

    it("reports registered ids that no longer resolve to a student", () => {
      const db = createTestDatabase();
      const students = addStudents(db, 6, 2);
      const periods = addPeriods(db, 1);
      const art = addCourseWithSections(
        db,
        {
          name: "Art 6",
          gradeLevel: 6,
          courseType: "ELECTIVE",
          duration: "YEAR",
          registeredStudentIds: idsOf(students),
        },
        periods
      );
      // e.g. a hand-edited data file
      art.course.registeredStudentIds.push("ghost");

      const result = new CourseDistributor(db, { random: createSeededRandom(6) }).distributeCourse(
        art.course.id
      );

      expectSuccess(result);
      expect(result.totalStudents).toBe(3);
      expect(result.distribution[0].studentCount).toBe(2);
      expect(result.unassigned).toEqual([
        {
          id: "ghost",
          firstName: "",
          lastName: "",
          gradeLevel: 6,
          reason: UNASSIGNED_REASONS.studentNotFound,
        },
      ]);
    });

    it("produces the same grouping for the same seed", () => {
      const run = () => {
        const { db, pe } = setupPhysicalEducation();
        const result = new CourseDistributor(db, { random: createSeededRandom(42) }).distributeCourse(
          pe.course.id
        );
        expectSuccess(result);
        return result.distribution.map((s) => idsOf(s.students));
      };

      expect(run()).toEqual(run());
    });

    it("reports a conflict caught only by the final store check", () => {
      const db = createTestDatabase();
      addStudents(db, 6, 1);
      const periods = addPeriods(db, 1);
      const math = addCourseWithSections(
        db,
        { name: "Math 6", gradeLevel: 6, duration: "YEAR" },
        periods
      );
      new SectionStore(db).addStudent(math.sections[0].id, studentId(6, 1));
      const pe = addCourseWithSections(
        db,
        {
          name: "Physical Education 6",
          gradeLevel: 6,
          duration: "YEAR",
          registeredStudentIds: [studentId(6, 1)],
        },
        periods
      );

      // An empty index does not know about the Math enrollment
      const result = new CourseDistributor(db).distributeWithOccupancy(
        pe.course.id,
        new PeriodOccupancy()
      );

      expectSuccess(result);
      expect(result.unassigned).toEqual([
        {
          id: studentId(6, 1),
          firstName: "Student1",
          lastName: "Grade6",
          gradeLevel: 6,
          reason: UNASSIGNED_REASONS.finalCheckConflict,
        },
      ]);
    });
  });

  describe("preconditions", () => {
    it("reports an unknown course", () => {
      const result = new CourseDistributor(createTestDatabase()).distributeCourse("missing");

      expect(result).toEqual({
        success: false,
        error: "Course with id missing not found",
        errorKind: "not_found",
      });
    });

    it("requires sections", () => {
      const db = createTestDatabase();
      const { course } = addCourseWithSections(db, { name: "Choir 6", gradeLevel: 6, duration: "YEAR" }, []);

      expect(new CourseDistributor(db).distributeCourse(course.id)).toEqual({
        success: false,
        error: "Course Choir 6 has no sections",
        errorKind: "precondition",
      });
    });

    it("requires every section to have a period", () => {
      const { db, pe } = setupPhysicalEducation();
      new SectionStore(db).create({ courseId: pe.course.id });

      expect(new CourseDistributor(db).distributeCourse(pe.course.id)).toEqual({
        success: false,
        error: "Course Physical Education 6 has sections without assigned periods: PE6-3",
        errorKind: "precondition",
      });
    });

    it("requires registered students", () => {
      const db = createTestDatabase();
      const periods = addPeriods(db, 1);
      const { course } = addCourseWithSections(
        db,
        { name: "Choir 6", gradeLevel: 6, duration: "YEAR" },
        periods
      );

      expect(new CourseDistributor(db).distributeCourse(course.id)).toEqual({
        success: false,
        error: "No students registered for Choir 6",
        errorKind: "precondition",
      });
    });
  });

  describe("failure handling", () => {
    it("rolls back every change when a placement fails", () => {
      const { db, pe } = setupPhysicalEducation();
      const sectionStore = new SectionStore(db);
      sectionStore.addStudent(pe.sections[0].id, studentId(6, 1));
      jest.spyOn(SectionStore.prototype, "addStudent").mockImplementation(() => {
        throw new Error("disk full");
      });

      const result = new CourseDistributor(db).distributeCourse(pe.course.id);

      expect(result).toEqual({ success: false, error: "disk full", errorKind: "unexpected" });
      expect(new SectionStore(db).getByCourse(pe.course.id).map((s) => s.studentIds)).toEqual([
        [studentId(6, 1)],
        [],
      ]);
    });
  });
});
